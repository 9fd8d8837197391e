import { NotificationContent } from "../types";

/**
 * Renders the open network notification. Both calls are idempotent: showing
 * replaces whatever is displayed, retracting with nothing displayed is a no-op.
 */
export interface INotifier {
  show(content: NotificationContent): void;

  retract(): void;
}
