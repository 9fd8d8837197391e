import { INotifier } from "@core/interfaces";
import { NotificationContent } from "@core/types";
import { getLogger } from "@utils/logger";

const logger = getLogger("LoggingNotifier");

/**
 * Notifier for standalone runs. Writes notifications to the log and keeps the
 * one currently displayed for the status endpoint.
 */
export class LoggingNotifier implements INotifier {
  private current: NotificationContent | null = null;

  show(content: NotificationContent): void {
    this.current = content;
    const badge = content.badge
      ? ` [signal ${content.badge.signalLevel}, badge ${content.badge.badgeLevel}]`
      : "";
    logger.info(`(${content.kind}) ${content.title}: ${content.text}${badge}`);
  }

  retract(): void {
    if (!this.current) {
      return;
    }
    logger.info(`(${this.current.kind}) retracted`);
    this.current = null;
  }

  getCurrent(): NotificationContent | null {
    return this.current;
  }
}
