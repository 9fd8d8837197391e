import { BadgeLevel } from "./NetworkTypes";

/**
 * Lifecycle of the "open network available" notification
 */
export enum NotificationPhase {
  /** Nothing shown, waiting for qualifying scans */
  IDLE = "IDLE",
  /** A candidate was recommended, counting consecutive qualifying scans */
  CANDIDATE_PENDING = "CANDIDATE_PENDING",
  /** "Network available" notification is visible */
  SHOWN = "SHOWN",
  /** User asked to connect, waiting for the connection */
  CONNECTING = "CONNECTING",
  /** Connected notification visible until auto-dismiss */
  CONNECTED = "CONNECTED",
  /** Failed-to-connect notification visible until auto-dismiss */
  FAILED = "FAILED",
}

/**
 * Signal bars plus speed badge rendered next to the notification
 */
export type NotificationBadge = {
  /** 0 (weakest) to 4 (strongest) */
  signalLevel: number;
  badgeLevel: BadgeLevel;
};

export type NotificationKind = "available" | "connecting" | "connected" | "failed";

/**
 * Renderer-independent description of a notification
 */
export type NotificationContent = {
  kind: NotificationKind;
  title: string;
  /** Printable (unquoted) SSID of the recommended network */
  text: string;
  badge: NotificationBadge | null;
  actions: Array<"connect" | "options">;
  /** Indeterminate progress indicator */
  progress: boolean;
};

/**
 * Snapshot for status output
 */
export type NotificationStatus = {
  phase: NotificationPhase;
  enabled: boolean;
  scansSinceStateChange: number;
  /** Epoch ms before which the main notification is not shown again */
  repeatTime: number;
  recommendedSsid: string | null;
};
