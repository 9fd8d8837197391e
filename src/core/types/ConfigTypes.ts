/**
 * Application-wide configuration
 */
export type AppConfig = {
  /** Application version */
  version: string;

  /** Environment (development, production) */
  environment: "development" | "production";

  /** Candidate scoring thresholds and awards */
  selector: SelectorConfig;

  /** Wi-Fi wakeup behaviour */
  wakeup: WakeupConfig;

  /** Open network notification behaviour */
  notification: NotificationConfig;

  /** Diagnostics web interface configuration */
  web: WebConfig;

  /** Logging configuration */
  logging: LoggingConfig;
};

/**
 * Thresholds and awards used by the network selector.
 * RSSI values are in dBm.
 */
export type SelectorConfig = {
  /** Minimum RSSI for a 2.4 GHz candidate */
  thresholdQualifiedRssi24: number;

  /** Minimum RSSI for a 5 GHz candidate */
  thresholdQualifiedRssi5: number;

  /** RSSI above which a stronger signal adds nothing to the score */
  thresholdSaturatedRssi24: number;

  /** Points per dB */
  rssiScoreSlope: number;

  /** Added to the (saturated) RSSI before applying the slope */
  rssiScoreOffset: number;

  /** Bonus for candidates on the 5 GHz band */
  band5GHzAward: number;

  /** Bonus for passpoint networks */
  passpointSecurityAward: number;

  /** Bonus for any other non-open network */
  securityAward: number;
};

export type WakeupConfig = {
  /** Feature switch, can be changed at run time via settings events */
  enabled: boolean;

  /** Consecutive scans a tracked network must be missing before it is forgotten */
  missedScansBeforeRelease: number;
};

export type NotificationConfig = {
  /** Feature switch, can be changed at run time via settings events */
  enabled: boolean;

  /** Consecutive qualifying scans before the notification is shown */
  scansBeforeShow: number;

  /** Minimum time between two "network available" notifications */
  repeatDelayMs: number;

  /** How long to wait for a connection before reporting failure */
  connectingTimeoutMs: number;

  /** How long the connected / failed notification stays up */
  dismissDelayMs: number;
};

/**
 * Web interface configuration
 */
export type WebConfig = {
  /** Enable the diagnostics HTTP API */
  enabled: boolean;

  /** Server port */
  port: number;

  /** Server host */
  host: string;

  /** API base path */
  apiBasePath: string;
};

/**
 * Logging configuration
 */
export type LoggingConfig = {
  /** Log level */
  level: "debug" | "info" | "warn" | "error";
};
