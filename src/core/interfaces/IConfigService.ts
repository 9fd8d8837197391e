import {
  AppConfig,
  NotificationConfig,
  Result,
  SelectorConfig,
  WakeupConfig,
  WebConfig,
} from "../types";

/**
 * Config Service Interface
 *
 * Loads the application configuration from JSON, applies environment
 * overrides and exposes read-only views per component.
 */
export interface IConfigService {
  /**
   * Load and validate the configuration file.
   * A missing file is not an error; defaults are used.
   */
  initialize(): Promise<Result<void>>;

  getConfig(): AppConfig;

  getSelectorConfig(): SelectorConfig;

  getWakeupConfig(): WakeupConfig;

  getNotificationConfig(): NotificationConfig;

  getWebConfig(): WebConfig;
}
