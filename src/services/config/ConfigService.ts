import * as fs from "fs/promises";
import { z } from "zod";
import { IConfigService } from "@core/interfaces";
import {
  AppConfig,
  NotificationConfig,
  Result,
  SelectorConfig,
  WakeupConfig,
  WebConfig,
  failure,
  success,
} from "@core/types";
import { ConfigError } from "@core/errors";
import {
  DEFAULT_CONFIG_PATH,
  DEFAULT_LOG_LEVEL,
  NOTIFICATION_DEFAULT_CONNECTING_TIMEOUT_MS,
  NOTIFICATION_DEFAULT_DISMISS_DELAY_MS,
  NOTIFICATION_DEFAULT_ENABLED,
  NOTIFICATION_DEFAULT_REPEAT_DELAY_MS,
  NOTIFICATION_DEFAULT_SCANS_BEFORE_SHOW,
  SELECTOR_DEFAULT_BAND_5GHZ_AWARD,
  SELECTOR_DEFAULT_PASSPOINT_SECURITY_AWARD,
  SELECTOR_DEFAULT_RSSI_SCORE_OFFSET,
  SELECTOR_DEFAULT_RSSI_SCORE_SLOPE,
  SELECTOR_DEFAULT_SECURITY_AWARD,
  SELECTOR_DEFAULT_THRESHOLD_QUALIFIED_RSSI_24,
  SELECTOR_DEFAULT_THRESHOLD_QUALIFIED_RSSI_5,
  SELECTOR_DEFAULT_THRESHOLD_SATURATED_RSSI_24,
  WAKEUP_DEFAULT_ENABLED,
  WAKEUP_DEFAULT_MISSED_SCANS_BEFORE_RELEASE,
  WEB_DEFAULT_API_BASE_PATH,
  WEB_DEFAULT_ENABLED,
  WEB_DEFAULT_HOST,
  WEB_DEFAULT_PORT,
} from "@core/constants";
import { isNodeJSErrnoException, toError } from "@utils/typeGuards";
import { getLogger } from "@utils/logger";

const logger = getLogger("ConfigService");

const rssi = z.number().int().min(-127).max(0);
const award = z.number().int().min(0);
const delayMs = z.number().int().min(0);

const appConfigSchema: z.ZodType<AppConfig> = z.object({
  version: z.string().min(1),
  environment: z.enum(["development", "production"]),
  selector: z.object({
    thresholdQualifiedRssi24: rssi,
    thresholdQualifiedRssi5: rssi,
    thresholdSaturatedRssi24: rssi,
    rssiScoreSlope: z.number().int().min(1),
    rssiScoreOffset: z.number().int(),
    band5GHzAward: award,
    passpointSecurityAward: award,
    securityAward: award,
  }),
  wakeup: z.object({
    enabled: z.boolean(),
    missedScansBeforeRelease: z.number().int().min(1),
  }),
  notification: z.object({
    enabled: z.boolean(),
    scansBeforeShow: z.number().int().min(1),
    repeatDelayMs: delayMs,
    connectingTimeoutMs: delayMs,
    dismissDelayMs: delayMs,
  }),
  web: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(1).max(65535),
    host: z.string().min(1),
    apiBasePath: z.string().startsWith("/"),
  }),
  logging: z.object({
    level: z.enum(["debug", "info", "warn", "error"]),
  }),
});

type EnvKind = "string" | "number" | "boolean";

/**
 * Environment variables that override a configuration field
 */
const ENV_OVERRIDES: ReadonlyArray<{
  name: string;
  section: keyof AppConfig;
  field: string;
  kind: EnvKind;
}> = [
  { name: "NETREC_ENV", section: "environment", field: "", kind: "string" },
  { name: "NETREC_WEB_ENABLED", section: "web", field: "enabled", kind: "boolean" },
  { name: "NETREC_WEB_PORT", section: "web", field: "port", kind: "number" },
  { name: "NETREC_WEB_HOST", section: "web", field: "host", kind: "string" },
  { name: "NETREC_LOG_LEVEL", section: "logging", field: "level", kind: "string" },
  { name: "NETREC_WAKEUP_ENABLED", section: "wakeup", field: "enabled", kind: "boolean" },
  {
    name: "NETREC_NOTIFICATION_ENABLED",
    section: "notification",
    field: "enabled",
    kind: "boolean",
  },
  {
    name: "NETREC_NOTIFICATION_REPEAT_DELAY_MS",
    section: "notification",
    field: "repeatDelayMs",
    kind: "number",
  },
];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Overlay `override` on `base`, one level of sections deep
 */
function mergeSections(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] =
      isPlainObject(current) && isPlainObject(value)
        ? { ...current, ...value }
        : value;
  }
  return merged;
}

function parseEnvValue(raw: string, kind: EnvKind): string | number | boolean | null {
  switch (kind) {
    case "string":
      return raw;
    case "number": {
      const value = Number(raw);
      return raw.trim() !== "" && Number.isFinite(value) ? value : null;
    }
    case "boolean":
      if (raw === "true" || raw === "1") return true;
      if (raw === "false" || raw === "0") return false;
      return null;
  }
}

/**
 * Config Service Implementation
 *
 * Reads `config/default.json`, overlays it on the built-in defaults, applies
 * `NETREC_*` environment overrides and validates the result.
 */
export class ConfigService implements IConfigService {
  private isInitialized: boolean = false;
  private config: AppConfig;

  constructor(
    private readonly configPath: string = DEFAULT_CONFIG_PATH,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {
    this.config = ConfigService.getDefaultConfig();
  }

  /**
   * Built-in configuration used for every field the file leaves out
   */
  static getDefaultConfig(): AppConfig {
    return {
      version: "1.0.0",
      environment: "development",
      selector: {
        thresholdQualifiedRssi24: SELECTOR_DEFAULT_THRESHOLD_QUALIFIED_RSSI_24,
        thresholdQualifiedRssi5: SELECTOR_DEFAULT_THRESHOLD_QUALIFIED_RSSI_5,
        thresholdSaturatedRssi24: SELECTOR_DEFAULT_THRESHOLD_SATURATED_RSSI_24,
        rssiScoreSlope: SELECTOR_DEFAULT_RSSI_SCORE_SLOPE,
        rssiScoreOffset: SELECTOR_DEFAULT_RSSI_SCORE_OFFSET,
        band5GHzAward: SELECTOR_DEFAULT_BAND_5GHZ_AWARD,
        passpointSecurityAward: SELECTOR_DEFAULT_PASSPOINT_SECURITY_AWARD,
        securityAward: SELECTOR_DEFAULT_SECURITY_AWARD,
      },
      wakeup: {
        enabled: WAKEUP_DEFAULT_ENABLED,
        missedScansBeforeRelease: WAKEUP_DEFAULT_MISSED_SCANS_BEFORE_RELEASE,
      },
      notification: {
        enabled: NOTIFICATION_DEFAULT_ENABLED,
        scansBeforeShow: NOTIFICATION_DEFAULT_SCANS_BEFORE_SHOW,
        repeatDelayMs: NOTIFICATION_DEFAULT_REPEAT_DELAY_MS,
        connectingTimeoutMs: NOTIFICATION_DEFAULT_CONNECTING_TIMEOUT_MS,
        dismissDelayMs: NOTIFICATION_DEFAULT_DISMISS_DELAY_MS,
      },
      web: {
        enabled: WEB_DEFAULT_ENABLED,
        port: WEB_DEFAULT_PORT,
        host: WEB_DEFAULT_HOST,
        apiBasePath: WEB_DEFAULT_API_BASE_PATH,
      },
      logging: {
        level: DEFAULT_LOG_LEVEL,
      },
    };
  }

  /**
   * Load the configuration. A missing file is not an error: the defaults
   * (plus environment overrides) are used.
   */
  async initialize(): Promise<Result<void>> {
    if (this.isInitialized) {
      return success(undefined);
    }

    const fileResult = await this.loadConfigFile();
    if (!fileResult.success) {
      return fileResult;
    }

    let merged = mergeSections(
      { ...ConfigService.getDefaultConfig() },
      fileResult.data,
    );
    const envResult = this.applyEnvOverrides(merged);
    if (!envResult.success) {
      return envResult;
    }
    merged = envResult.data;

    const parsed = appConfigSchema.safeParse(merged);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`,
      );
      return failure(ConfigError.invalidConfig(this.configPath, issues));
    }

    this.config = parsed.data;
    this.isInitialized = true;
    logger.info(
      `Configuration loaded (${this.config.environment}, web ${this.config.web.enabled ? `on port ${this.config.web.port}` : "disabled"})`,
    );
    return success(undefined);
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getSelectorConfig(): SelectorConfig {
    return this.config.selector;
  }

  getWakeupConfig(): WakeupConfig {
    return this.config.wakeup;
  }

  getNotificationConfig(): NotificationConfig {
    return this.config.notification;
  }

  getWebConfig(): WebConfig {
    return this.config.web;
  }

  private async loadConfigFile(): Promise<Result<Record<string, unknown>>> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, "utf-8");
    } catch (error) {
      if (isNodeJSErrnoException(error) && error.code === "ENOENT") {
        logger.info(`No configuration file at ${this.configPath}, using defaults`);
        return success({});
      }
      return failure(ConfigError.readError(this.configPath, toError(error)));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      return failure(ConfigError.invalidJSON(this.configPath, toError(error)));
    }

    if (!isPlainObject(parsed)) {
      return failure(
        ConfigError.invalidConfig(this.configPath, ["config: expected an object"]),
      );
    }
    return success(parsed);
  }

  private applyEnvOverrides(
    config: Record<string, unknown>,
  ): Result<Record<string, unknown>> {
    let result = config;
    for (const override of ENV_OVERRIDES) {
      const raw = this.env[override.name];
      if (raw === undefined || raw === "") {
        continue;
      }
      const value = parseEnvValue(raw, override.kind);
      if (value === null) {
        return failure(
          ConfigError.invalidValue(override.name, raw, `a ${override.kind}`),
        );
      }
      result = override.field
        ? mergeSections(result, { [override.section]: { [override.field]: value } })
        : { ...result, [override.section]: value };
      logger.debug(`${override.name} overrides ${override.section}`);
    }
    return success(result);
  }
}
