import { BaseError } from "./BaseError";

export enum ConfigErrorCode {
  FILE_READ_ERROR = "CONFIG_FILE_READ_ERROR",
  INVALID_JSON = "CONFIG_INVALID_JSON",
  // zod rejected the merged file
  INVALID_CONFIG = "CONFIG_INVALID_CONFIG",
  // a NETREC_* override could not be converted
  INVALID_VALUE = "CONFIG_INVALID_VALUE",
  UNKNOWN = "CONFIG_UNKNOWN_ERROR",
}

/**
 * Raised by ConfigService while loading `config/default.json` and the
 * `NETREC_*` overrides. None of these is recoverable: the service exits.
 */
export class ConfigError extends BaseError {
  constructor(
    message: string,
    code: ConfigErrorCode = ConfigErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  static readError(filePath: string, error: Error): ConfigError {
    return ConfigError.forFile(
      filePath,
      error,
      `Failed to read configuration file: ${error.message}`,
      ConfigErrorCode.FILE_READ_ERROR,
    );
  }

  static invalidJSON(filePath: string, error: Error): ConfigError {
    return ConfigError.forFile(
      filePath,
      error,
      `Invalid JSON in configuration file: ${error.message}`,
      ConfigErrorCode.INVALID_JSON,
    );
  }

  /**
   * @param issues - one `path: message` entry per zod issue
   */
  static invalidConfig(source: string, issues: string[]): ConfigError {
    return new ConfigError(
      `Invalid configuration in ${source}: ${issues.join("; ")}`,
      ConfigErrorCode.INVALID_CONFIG,
      false,
      { source, issues },
    );
  }

  /**
   * An environment override that does not parse, e.g. `NETREC_WEB_PORT=abc`
   */
  static invalidValue(
    field: string,
    value: unknown,
    expected: string,
  ): ConfigError {
    return new ConfigError(
      `Invalid value for ${field}: ${String(value)} (expected: ${expected})`,
      ConfigErrorCode.INVALID_VALUE,
      false,
      { field, value, expected },
    );
  }

  private static forFile(
    filePath: string,
    error: Error,
    message: string,
    code: ConfigErrorCode,
  ): ConfigError {
    return new ConfigError(message, code, false, {
      filePath,
      originalError: error.message,
    });
  }
}
