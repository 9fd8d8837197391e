import { BaseError } from "./BaseError";

/**
 * Web-related error codes
 */
export enum WebErrorCode {
  // Server errors
  SERVER_START_FAILED = "WEB_SERVER_START_FAILED",
  SERVER_STOP_FAILED = "WEB_SERVER_STOP_FAILED",
  SERVER_NOT_RUNNING = "WEB_SERVER_NOT_RUNNING",
  PORT_IN_USE = "WEB_PORT_IN_USE",

  // Resource errors
  NOT_FOUND = "WEB_NOT_FOUND",

  // Generic
  UNKNOWN = "WEB_UNKNOWN_ERROR",
}

/**
 * Diagnostics Web API Error
 */
export class WebError extends BaseError {
  /**
   * HTTP status code associated with this error
   */
  public readonly statusCode?: number;

  constructor(
    message: string,
    code: WebErrorCode = WebErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
    statusCode?: number,
  ) {
    super(message, code, recoverable, context);
    this.statusCode = statusCode;
  }

  static serverStartFailed(port: number, error: Error): WebError {
    return new WebError(
      `Failed to start web server on port ${port}: ${error.message}`,
      WebErrorCode.SERVER_START_FAILED,
      false,
      { port, originalError: error.message },
      500,
    );
  }

  static serverStopFailed(error: Error): WebError {
    return new WebError(
      `Failed to stop web server: ${error.message}`,
      WebErrorCode.SERVER_STOP_FAILED,
      false,
      { originalError: error.message },
      500,
    );
  }

  static portInUse(port: number): WebError {
    return new WebError(
      `Port ${port} is already in use`,
      WebErrorCode.PORT_IN_USE,
      false,
      { port },
      500,
    );
  }

  static serverNotRunning(): WebError {
    return new WebError(
      "Web server is not running",
      WebErrorCode.SERVER_NOT_RUNNING,
      false,
      {},
      503,
    );
  }

  static notFound(resource: string): WebError {
    return new WebError(
      `Resource not found: ${resource}`,
      WebErrorCode.NOT_FOUND,
      false,
      { resource },
      404,
    );
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      statusCode: this.statusCode,
    };
  }
}
