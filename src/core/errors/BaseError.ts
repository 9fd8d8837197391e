import { getUserMessage as getErrorUserMessage } from "./ErrorMessages";

/**
 * Common base of the score, recommendation, radio, config and web errors.
 *
 * Services return these inside a failed `Result`; the web layer turns them
 * into `{ code, message }` bodies and the logs into `toJSON()` output.
 */
export abstract class BaseError extends Error {
  /** Category-prefixed code, e.g. `RADIO_ENABLE_FAILED` */
  public readonly code: string;

  public readonly timestamp: Date;

  /** The offending key, line, port or file that produced the error */
  public readonly context?: Record<string, unknown>;

  /**
   * True when a later scan or event can succeed without user action, as
   * with a radio that refused to turn on
   */
  public readonly recoverable: boolean;

  constructor(
    message: string,
    code: string,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message);
    Error.captureStackTrace(this, this.constructor);
    // instanceof for subclasses
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = this.constructor.name;
    this.code = code;
    this.recoverable = recoverable;
    this.context = context;
    this.timestamp = new Date();
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }

  /**
   * Text for an operator, looked up by code in ErrorMessages
   */
  getUserMessage(): string {
    return getErrorUserMessage(this.code);
  }
}
