/**
 * Base class for every error raised by the transaction engine packages.
 *
 * `code` is stable and meant for programmatic handling; `message` is for humans.
 */
export class TxgenError extends Error {
  override name = 'TxgenError';
  public readonly code: string;
  public override readonly cause?: Error;

  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }

  constructor(code: string, message: string, cause?: Error) {
    super(message);
    this.code = code;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}
