/**
 * Error types raised before any loop starts. Everything that goes wrong inside a
 * running loop is reported as an engine event instead of being thrown.
 */
export class ClipShareError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "ClipShareError";
    this.code = code;
  }
}

/** Bad command line input: malformed peer address, port or interval. */
export class UsageError extends ClipShareError {
  constructor(message: string) {
    super("usage_error", message);
    this.name = "UsageError";
  }
}

/** No clipboard utilities are known for the running platform. */
export class UnsupportedPlatformError extends ClipShareError {
  readonly platform: string;

  constructor(platform: string) {
    super("unsupported_platform", `Unsupported platform: ${platform}`);
    this.name = "UnsupportedPlatformError";
    this.platform = platform;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
