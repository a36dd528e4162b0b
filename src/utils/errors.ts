/**
 * Typed error classes for firmforge.
 *
 * Hierarchy:
 *   FirmforgeError (base, carries `code` and an HTTP-ish `status`)
 *   ├── NotFoundError           unknown library name or version
 *   ├── InvalidInputError       unsafe library name, unknown board, malformed request
 *   ├── InstallFailureError     library could not be built for a board
 *   ├── CyclicDependencyError   a library depends on itself (directly or not)
 *   ├── CompileError            final toolchain run failed (raw output attached)
 *   ├── TimeoutError            external process or request exceeded its deadline
 *   ├── NetworkError            HTTP failures (statusCode, source, isRetryable)
 *   └── ConfigValidationError   config/schema validation failures
 */

/** Base error for all firmforge-specific errors */
export class FirmforgeError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(message: string, code: string, status = 500) {
    super(message);
    this.name = "FirmforgeError";
    this.code = code;
    this.status = status;
  }
}

export class NotFoundError extends FirmforgeError {
  readonly library: string;
  readonly version: string | undefined;

  constructor(library: string, version?: string) {
    super(
      version
        ? `Library ${library} not found, with version ${version}`
        : `Library ${library} not found`,
      "NOT_FOUND",
      404,
    );
    this.name = "NotFoundError";
    this.library = library;
    this.version = version;
  }
}

export class InvalidInputError extends FirmforgeError {
  readonly field: string;

  constructor(message: string, field: string) {
    super(message, "INVALID_INPUT", 422);
    this.name = "InvalidInputError";
    this.field = field;
  }
}

export class InstallFailureError extends FirmforgeError {
  readonly library: string;
  readonly architecture: string;

  constructor(message: string, library: string, architecture: string) {
    super(message, "INSTALL_FAILURE", 500);
    this.name = "InstallFailureError";
    this.library = library;
    this.architecture = architecture;
  }
}

export class CyclicDependencyError extends FirmforgeError {
  readonly chain: string[];

  constructor(chain: string[]) {
    super(`Cyclic library dependency: ${chain.join(" -> ")}`, "CYCLIC_DEPENDENCY", 500);
    this.name = "CyclicDependencyError";
    this.chain = chain;
  }
}

/** The toolchain rejected the sketch. `output` is stdout followed by stderr, unmodified. */
export class CompileError extends FirmforgeError {
  readonly output: string;
  readonly exitCode: number;

  constructor(output: string, exitCode: number) {
    super(output, "COMPILE_ERROR", 500);
    this.name = "CompileError";
    this.output = output;
    this.exitCode = exitCode;
  }
}

export class TimeoutError extends FirmforgeError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, "TIMEOUT", 504);
    this.name = "TimeoutError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/** HTTP failures talking to the library index or archive hosts */
export class NetworkError extends FirmforgeError {
  readonly statusCode: number | undefined;
  readonly source: string;

  /** HTTP status codes that are safe to retry */
  static readonly RETRYABLE_STATUS_CODES = [429, 500, 502, 503, 504];

  constructor(message: string, statusCode: number | undefined, source: string) {
    super(message, statusCode ? `NETWORK_${statusCode}` : "NETWORK_ERROR", 502);
    this.name = "NetworkError";
    this.statusCode = statusCode;
    this.source = source;
  }

  get isRetryable(): boolean {
    return (
      this.statusCode !== undefined &&
      NetworkError.RETRYABLE_STATUS_CODES.includes(this.statusCode)
    );
  }
}

/** Config or schema validation failures */
export class ConfigValidationError extends FirmforgeError {
  constructor(message: string, field: string) {
    super(message, `CONFIG_INVALID_${field}`, 500);
    this.name = "ConfigValidationError";
  }
}

/** Render any thrown value as a one-line message for logs */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
