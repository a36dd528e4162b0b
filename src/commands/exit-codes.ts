import {
  CompileError,
  InvalidInputError,
  NotFoundError,
  TimeoutError,
} from "../utils/errors.js";

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  compileFailure: 2,
  invalidInput: 3,
  notFound: 4,
  timeout: 5,
} as const;

const STATUS_BY_CODE: Record<number, string> = {
  [EXIT_CODES.success]: "success",
  [EXIT_CODES.failure]: "error",
  [EXIT_CODES.compileFailure]: "compile_failure",
  [EXIT_CODES.invalidInput]: "invalid_input",
  [EXIT_CODES.notFound]: "not_found",
  [EXIT_CODES.timeout]: "timeout",
};

export function exitCodeFor(err: unknown): number {
  if (err instanceof CompileError) return EXIT_CODES.compileFailure;
  if (err instanceof InvalidInputError) return EXIT_CODES.invalidInput;
  if (err instanceof NotFoundError) return EXIT_CODES.notFound;
  if (err instanceof TimeoutError) return EXIT_CODES.timeout;
  return EXIT_CODES.failure;
}

export function statusFor(exitCode: number): string {
  return STATUS_BY_CODE[exitCode] ?? "error";
}
