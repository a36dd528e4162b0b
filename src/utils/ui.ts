import ora, { type Ora } from "ora";

let activeSpinner: Ora | null = null;
let silent = false;

/** Silence spinners entirely (quiet and JSON output modes) */
export function configureSpinners(opts: { silent: boolean }): void {
  silent = opts.silent;
}

/** Start a spinner with the given message. Stops any active spinner first. */
export function startSpinner(text: string): void {
  if (activeSpinner) {
    activeSpinner.stop();
  }
  activeSpinner = ora({
    text,
    stream: process.stderr,
    isSilent: silent,
    // Auto-disable animation on non-TTY (CI, piped output)
    isEnabled: process.stderr.isTTY === true,
  }).start();
}

/** Mark the spinner as succeeded */
export function succeedSpinner(text?: string): void {
  if (activeSpinner) {
    activeSpinner.succeed(text);
    activeSpinner = null;
  }
}

/** Mark the spinner as failed */
export function failSpinner(text?: string): void {
  if (activeSpinner) {
    activeSpinner.fail(text);
    activeSpinner = null;
  }
}

export function isSpinnerActive(): boolean {
  return activeSpinner !== null;
}

/** Temporarily pause the spinner (e.g., while logging). Returns resume function. */
export function pauseSpinner(): (() => void) | null {
  if (!activeSpinner) return null;
  const spinner = activeSpinner;
  spinner.stop();
  return () => {
    spinner.start();
  };
}

export function formatElapsed(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Run a long operation (install, compile, index fetch) under a spinner.
 * The final line carries the elapsed time; errors are rethrown unchanged.
 */
export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
  done?: (result: T) => string,
): Promise<T> {
  const label = text.replace(/\.\.\.$/, "");
  const started = Date.now();
  startSpinner(text);
  try {
    const result = await fn();
    succeedSpinner(`${done ? done(result) : label} (${formatElapsed(Date.now() - started)})`);
    return result;
  } catch (err) {
    failSpinner(`${label} failed`);
    throw err;
  }
}
