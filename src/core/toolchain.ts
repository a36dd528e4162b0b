import { spawn } from "node:child_process";
import type { ToolchainConfig } from "../schemas/config.schema.js";
import * as log from "../utils/logger.js";

export interface ToolchainRun {
  /** Project directory holding platformio.ini */
  cwd: string;
  /** PlatformIO environment to build (board env name) */
  environment: string;
  /** Parallel job hint */
  jobs: number;
  timeoutMs: number;
  /** Shown in log lines, e.g. "Servo@1.2.1 [uno]" */
  label: string;
}

export interface ToolchainResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** stdout followed by stderr, exactly as captured */
  output: string;
  timedOut: boolean;
  durationMs: number;
}

/** The external compiler: given a project directory and an env, emit a binary or fail */
export interface Toolchain {
  run(request: ToolchainRun): Promise<ToolchainResult>;
}

/** Hands out a toolchain permit for the duration of `fn` */
export interface ToolchainGate {
  withPermit<T>(fn: () => Promise<T>): Promise<T>;
}

/** A toolchain whose every run holds a permit from `gate` */
export class GatedToolchain implements Toolchain {
  constructor(
    private readonly inner: Toolchain,
    private readonly gate: ToolchainGate,
  ) {}

  run(request: ToolchainRun): Promise<ToolchainResult> {
    return this.gate.withPermit(() => this.inner.run(request));
  }
}

/** Exit code reported for a run that had to be killed */
const KILLED_EXIT_CODE = 137;

/**
 * Runs `<command> run -e <env> -j <jobs>` without a shell, so nothing in the
 * request is ever interpreted by one. The process leads its own group: at the
 * deadline the whole group gets SIGTERM, then SIGKILL after `killGraceMs`, and
 * the run settles without waiting for stray descendants to close the pipes.
 */
export class PlatformIOToolchain implements Toolchain {
  constructor(
    private readonly command: string,
    private readonly killGraceMs = 2000,
  ) {}

  static fromConfig(config: ToolchainConfig): PlatformIOToolchain {
    return new PlatformIOToolchain(config.command);
  }

  run(request: ToolchainRun): Promise<ToolchainResult> {
    const args = ["run", "-e", request.environment, "-j", String(request.jobs)];
    log.debug(`Running ${this.command} ${args.join(" ")} in ${request.cwd}`);

    const startTime = Date.now();

    return new Promise((resolve) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const child = spawn(this.command, args, {
        cwd: request.cwd,
        stdio: ["ignore", "pipe", "pipe"],
        detached: true,
      });

      const signalGroup = (signal: NodeJS.Signals) => {
        if (child.pid === undefined) return;
        try {
          process.kill(-child.pid, signal);
        } catch (err) {
          // ESRCH: the group is already gone
          log.debug(`${request.label}: ${signal} not delivered (${err instanceof Error ? err.message : String(err)})`);
        }
      };

      const timer = setTimeout(() => {
        timedOut = true;
        log.warn(`${request.label} timed out after ${request.timeoutMs}ms`);
        signalGroup("SIGTERM");
        killTimer = setTimeout(() => {
          signalGroup("SIGKILL");
          finish(child.exitCode ?? KILLED_EXIT_CODE);
        }, this.killGraceMs);
      }, request.timeoutMs);

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      const finish = (exitCode: number, extraStderr = "") => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        clearTimeout(killTimer);
        const out = Buffer.concat(stdout).toString("utf-8");
        const err = Buffer.concat(stderr).toString("utf-8") + extraStderr;
        const durationMs = Date.now() - startTime;

        if (exitCode === 0 && !timedOut) {
          log.debug(`${request.label} completed (${durationMs}ms)`);
        } else {
          log.debug(`${request.label} failed with exit code ${exitCode} (${durationMs}ms)`);
        }
        resolve({ exitCode, stdout: out, stderr: err, output: out + err, timedOut, durationMs });
      };

      // Spawn failures (e.g. the toolchain is not installed) are reported like a failed run
      child.on("error", (err) => finish(127, `${err.message}\n`));
      child.on("close", (code) => finish(code ?? KILLED_EXIT_CODE));
    });
  }
}
