import { describeError } from "../utils/errors.js";
import { fetchWithRetry } from "../utils/retry.js";
import * as log from "../utils/logger.js";

/** Decides whether installs and catalog refreshes should run at all */
export interface ConnectivityProbe {
  isOnline(): Promise<boolean>;
}

/** Downloads library archives */
export interface ArchiveFetcher {
  download(url: string): Promise<Uint8Array>;
}

/** HEAD a well-known URL; any failure (including the deadline) counts as offline */
export class HttpConnectivityProbe implements ConnectivityProbe {
  constructor(
    private readonly url: string,
    private readonly timeoutMs: number,
  ) {}

  async isOnline(): Promise<boolean> {
    try {
      await fetchWithRetry(this.url, {
        source: "connectivity check",
        method: "HEAD",
        timeoutMs: this.timeoutMs,
        retry: { maxAttempts: 1 },
      });
      return true;
    } catch (err) {
      log.debug(`Connectivity check failed: ${describeError(err)}`);
      return false;
    }
  }
}

export class HttpArchiveFetcher implements ArchiveFetcher {
  constructor(private readonly timeoutMs: number) {}

  async download(url: string): Promise<Uint8Array> {
    const res = await fetchWithRetry(url, {
      source: "archive download",
      timeoutMs: this.timeoutMs,
      retry: { maxAttempts: 2, initialDelayMs: 500 },
      onRetry: (attempt, delay) => log.warn(`Archive download retry ${attempt} in ${delay}ms...`),
    });
    return new Uint8Array(await res.arrayBuffer());
  }
}
