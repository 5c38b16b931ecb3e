import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { lock, type LockOptions } from "proper-lockfile";
import { lockTimeoutError } from "../errors/index.ts";

const STALE_MS = 300_000;
const RETRY_MS = 50;
const MAX_RETRIES = 600;

interface FileLockOptions {
  stale?: number;
  retries?: number;
}

/** Cross-process lock around one topology's state directory. */
export class FileLock {
  private readonly stale: number;
  private readonly retries: number;

  constructor(
    private readonly path: string,
    private readonly name: string,
    options?: FileLockOptions,
  ) {
    this.stale = options?.stale ?? STALE_MS;
    this.retries = options?.retries ?? MAX_RETRIES;
  }

  async runAsync<T>(fn: () => Promise<T>): Promise<T> {
    mkdirSync(dirname(this.path), { recursive: true });
    const asyncOpts: LockOptions = {
      stale: this.stale,
      realpath: false,
      retries: { retries: this.retries, minTimeout: RETRY_MS, maxTimeout: RETRY_MS, factor: 1 },
    };
    let release: () => Promise<void>;
    try {
      release = await lock(this.path, asyncOpts);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ELOCKED") {
        throw lockTimeoutError(this.name);
      }
      throw error;
    }
    try {
      return await fn();
    } finally {
      await release();
    }
  }
}
