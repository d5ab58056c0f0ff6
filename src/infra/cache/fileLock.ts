import { open, stat, unlink, type FileHandle } from "node:fs/promises";
import type { ClockPort, SleepPort } from "../../core/ports/outboundPorts";

export type FileLockOptions = {
  timeoutMs: number;
  retryDelayMs?: number;
  staleAfterMs?: number;
};

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

/**
 * Cross-process lock held as `<path>.lock`, created with O_CREAT | O_EXCL.
 * A lock file older than `staleAfterMs` is treated as abandoned and reclaimed.
 */
export class FileLock {
  private readonly lockPath: string;
  private handle: FileHandle | null = null;

  constructor(
    targetPath: string,
    private readonly options: FileLockOptions,
    private readonly sleeper: SleepPort,
    private readonly clock: ClockPort,
  ) {
    this.lockPath = `${targetPath}.lock`;
  }

  get path(): string {
    return this.lockPath;
  }

  async acquire(): Promise<void> {
    if (this.handle) {
      throw new Error(`Lock ${this.lockPath} is already held.`);
    }

    const retryDelayMs = this.options.retryDelayMs ?? 50;
    const staleAfterMs = this.options.staleAfterMs ?? 60_000;
    const startedAt = this.clock.now().getTime();

    for (;;) {
      let handle: FileHandle | null = null;
      try {
        handle = await open(this.lockPath, "wx");
      } catch (error) {
        if (!isErrnoException(error) || error.code !== "EEXIST") {
          throw error;
        }
      }

      if (handle) {
        this.handle = handle;
        try {
          await handle.writeFile(
            JSON.stringify({
              pid: process.pid,
              acquiredAt: this.clock.now().toISOString(),
            }),
          );
        } catch (error) {
          await this.release();
          throw error;
        }
        return;
      }

      if (await this.reclaimIfStale(staleAfterMs)) {
        continue;
      }

      if (this.clock.now().getTime() - startedAt >= this.options.timeoutMs) {
        throw new Error(
          `Timed out after ${this.options.timeoutMs}ms waiting for ${this.lockPath}.`,
        );
      }

      await this.sleeper.sleep(retryDelayMs);
    }
  }

  async release(): Promise<void> {
    const handle = this.handle;
    this.handle = null;

    if (handle) {
      await handle.close();
    }

    try {
      await unlink(this.lockPath);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== "ENOENT") {
        throw error;
      }
    }
  }

  /**
   * Runs `work` while holding the lock.
   */
  async withLock<T>(work: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await work();
    } finally {
      await this.release();
    }
  }

  private async reclaimIfStale(staleAfterMs: number): Promise<boolean> {
    try {
      const info = await stat(this.lockPath);
      if (this.clock.now().getTime() - info.mtimeMs < staleAfterMs) {
        return false;
      }

      await unlink(this.lockPath);
      return true;
    } catch (error) {
      // Lock vanished between the failed open and stat/unlink; retry now.
      if (isErrnoException(error) && error.code === "ENOENT") {
        return true;
      }
      throw error;
    }
  }
}
