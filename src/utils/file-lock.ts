import * as lockfile from "proper-lockfile";

/**
 * Runs `fn` while holding an advisory lock beside `filePath`. The file itself
 * does not need to exist yet.
 */
export async function withFileLock<T>(filePath: string, fn: () => T | Promise<T>): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: { retries: 5, minTimeout: 50 },
      stale: 10_000,
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}
