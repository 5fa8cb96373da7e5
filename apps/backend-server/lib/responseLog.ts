import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { DataClass } from "common/portfolio";

/** Keeps the latest raw provider response per (kind, symbol) for debugging. */
export interface ResponseLog {
  /** Must return immediately and never throw. */
  record(kind: DataClass, symbol: string, body: unknown): void;
}

export const noopResponseLog: ResponseLog = {
  record() {},
};

/**
 * Each body goes to its own temp file and is renamed over the target, so
 * overlapping writes for one symbol leave a single complete response.
 */
export function createFileResponseLog(dir: string): ResponseLog {
  let seq = 0;
  return {
    record(kind, symbol, body) {
      const file = path.join(dir, `${kind}_${symbol}.json`);
      const tmp = `${file}.${process.pid}.${seq++}.tmp`;
      void Promise.resolve()
        .then(async () => {
          await mkdir(dir, { recursive: true });
          try {
            await writeFile(tmp, JSON.stringify(body, null, 2));
            await rename(tmp, file);
          } catch (err) {
            await rm(tmp, { force: true });
            throw err;
          }
        })
        .catch((err: unknown) => {
          console.warn(
            "[response-log] Failed to write",
            file,
            err instanceof Error ? err.message : err
          );
        });
    },
  };
}
