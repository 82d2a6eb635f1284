import { createWriteStream, renameSync, writeFileSync } from "node:fs";

export interface JsonlWriter {
  path: string;
  readonly count: number;
  append: (record: unknown) => void;
  close: () => Promise<void>;
}

/** Append-only JSON Lines file. Records are written in call order. */
export const createJsonlWriter = (path: string): JsonlWriter => {
  const stream = createWriteStream(path, { flags: "a" });
  let streamError: Error | null = null;
  let closed = false;
  let count = 0;

  stream.on("error", (error) => {
    streamError = error;
  });

  return {
    path,
    get count() {
      return count;
    },
    append: (record: unknown) => {
      if (closed) {
        throw new Error(`JSONL writer is closed: ${path}`);
      }
      if (streamError) {
        throw streamError;
      }
      stream.write(`${JSON.stringify(record)}\n`);
      count += 1;
    },
    close: () => {
      if (closed) {
        return Promise.resolve();
      }
      closed = true;
      if (streamError) {
        return Promise.reject(streamError);
      }
      return new Promise((resolve, reject) => {
        stream.once("error", reject);
        stream.end(() => {
          stream.off("error", reject);
          if (streamError) {
            reject(streamError);
            return;
          }
          resolve();
        });
      });
    }
  };
};

export const writeTextAtomic = (path: string, text: string): void => {
  const tmpPath = `${path}.tmp`;
  writeFileSync(tmpPath, text, "utf8");
  renameSync(tmpPath, path);
};

export const writeJsonAtomic = (path: string, data: unknown): void => {
  writeTextAtomic(path, `${JSON.stringify(data, null, 2)}\n`);
};
