import { createReadStream } from "fs";
import { createInterface } from "readline";

export interface JsonlLine<T> {
  /** 1-based physical line number in the file. */
  lineNo: number;
  value: T;
}

/**
 * Stream-parse a JSONL file, yielding one parsed object per line along
 * with its line number. Silently skips blank lines and malformed JSON.
 * A file that vanishes before it is opened yields nothing.
 */
export async function* readJsonlLines<T = unknown>(
  filePath: string,
): AsyncGenerator<JsonlLine<T>> {
  const input = createReadStream(filePath, { encoding: "utf-8" });
  const opened = await new Promise<boolean>((resolve) => {
    input.once("open", () => resolve(true));
    input.once("error", () => resolve(false));
  });
  if (!opened) return;

  const rl = createInterface({ input, crlfDelay: Infinity });
  let lineNo = 0;
  try {
    for await (const line of rl) {
      lineNo++;
      const trimmed = line.trim();
      if (!trimmed) continue;
      try {
        yield { lineNo, value: JSON.parse(trimmed) as T };
      } catch {
        // Partial line from a session interrupted mid-write
      }
    }
  } finally {
    rl.close();
    input.destroy();
  }
}
