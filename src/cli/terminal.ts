import { createInterface } from "readline";
import type { Readable, Writable } from "stream";

/** Line-oriented I/O for the candidate list and the selection prompt. */
export interface Terminal {
  print(line: string): void;
  /** One line of input; resolves to "" once input has ended. */
  readLine(prompt: string): Promise<string>;
  close(): void;
}

/**
 * Lines are collected from the moment the terminal exists, so input that
 * arrives before its prompt (piped, or typed ahead during the scan) is
 * answered in order rather than lost.
 */
export function createTerminal(
  input: Readable = process.stdin,
  output: Writable = process.stdout,
): Terminal {
  const rl = createInterface({ input, terminal: false });
  const queued: string[] = [];
  const waiting: ((line: string) => void)[] = [];
  let ended = false;

  rl.on("line", (line) => {
    const next = waiting.shift();
    if (next) next(line);
    else queued.push(line);
  });
  rl.on("close", () => {
    ended = true;
    for (const resolve of waiting.splice(0)) resolve("");
  });

  return {
    print(line) {
      output.write(`${line}\n`);
    },

    readLine(prompt) {
      output.write(prompt);
      const line = queued.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (ended) return Promise.resolve("");
      return new Promise((resolve) => waiting.push(resolve));
    },

    close() {
      rl.close();
    },
  };
}
