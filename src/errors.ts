export type SessionSearchErrorCode =
  | "storage_unavailable"
  | "no_matches"
  | "invalid_selection"
  | "export_write_failure"
  | "invalid_config";

const EXIT_CODES: Record<SessionSearchErrorCode, number> = {
  no_matches: 1,
  invalid_selection: 2,
  invalid_config: 2,
  storage_unavailable: 3,
  export_write_failure: 4,
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Whole-run failure. Carries a machine-readable code alongside the human
 * message; the CLI maps the code to a process exit status.
 *
 * Unit-level problems (a malformed line, an orphaned fragment) never
 * become one of these; parsers skip them and the engine counts them.
 */
export class SessionSearchError extends Error {
  readonly code: SessionSearchErrorCode;

  constructor(code: SessionSearchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SessionSearchError";
    this.code = code;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

export class StorageUnavailableError extends SessionSearchError {
  readonly tools: string[];

  constructor(tools: string[]) {
    super("storage_unavailable", `No storage found for: ${tools.join(", ")}`);
    this.name = "StorageUnavailableError";
    this.tools = tools;
  }
}

export class NoMatchesError extends SessionSearchError {
  constructor(query: string) {
    super("no_matches", `No matches found for ${JSON.stringify(query)}`);
    this.name = "NoMatchesError";
  }
}

export class InvalidSelectionError extends SessionSearchError {
  readonly input: string;

  constructor(input: string, count: number) {
    super(
      "invalid_selection",
      /^\d+$/.test(input.trim())
        ? `Selection out of range: ${input.trim()} (expected 1-${count})`
        : `Invalid selection (expected a number): ${JSON.stringify(input)}`,
    );
    this.name = "InvalidSelectionError";
    this.input = input;
  }
}

export class ExportWriteError extends SessionSearchError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("export_write_failure", errorMessage(cause), { cause });
    this.name = "ExportWriteError";
    this.path = path;
  }
}

export class InvalidConfigError extends SessionSearchError {
  constructor(message: string) {
    super("invalid_config", message);
    this.name = "InvalidConfigError";
  }
}
