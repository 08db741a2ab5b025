import { describe, it, expect } from "vitest";
import { createParser, createParsers } from "./registry.js";
import { TOOL_NAMES } from "./types.js";
import { TOOL_PATHS } from "../utils/paths.js";

describe("createParser", () => {
  it.each(TOOL_NAMES)("builds the %s parser on its default root", (tool) => {
    const parser = createParser(tool);
    expect(parser.name).toBe(tool);
    expect(parser.basePath).toBe(TOOL_PATHS[tool]);
  });

  it("uses a supplied root", () => {
    expect(createParser("cursor", "/data/state.vscdb").basePath).toBe("/data/state.vscdb");
  });
});

describe("createParsers", () => {
  it("keeps the requested order and per-tool roots", () => {
    const parsers = createParsers(["opencode", "codex"], { codex: "/custom/codex" });
    expect(parsers.map((p) => [p.name, p.basePath])).toEqual([
      ["opencode", TOOL_PATHS.opencode],
      ["codex", "/custom/codex"],
    ]);
  });
});
