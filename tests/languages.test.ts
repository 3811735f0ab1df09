import { describe, it, expect } from "vitest";
import {
  canExtractSymbols,
  detectLanguage,
  PARSEABLE_EXTENSIONS,
} from "../src/languages.js";

describe("languages", () => {
  it("detects languages by extension", () => {
    expect(detectLanguage("pkg/mod.py")).toBe("python");
    expect(detectLanguage("tools/run.PYW")).toBe("python");
    expect(detectLanguage("src/app.tsx")).toBe("typescript");
    expect(detectLanguage("src/app.mjs")).toBe("javascript");
    expect(detectLanguage("docs/readme.md")).toBe("markdown");
    expect(detectLanguage("Makefile")).toBe("unknown");
  });

  it("reports which languages yield symbols", () => {
    expect(canExtractSymbols("python")).toBe(true);
    expect(canExtractSymbols("typescript")).toBe(true);
    expect(canExtractSymbols("javascript")).toBe(true);
    expect(canExtractSymbols("markdown")).toBe(false);
    expect(canExtractSymbols("unknown")).toBe(false);
  });

  it("lists parseable extensions", () => {
    expect(PARSEABLE_EXTENSIONS).toEqual([
      ".py",
      ".pyw",
      ".ts",
      ".tsx",
      ".mts",
      ".cts",
      ".js",
      ".jsx",
      ".mjs",
      ".cjs",
    ]);
  });
});
