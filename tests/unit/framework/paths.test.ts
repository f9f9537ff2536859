import { describe, it, expect } from "vitest";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { fromRoot, LOGS_DIR, ROOT } from "../../../stack/framework/paths.js";

describe("ROOT", () => {
  it("is the directory holding package.json", () => {
    expect(existsSync(join(ROOT, "package.json"))).toBe(true);
  });
});

describe("fromRoot", () => {
  it("resolves relative paths against the project root", () => {
    expect(fromRoot("cookies")).toBe(join(ROOT, "cookies"));
  });

  it("leaves absolute paths alone", () => {
    expect(fromRoot("/tmp/sessions.db")).toBe("/tmp/sessions.db");
  });
});

describe("LOGS_DIR", () => {
  it("resolves to logs/ at project root", () => {
    expect(LOGS_DIR).toBe(join(ROOT, "logs"));
  });
});
