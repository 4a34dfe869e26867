import { describe, it, expect } from "vitest";
import { formatLine, resolveLogLevel, serializeError } from "../src/utils/logger.js";

describe("logger", () => {
  it("defaults to warn and ignores unknown levels", () => {
    expect(resolveLogLevel(undefined)).toBe("warn");
    expect(resolveLogLevel("DEBUG")).toBe("debug");
    expect(resolveLogLevel("verbose")).toBe("warn");
  });

  it("drops undefined metadata", () => {
    const at = new Date("2026-01-01T00:00:00.000Z");
    expect(formatLine("warn", "policy ignored", { path: "p.yml", extra: undefined }, at)).toBe(
      '2026-01-01T00:00:00.000Z [WARN] policy ignored {"path":"p.yml"}'
    );
    expect(formatLine("info", "done", { skipped: undefined }, at)).toBe(
      "2026-01-01T00:00:00.000Z [INFO] done"
    );
  });

  it("serializes errors and plain values", () => {
    const payload = serializeError(new TypeError("boom"));
    expect(payload).toMatchObject({ name: "TypeError", message: "boom" });
    expect(serializeError("text")).toEqual({ message: "text" });
  });
});
