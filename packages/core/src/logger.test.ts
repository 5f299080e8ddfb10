import { afterEach, describe, it, expect, vi } from "vitest";
import { createLogger, getLogLevel, setLogLevel } from "./logger.js";

describe("createLogger", () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it("writes scoped lines with redacted fields", () => {
    setLogLevel("info");
    const out = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

    createLogger("ingest").info("document indexed", { documentId: "doc-1", token: "test-secret" });

    expect(out).toHaveBeenCalledTimes(1);
    const line = String(out.mock.calls[0]?.[0]);
    expect(line).toMatch(/^\[.+\] \[INFO\] \[ingest\] document indexed /);
    expect(line.endsWith(' {"documentId":"doc-1","token":"[REDACTED]"}\n')).toBe(true);
  });

  it("sends warnings to stderr and drops lines below the level", () => {
    setLogLevel("warn");
    const out = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const err = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const log = createLogger("ask");

    log.info("ignored");
    log.warn("refused");

    expect(out).not.toHaveBeenCalled();
    expect(err).toHaveBeenCalledTimes(1);
    expect(String(err.mock.calls[0]?.[0])).toContain("[WARN] [ask] refused");
  });

  it("is quiet when silent", () => {
    setLogLevel("silent");
    const err = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    createLogger("ask").error("boom");

    expect(err).not.toHaveBeenCalled();
  });
});
