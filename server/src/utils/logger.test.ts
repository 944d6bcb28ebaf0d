import { createLogger, formatLine } from "./logger";

describe("logger", () => {
  const time = new Date("2026-01-02T03:04:05.000Z");

  it("prefixes the message with its context", () => {
    expect(formatLine("INFO", { sessionId: "abc", group: undefined }, ["Added", { count: 1 }], time)).toBe(
      '[2026-01-02T03:04:05.000Z] [INFO] sessionId=abc Added {"count":1}'
    );
  });

  it("writes the stack of errors", () => {
    const err = new Error("boom");
    err.stack = "Error: boom\n    at test";

    expect(formatLine("ERROR", {}, ["Failed:", err], time)).toBe(
      "[2026-01-02T03:04:05.000Z] [ERROR] Failed: Error: boom\n    at test"
    );
  });

  it("merges context into child loggers", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});

    createLogger({ sessionId: "abc" }).child({ group: 2 }).info("Stored voucher image");

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0]?.[0]).toMatch(/\[INFO\] sessionId=abc group=2 Stored voucher image$/);
    info.mockRestore();
  });
});
