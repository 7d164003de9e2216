import { afterEach, describe, expect, it, vi } from "vitest";

import { createConsoleLogger, formatWithTimestamp } from "@/lib/logging";

describe("logging", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes a leading string with the ISO timestamp", () => {
    const now = new Date("2024-05-01T12:34:56.789Z");
    expect(formatWithTimestamp(["hello", 42], now)).toEqual([
      "[2024-05-01T12:34:56.789Z] hello",
      42,
    ]);
  });

  it("keeps non-string first arguments as separate values", () => {
    const now = new Date("2024-05-01T00:00:00.000Z");
    const payload = { id: 1 };
    expect(formatWithTimestamp([payload], now)).toEqual([
      "[2024-05-01T00:00:00.000Z]",
      payload,
    ]);
    expect(formatWithTimestamp([], now)).toEqual(["[2024-05-01T00:00:00.000Z]"]);
  });

  it("writes scoped messages through the chosen console method", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    createConsoleLogger("harvest")("started");
    createConsoleLogger("harvest", "warn")("slow down");

    expect(info).toHaveBeenCalledWith("[harvest] started");
    expect(warn).toHaveBeenCalledWith("[harvest] slow down");
  });
});
