import { describe, it, expect, vi, afterEach } from "vitest";
import { createDefaultIO, emit, type MaintIO } from "../io.js";

describe("io", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("falls back to print when the sink lacks a channel", () => {
    const lines: string[] = [];
    emit({ print: (msg) => lines.push(msg) }, "warn", "careful");
    expect(lines).toEqual(["careful"]);
  });

  it("uses the matching channel when present", () => {
    const lines: string[] = [];
    const io: MaintIO = {
      print: (msg) => lines.push(`PRINT:${msg}`),
      success: (msg) => lines.push(`SUCCESS:${msg}`),
    };
    emit(io, "success", "done");
    expect(lines).toEqual(["SUCCESS:done"]);
  });

  it("prints uncoloured markers when colour is off", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    const io = createDefaultIO({ color: false });
    io.success?.("Cache flush complete.");
    io.error?.("Error deleting a.json: boom");
    expect(spy.mock.calls).toEqual([["✓ Cache flush complete."], ["x Error deleting a.json: boom"]]);
  });
});
