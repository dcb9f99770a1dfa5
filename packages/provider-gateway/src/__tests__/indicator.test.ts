import pc from "picocolors";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createTerminalIndicator } from "../indicator.js";

describe("createTerminalIndicator", () => {
  const write = vi.fn();

  beforeEach(() => {
    vi.useFakeTimers();
    write.mockClear();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("draws after the delay with a countdown and clears the line on stop", () => {
    const indicator = createTerminalIndicator({ stream: { write }, text: "evaluating", delayMs: 1000, intervalMs: 100 });
    const handle = indicator.begin("openai: waiting", 3000);

    vi.advanceTimersByTime(999);
    expect(write).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(write).toHaveBeenLastCalledWith(`\r${pc.cyan("⠋")} openai: waiting evaluating${pc.dim(" (2s)")}`);

    vi.advanceTimersByTime(100);
    expect(write).toHaveBeenLastCalledWith(`\r${pc.cyan("⠙")} openai: waiting evaluating${pc.dim(" (2s)")}`);

    handle.stop();
    handle.stop();
    expect(write).toHaveBeenLastCalledWith("\r\x1b[2K");
    expect(write).toHaveBeenCalledTimes(3);
  });

  it("never draws a wait shorter than the delay", () => {
    const indicator = createTerminalIndicator({ stream: { write }, delayMs: 1000 });
    const handle = indicator.begin("gemini: evaluating");

    vi.advanceTimersByTime(500);
    handle.stop();
    vi.advanceTimersByTime(5000);

    expect(write).not.toHaveBeenCalled();
  });

  it("omits the countdown for open-ended waits", () => {
    const indicator = createTerminalIndicator({ stream: { write }, delayMs: 0 });
    const handle = indicator.begin("dify: evaluating");

    vi.advanceTimersByTime(0);
    handle.stop();

    expect(write.mock.calls).toEqual([[`\r${pc.cyan("⠋")} dify: evaluating`], ["\r\x1b[2K"]]);
  });
});
