import pc from "picocolors";
import type { WaitHandle, WaitObserver } from "./wait.js";

const FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"] as const;

/** Anything with a `write`, e.g. process.stderr */
export interface IndicatorStream {
  write(chunk: string): unknown;
}

export interface TerminalIndicatorOptions {
  readonly stream?: IndicatorStream;
  /** Appended after the label */
  readonly text?: string;
  /** Nothing is drawn for waits shorter than this. Default: 1000 */
  readonly delayMs?: number;
  readonly intervalMs?: number;
  readonly now?: () => number;
}

/**
 * Spinner on a single terminal line, with a countdown when the wait has a
 * known duration. Cleared on `stop()`.
 */
export function createTerminalIndicator(options: TerminalIndicatorOptions = {}): WaitObserver {
  const stream = options.stream ?? process.stderr;
  const delayMs = options.delayMs ?? 1000;
  const intervalMs = options.intervalMs ?? 100;
  const now = options.now ?? Date.now;

  return {
    begin(label: string, durationMs?: number): WaitHandle {
      const startedAt = now();
      let frame = 0;
      let shown = false;
      let stopped = false;
      let ticker: ReturnType<typeof setInterval> | undefined;

      const render = (): void => {
        const glyph = FRAMES[frame % FRAMES.length] ?? "*";
        frame += 1;
        const suffix = options.text ? ` ${options.text}` : "";
        const countdown =
          durationMs === undefined
            ? ""
            : pc.dim(` (${Math.max(0, Math.ceil((durationMs - (now() - startedAt)) / 1000))}s)`);
        stream.write(`\r${pc.cyan(glyph)} ${label}${suffix}${countdown}`);
        shown = true;
      };

      const delay = setTimeout(() => {
        if (stopped) return;
        render();
        ticker = setInterval(render, intervalMs);
      }, delayMs);

      return {
        stop(): void {
          if (stopped) return;
          stopped = true;
          clearTimeout(delay);
          if (ticker !== undefined) clearInterval(ticker);
          if (shown) stream.write("\r\x1b[2K");
        },
      };
    },
  };
}
