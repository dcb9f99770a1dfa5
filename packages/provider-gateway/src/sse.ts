/**
 * Reader for `text/event-stream` bodies.
 */

export interface SseEvent {
  /** Value of the `event:` field, when the frame had one */
  readonly event?: string;
  readonly data: string;
}

const DONE_MARKER = "[DONE]";

/**
 * Yield each dispatched event. Stops at end of stream, at a `[DONE]` data
 * frame, or as soon as `signal` is aborted. A trailing frame that lacks its
 * blank line is dispatched when the stream closes; after an abort nothing
 * more is yielded. Any exit before the natural end cancels the body.
 */
export async function* readSseEvents(
  body: ReadableStream<Uint8Array> | null,
  signal?: AbortSignal,
): AsyncGenerator<SseEvent> {
  if (!body) return;

  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let eventName: string | undefined;
  let dataLines: string[] = [];
  let ended = false;
  let cancelling: Promise<void> | undefined;

  // Unblocks a pending read
  const onAbort = () => {
    cancelling ??= reader.cancel(signal?.reason);
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    while (!signal?.aborted) {
      const { done, value } = await reader.read();
      if (signal?.aborted) return;
      // A closed stream terminates whatever frame is still open
      buffer += done ? "\n\n" : decoder.decode(value, { stream: true });

      let newline = buffer.indexOf("\n");
      while (newline >= 0) {
        const line = buffer.slice(0, newline).replace(/\r$/, "");
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf("\n");

        if (line === "") {
          if (dataLines.length > 0) {
            const data = dataLines.join("\n");
            if (data.trim() === DONE_MARKER) return;
            yield eventName === undefined ? { data } : { event: eventName, data };
            if (signal?.aborted) return;
          }
          eventName = undefined;
          dataLines = [];
          continue;
        }
        if (line.startsWith(":")) continue;

        const colon = line.indexOf(":");
        const field = colon < 0 ? line : line.slice(0, colon);
        const fieldValue = colon < 0 ? "" : line.slice(colon + 1).replace(/^ /, "");
        if (field === "data") dataLines.push(fieldValue);
        else if (field === "event") eventName = fieldValue;
      }

      if (done) {
        ended = true;
        break;
      }
    }
  } finally {
    signal?.removeEventListener("abort", onAbort);
    if (!ended) cancelling ??= reader.cancel();
    try {
      await cancelling;
    } finally {
      reader.releaseLock();
    }
  }
}

/** Parse a data payload as JSON; malformed frames yield undefined. */
export function parseSseJson(data: string): unknown {
  try {
    const parsed: unknown = JSON.parse(data);
    return parsed;
  } catch {
    return undefined;
  }
}
