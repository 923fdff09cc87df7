import { UpstreamError } from "../errors.js";
import { agentChunkSchema, type AgentChunk } from "./types.js";

export const NDJSON_CONTENT_TYPE = "application/x-ndjson";

export function encodeChunk(chunk: AgentChunk): string {
  return `${JSON.stringify(chunk)}\n`;
}

function parseLine(line: string): AgentChunk {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    throw new UpstreamError("runtime", 200, "Agent runtime sent a malformed chunk", { cause: err });
  }
  const parsed = agentChunkSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UpstreamError("runtime", 200, "Agent runtime sent an unknown chunk");
  }
  return parsed.data;
}

interface ReadResult {
  readonly done: boolean;
  readonly value?: Uint8Array;
}

function readOrAbort(read: () => Promise<ReadResult>, signal?: AbortSignal): Promise<ReadResult> {
  if (!signal) return read();
  signal.throwIfAborted();
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    read().then(
      (result) => {
        signal.removeEventListener("abort", onAbort);
        resolve(result);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Lazily decodes an NDJSON body. Aborting `signal` ends the iteration with
 * the signal's reason; leaving early cancels the underlying body.
 */
export async function* decodeChunks(
  body: ReadableStream<Uint8Array>,
  signal?: AbortSignal,
): AsyncGenerator<AgentChunk, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let finished = false;

  try {
    for (;;) {
      const { done, value } = await readOrAbort(() => reader.read(), signal);
      if (done) {
        finished = true;
        break;
      }
      buffer += decoder.decode(value, { stream: true });

      let newline = buffer.indexOf("\n");
      while (newline >= 0) {
        const line = buffer.slice(0, newline).trim();
        buffer = buffer.slice(newline + 1);
        if (line) yield parseLine(line);
        newline = buffer.indexOf("\n");
      }
    }

    const rest = (buffer + decoder.decode()).trim();
    if (rest) yield parseLine(rest);
  } finally {
    if (!finished) await reader.cancel();
  }
}
