import { describe, it, expect } from "vitest";
import { decodeChunks, encodeChunk } from "../../src/agent/stream.js";
import type { AgentChunk } from "../../src/agent/types.js";
import { InvocationCancelled, UpstreamError } from "../../src/errors.js";
import { ndjsonBody } from "../helpers/fixtures.js";

async function collect(iterable: AsyncIterable<AgentChunk>): Promise<AgentChunk[]> {
  const chunks: AgentChunk[] = [];
  for await (const chunk of iterable) chunks.push(chunk);
  return chunks;
}

describe("encodeChunk", () => {
  it("writes one JSON object per line", () => {
    expect(encodeChunk({ type: "text", text: "hi" })).toBe('{"type":"text","text":"hi"}\n');
  });
});

describe("decodeChunks", () => {
  it("reassembles lines split across reads", async () => {
    const body = ndjsonBody(['{"type":"te', 'xt","text":"a"}\n{"type":"do', 'ne"}\n']);
    expect(await collect(decodeChunks(body))).toEqual([{ type: "text", text: "a" }, { type: "done" }]);
  });

  it("decodes a final line without a newline and skips blank lines", async () => {
    const body = ndjsonBody(['\n{"type":"text","text":"a"}\n\n', '{"type":"done"}']);
    expect(await collect(decodeChunks(body))).toEqual([{ type: "text", text: "a" }, { type: "done" }]);
  });

  it("rejects malformed JSON", async () => {
    const body = ndjsonBody(["{not json\n"]);
    await expect(collect(decodeChunks(body))).rejects.toThrow(
      new UpstreamError("runtime", 200, "Agent runtime sent a malformed chunk"),
    );
  });

  it("rejects chunks of an unknown type", async () => {
    const body = ndjsonBody(['{"type":"telemetry"}\n']);
    await expect(collect(decodeChunks(body))).rejects.toThrow("Agent runtime sent an unknown chunk");
  });

  it("stops with the abort reason and cancels the body", async () => {
    let cancelled = false;
    const body = ndjsonBody(['{"type":"text","text":"first"}\n'], {
      close: false,
      onCancel: () => {
        cancelled = true;
      },
    });
    const controller = new AbortController();
    const seen: AgentChunk[] = [];

    const run = (async () => {
      for await (const chunk of decodeChunks(body, controller.signal)) {
        seen.push(chunk);
        controller.abort(new InvocationCancelled());
      }
    })();

    await expect(run).rejects.toBeInstanceOf(InvocationCancelled);
    expect(seen).toEqual([{ type: "text", text: "first" }]);
    expect(cancelled).toBe(true);
  });

  it("cancels the body when the consumer stops early", async () => {
    let cancelled = false;
    const body = ndjsonBody(['{"type":"text","text":"a"}\n{"type":"text","text":"b"}\n'], {
      close: false,
      onCancel: () => {
        cancelled = true;
      },
    });

    for await (const chunk of decodeChunks(body)) {
      expect(chunk).toEqual({ type: "text", text: "a" });
      break;
    }
    expect(cancelled).toBe(true);
  });
});
