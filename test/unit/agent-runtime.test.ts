import { describe, it, expect, vi } from "vitest";
import { AgentInvocationClient } from "../../src/agent/client.js";
import { GatewayClient } from "../../src/agent/gateway-client.js";
import { IntentReasoner } from "../../src/agent/reasoner.js";
import { createRuntimeApp } from "../../src/agent/runtime.js";
import type { AgentChunk } from "../../src/agent/types.js";
import {
  AuthorizationError,
  InvocationCancelled,
  OperationTimeoutError,
  TokenRejectedError,
  UpstreamError,
} from "../../src/errors.js";
import { toHeaders, type PropagationContext } from "../../src/identity/propagation.js";
import { TokenVerifier } from "../../src/identity/verifier.js";
import { toolSuccess } from "../../src/tools/result.js";
import type { FetchFn } from "../../src/utils/http.js";
import {
  TEST_ISSUER,
  TEST_SECRET,
  fetchVia,
  ndjsonBody,
  signedContext,
  silentLogger,
} from "../helpers/fixtures.js";

const RESULT = toolSuccess(
  "inventory_check",
  { columns: [{ name: "product_id", type: "string" }], rows: [["P100"]], rowCount: 1 },
  3,
);
const SUMMARY = "Here is the inventory status:\n\n| product_id |\n| --- |\n| P100 |\n\nSource: inventory_check";

function setup(callTool: GatewayClient["callTool"] = async () => RESULT) {
  const gateway = { callTool: vi.fn<GatewayClient["callTool"]>(callTool) };
  const app = createRuntimeApp({
    verifier: new TokenVerifier({ secret: TEST_SECRET, issuer: TEST_ISSUER, cacheTtlMs: 0 }),
    reasoner: new IntentReasoner(),
    gateway,
    logger: silentLogger(),
    maxIterations: 4,
  });
  return { app, gateway };
}

function invoke(app: ReturnType<typeof setup>["app"], ctx: PropagationContext | null, body: unknown) {
  return app.request("/invocations", {
    method: "POST",
    headers: { "content-type": "application/json", ...(ctx ? toHeaders(ctx) : {}) },
    body: JSON.stringify(body),
  });
}

function parseNdjson(text: string): unknown[] {
  return text
    .split("\n")
    .filter(Boolean)
    .map((line): unknown => JSON.parse(line));
}

async function collect(iterable: AsyncIterable<AgentChunk>): Promise<AgentChunk[]> {
  const chunks: AgentChunk[] = [];
  for await (const chunk of iterable) chunks.push(chunk);
  return chunks;
}

describe("runtime app", () => {
  it("requires identity headers", async () => {
    const { app } = setup();
    const res = await invoke(app, null, { message: "hi" });
    expect(res.status).toBe(401);
  });

  it("refuses a forged role before running the turn", async () => {
    const { app, gateway } = setup();
    const res = await invoke(app, await signedContext("analyst", "manager"), { message: "top customers" });

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      error: {
        code: "authorization_denied",
        message: "Declared role 'manager' does not match the access token role 'analyst'",
      },
    });
    expect(gateway.callTool).not.toHaveBeenCalled();
  });

  it("rejects an empty message", async () => {
    const { app } = setup();
    const res = await invoke(app, await signedContext("analyst"), { message: "   " });
    expect(res.status).toBe(400);
  });

  it("answers a complete invocation", async () => {
    const { app } = setup();
    const ctx = await signedContext("analyst");

    const res = await invoke(app, ctx, { message: "inventory for WH001" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ requestId: "req-1", text: SUMMARY, toolResults: [RESULT] });
  });

  it("streams chunks as NDJSON", async () => {
    const { app } = setup();
    const res = await invoke(app, await signedContext("analyst"), { message: "inventory for WH001", stream: true });

    expect(res.headers.get("content-type")).toBe("application/x-ndjson");
    expect(parseNdjson(await res.text())).toEqual([
      { type: "tool_call", toolName: "inventory_check", arguments: { warehouse_id: "WH001" } },
      { type: "tool_result", result: RESULT },
      { type: "text", text: SUMMARY },
      { type: "done" },
    ]);
  });

  it("ends a stream with an error chunk when the turn fails", async () => {
    const { app } = setup(async () => {
      throw new TokenRejectedError("Tool gateway rejected the access token");
    });
    const res = await invoke(app, await signedContext("analyst"), { message: "inventory for WH001", stream: true });

    expect(parseNdjson(await res.text())).toEqual([
      { type: "tool_call", toolName: "inventory_check", arguments: { warehouse_id: "WH001" } },
      { type: "error", code: "token_rejected", message: "Tool gateway rejected the access token" },
    ]);
  });

  it("maps a failed complete invocation to its status", async () => {
    const { app } = setup(async () => {
      throw new TokenRejectedError("Tool gateway rejected the access token");
    });
    const res = await invoke(app, await signedContext("analyst"), { message: "inventory for WH001" });
    expect(res.status).toBe(401);
  });
});

describe("AgentInvocationClient", () => {
  function client(fetchFn: FetchFn, invokeTimeoutMs = 5_000) {
    return new AgentInvocationClient("http://runtime.test", silentLogger(), { invokeTimeoutMs, fetchFn });
  }

  it("returns a complete answer", async () => {
    const { app } = setup();
    const response = await client(fetchVia(app)).invoke("inventory for WH001", await signedContext("analyst"));

    expect(response).toEqual({ kind: "complete", requestId: "req-1", text: SUMMARY, toolResults: [RESULT] });
  });

  it("streams chunks lazily", async () => {
    const { app } = setup();
    const response = await client(fetchVia(app)).invoke("inventory for WH001", await signedContext("analyst"), {
      stream: true,
    });

    expect(response.kind).toBe("stream");
    expect((await collect(response)).map((c) => c.type)).toEqual(["tool_call", "tool_result", "text", "done"]);
  });

  it("can be consumed only once", async () => {
    const { app } = setup();
    const response = await client(fetchVia(app)).invoke("hi", await signedContext("analyst"), { stream: true });

    await collect(response);
    expect(() => response[Symbol.asyncIterator]()).toThrow("Agent response stream can only be consumed once");
  });

  it("maps 401 and 403 answers", async () => {
    const { app } = setup();
    const ctx = await signedContext("analyst");

    await expect(
      client(fetchVia(app)).invoke("hi", { ...ctx, accessToken: "not-a-jwt" }),
    ).rejects.toBeInstanceOf(TokenRejectedError);
    await expect(
      client(fetchVia(app)).invoke("hi", await signedContext("analyst", "manager")),
    ).rejects.toBeInstanceOf(AuthorizationError);
  });

  it("times out a silent runtime", async () => {
    const hanging: FetchFn = (_input, init) =>
      new Promise<Response>((_, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });

    await expect(client(hanging, 20).invoke("hi", await signedContext("analyst"))).rejects.toThrow(
      new OperationTimeoutError("invoke", 20),
    );
  });

  it("refuses to start under an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchFn = vi.fn<FetchFn>();

    await expect(
      client(fetchFn).invoke("hi", await signedContext("analyst"), { signal: controller.signal }),
    ).rejects.toBeInstanceOf(InvocationCancelled);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("stops a stream on cancel", async () => {
    let bodyCancelled = false;
    const fetchFn: FetchFn = async () =>
      new Response(
        ndjsonBody(['{"type":"tool_call","toolName":"sales_trend","arguments":{}}\n'], {
          close: false,
          onCancel: () => {
            bodyCancelled = true;
          },
        }),
        { status: 200 },
      );
    const response = await client(fetchFn).invoke("sales", await signedContext("analyst"), { stream: true });
    const seen: AgentChunk[] = [];

    const consume = (async () => {
      for await (const chunk of response) {
        seen.push(chunk);
        response.cancel();
      }
    })();

    await expect(consume).rejects.toBeInstanceOf(InvocationCancelled);
    expect(seen).toHaveLength(1);
    expect(bodyCancelled).toBe(true);
  });

  it("reports an unreachable runtime", async () => {
    const fetchFn: FetchFn = async () => {
      throw new TypeError("fetch failed");
    };
    const err = await client(fetchFn)
      .invoke("hi", await signedContext("analyst"))
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({ status: 0, message: "Agent runtime is unreachable" });
  });
});
