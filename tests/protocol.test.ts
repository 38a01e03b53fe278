import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import {
  FrameDecoder,
  decodeFrames,
  decodeLine,
  encodeCommand,
  nextRequestId,
  type FrameDecodeResult,
} from "../src/protocol.js";
import type { AgentMessage } from "../src/types.js";

function messagesOf(result: FrameDecodeResult | undefined): AgentMessage[] {
  if (!result?.ok) throw new Error("expected a decoded frame");
  return result.messages;
}

function errorOf(result: FrameDecodeResult | undefined): string {
  if (!result || result.ok) throw new Error("expected a decode error");
  expect(result.error.code).toBe("PROTOCOL_DECODE");
  return result.error.message;
}

describe("encodeCommand", () => {
  it("renders a prompt as exactly one line", () => {
    const line = encodeCommand({ type: "prompt", text: "first\nsecond" });

    expect(line.endsWith("\n")).toBe(true);
    expect(line.split("\n")).toHaveLength(2);
    expect(JSON.parse(line)).toEqual({
      type: "user",
      message: { role: "user", content: "first\nsecond" },
      parent_tool_use_id: null,
      session_id: "default",
    });
  });

  it("carries the agent session id when known", () => {
    const line = encodeCommand({ type: "prompt", text: "hi", agentSessionId: "agent-7" });
    expect(JSON.parse(line).session_id).toBe("agent-7");
  });

  it("renders init and interrupt as control requests", () => {
    expect(JSON.parse(encodeCommand({ type: "init", requestId: "req_a" }))).toEqual({
      type: "control_request",
      request_id: "req_a",
      request: { subtype: "initialize", hooks: null },
    });
    expect(JSON.parse(encodeCommand({ type: "interrupt", requestId: "req_b" }))).toEqual({
      type: "control_request",
      request_id: "req_b",
      request: { subtype: "interrupt" },
    });
  });

  it("renders control responses", () => {
    const ok = encodeCommand({
      type: "control_response",
      requestId: "req_c",
      ok: true,
      response: { behavior: "allow", updatedInput: {} },
    });
    expect(JSON.parse(ok)).toEqual({
      type: "control_response",
      response: { subtype: "success", request_id: "req_c", response: { behavior: "allow", updatedInput: {} } },
    });

    const failed = encodeCommand({ type: "control_response", requestId: "req_d", ok: false, error: "nope" });
    expect(JSON.parse(failed)).toEqual({
      type: "control_response",
      response: { subtype: "error", request_id: "req_d", error: "nope" },
    });
  });

  it("generates distinct request ids", () => {
    const a = nextRequestId();
    const b = nextRequestId();
    expect(a).toMatch(/^req_\d+_[A-Za-z0-9_-]{8}$/);
    expect(a).not.toBe(b);
  });
});

describe("decodeLine", () => {
  it("splits assistant content into text and tool uses", () => {
    const messages = messagesOf(
      decodeLine(
        JSON.stringify({
          type: "assistant",
          message: {
            model: "test-model",
            content: [
              { type: "text", text: "Reading the file." },
              { type: "tool_use", id: "toolu_1", name: "Read", input: { path: "a.txt" } },
            ],
          },
          parent_tool_use_id: null,
        }),
      ),
    );

    expect(messages).toEqual([
      { type: "assistant", model: "test-model", content: [{ kind: "text", text: "Reading the file." }] },
      { type: "tool_use", toolUseId: "toolu_1", name: "Read", input: { path: "a.txt" } },
    ]);
  });

  it("emits only tool uses when the assistant sent no text", () => {
    const messages = messagesOf(
      decodeLine(
        JSON.stringify({
          type: "assistant",
          message: { content: [{ type: "tool_use", id: "toolu_2", name: "Bash" }] },
          parent_tool_use_id: "toolu_parent",
        }),
      ),
    );

    expect(messages).toEqual([
      { type: "tool_use", toolUseId: "toolu_2", name: "Bash", input: {}, parentToolUseId: "toolu_parent" },
    ]);
  });

  it("decodes user tool results", () => {
    const messages = messagesOf(
      decodeLine(
        JSON.stringify({
          type: "user",
          message: {
            role: "user",
            content: [{ type: "tool_result", tool_use_id: "toolu_1", content: "contents", is_error: false }],
          },
        }),
      ),
    );

    expect(messages).toEqual([
      { type: "tool_result", toolUseId: "toolu_1", content: "contents", isError: false },
    ]);
  });

  it("decodes system frames with the remaining fields as data", () => {
    const messages = messagesOf(
      decodeLine(JSON.stringify({ type: "system", subtype: "init", session_id: "s1", model: "m" })),
    );
    expect(messages).toEqual([{ type: "system", subtype: "init", data: { session_id: "s1", model: "m" } }]);
  });

  it("decodes result frames", () => {
    const messages = messagesOf(
      decodeLine(
        JSON.stringify({
          type: "result",
          subtype: "success",
          is_error: false,
          num_turns: 3,
          duration_ms: 1500,
          total_cost_usd: 0.02,
          result: "done",
          session_id: "agent-1",
        }),
      ),
    );

    expect(messages).toEqual([
      {
        type: "result",
        subtype: "success",
        isError: false,
        numTurns: 3,
        durationMs: 1500,
        totalCostUsd: 0.02,
        result: "done",
        agentSessionId: "agent-1",
      },
    ]);
  });

  it("rejects a result frame without a valid turn count", () => {
    const message = errorOf(decodeLine(JSON.stringify({ type: "result", subtype: "success", num_turns: -1 })));
    expect(message).toBe("Malformed frame: result.num_turns: expected non-negative integer");
  });

  it("decodes permission requests", () => {
    const messages = messagesOf(
      decodeLine(
        JSON.stringify({
          type: "control_request",
          request_id: "req_9",
          request: { subtype: "can_use_tool", tool_name: "Bash", input: { command: "ls" }, tool_use_id: "toolu_9" },
        }),
      ),
    );

    expect(messages).toEqual([
      {
        type: "control_request",
        requestId: "req_9",
        request: { subtype: "can_use_tool", toolName: "Bash", input: { command: "ls" }, toolUseId: "toolu_9" },
      },
    ]);
  });

  it("keeps a control request with a bad body so it can be answered", () => {
    const messages = messagesOf(
      decodeLine(
        JSON.stringify({
          type: "control_request",
          request_id: "req_10",
          request: { subtype: "can_use_tool", tool_name: "Bash" },
        }),
      ),
    );

    expect(messages).toEqual([
      {
        type: "control_request",
        requestId: "req_10",
        request: {
          subtype: "malformed",
          error: "control_request.can_use_tool.input: expected object",
          raw: { subtype: "can_use_tool", tool_name: "Bash" },
        },
      },
    ]);
  });

  it("rejects a control request without a request id", () => {
    const message = errorOf(decodeLine(JSON.stringify({ type: "control_request", request: {} })));
    expect(message).toBe("Malformed frame: control_request.request_id: expected string");
  });

  it("rejects control responses with an unknown subtype", () => {
    const message = errorOf(
      decodeLine(JSON.stringify({ type: "control_response", response: { subtype: "maybe", request_id: "r" } })),
    );
    expect(message).toBe('Malformed frame: control_response.response.subtype: unexpected "maybe"');
  });

  it("passes unknown frame types through", () => {
    const messages = messagesOf(decodeLine(JSON.stringify({ type: "telemetry", value: 1 })));
    expect(messages).toEqual([{ type: "unknown", frameType: "telemetry", raw: { type: "telemetry", value: 1 } }]);
  });

  it("rejects non-JSON and non-object frames", () => {
    expect(errorOf(decodeLine("not json"))).toMatch(/^Malformed frame: /);
    expect(errorOf(decodeLine("[1,2]"))).toBe("Malformed frame: expected a JSON object");
    expect(errorOf(decodeLine("{}"))).toBe("Malformed frame: frame.type: expected string");
  });
});

describe("FrameDecoder", () => {
  it("reassembles a frame split across chunks", () => {
    const decoder = new FrameDecoder();

    expect(decoder.push('{"type":"sys')).toEqual([]);
    expect(decoder.hasPartialFrame).toBe(true);

    const results = decoder.push('tem","subtype":"x"}\n');
    expect(results).toHaveLength(1);
    expect(messagesOf(results[0])).toEqual([{ type: "system", subtype: "x", data: {} }]);
    expect(decoder.hasPartialFrame).toBe(false);
  });

  it("reassembles a multi-byte character split across buffers", () => {
    const bytes = Buffer.from('{"type":"user","message":{"role":"user","content":"café"}}\n', "utf8");
    const split = bytes.indexOf(0xc3) + 1;
    const decoder = new FrameDecoder();

    expect(decoder.push(bytes.subarray(0, split))).toEqual([]);
    const results = decoder.push(bytes.subarray(split));
    expect(messagesOf(results[0])).toEqual([{ type: "user", text: "café" }]);
  });

  it("isolates a malformed frame between good ones", () => {
    const decoder = new FrameDecoder();
    const results = decoder.push('{"type":"system"}\nnot json\n\n   \n{"type":"system","subtype":"b"}\n');

    expect(results.map((r) => r.ok)).toEqual([true, false, true]);
    expect(messagesOf(results[0])).toEqual([{ type: "system", subtype: "unknown", data: {} }]);
    expect(messagesOf(results[2])).toEqual([{ type: "system", subtype: "b", data: {} }]);
  });

  it("reports an oversized frame once and resumes after its newline", () => {
    const decoder = new FrameDecoder(64);

    const first = decoder.push("x".repeat(100));
    expect(first).toHaveLength(1);
    expect(errorOf(first[0])).toBe("Frame exceeded maximum size of 64 bytes");
    expect(first[0]?.bytes).toBe(100);
    expect(decoder.hasPartialFrame).toBe(true);

    expect(decoder.push("y".repeat(100))).toEqual([]);

    const rest = decoder.push('yyy\n{"type":"system","subtype":"a"}\n');
    expect(rest).toHaveLength(1);
    expect(messagesOf(rest[0])).toEqual([{ type: "system", subtype: "a", data: {} }]);
  });

  it("rejects an oversized complete line", () => {
    const decoder = new FrameDecoder(64);
    const results = decoder.push(`{"type":"system","pad":"${"a".repeat(80)}"}\n{"type":"system","subtype":"ok"}\n`);

    expect(results.map((r) => r.ok)).toEqual([false, true]);
    expect(errorOf(results[0])).toBe("Frame exceeded maximum size of 64 bytes");
  });

  it("flushes an unterminated final frame on end", () => {
    const decoder = new FrameDecoder();
    expect(decoder.push('{"type":"system","subtype":"tail"}')).toEqual([]);

    const results = decoder.end();
    expect(messagesOf(results[0])).toEqual([{ type: "system", subtype: "tail", data: {} }]);
  });

  it("decodes a stream lazily", async () => {
    const stream = Readable.from(['{"type":"system","subtype":"a"}\n{"type":', '"system","subtype":"b"}\n', "junk"]);

    const results: FrameDecodeResult[] = [];
    for await (const result of decodeFrames(stream)) {
      results.push(result);
    }

    expect(results.map((r) => r.ok)).toEqual([true, true, false]);
    expect(results[2]?.bytes).toBe(4);
  });
});
