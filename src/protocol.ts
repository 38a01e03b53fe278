/**
 * Control protocol codec: newline-delimited JSON over the agent's stdio.
 *
 * Outbound: `encodeCommand()` renders one command as exactly one line.
 * Inbound:  `FrameDecoder` splits a byte stream into frames and decodes each
 *           into the closed `AgentMessage` union. A malformed or oversized
 *           frame yields an error for that frame only; decoding resumes at
 *           the next newline.
 *
 * The peer is untrusted: every frame is size-capped and shape-checked before
 * it becomes a message. Control requests are decoded, never answered here.
 */

import { StringDecoder } from "node:string_decoder";
import { AgentHostError } from "./errors.js";
import { generateId } from "./id.js";
import type {
  AgentCommand,
  AgentMessage,
  AssistantBlock,
  ControlRequestBody,
  JsonObject,
  ToolResultMessage,
  ToolUseMessage,
} from "./types.js";

export const DEFAULT_MAX_FRAME_BYTES = 1024 * 1024;

export type FrameDecodeResult =
  | { ok: true; messages: AgentMessage[]; bytes: number }
  | { ok: false; error: AgentHostError; bytes: number };

function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

class FrameShapeError extends Error {}

function requireString(obj: JsonObject, key: string, frameType: string): string {
  const value = obj[key];
  if (typeof value !== "string") {
    throw new FrameShapeError(`${frameType}.${key}: expected string`);
  }
  return value;
}

function requireRecord(obj: JsonObject, key: string, frameType: string): JsonObject {
  const value = obj[key];
  if (!isRecord(value)) {
    throw new FrameShapeError(`${frameType}.${key}: expected object`);
  }
  return value;
}

// ─── Request IDs ───

let requestCounter = 0;

export function nextRequestId(): string {
  requestCounter += 1;
  return `req_${requestCounter}_${generateId(8)}`;
}

// ─── Encode ───

export function encodeCommand(command: AgentCommand): string {
  let frame: JsonObject;
  switch (command.type) {
    case "init":
      frame = {
        type: "control_request",
        request_id: command.requestId,
        request: { subtype: "initialize", hooks: command.hooks ?? null },
      };
      break;
    case "prompt":
      frame = {
        type: "user",
        message: { role: "user", content: command.text },
        parent_tool_use_id: null,
        session_id: command.agentSessionId ?? "default",
      };
      break;
    case "interrupt":
      frame = {
        type: "control_request",
        request_id: command.requestId,
        request: { subtype: "interrupt" },
      };
      break;
    case "control_response":
      frame = {
        type: "control_response",
        response: command.ok
          ? { subtype: "success", request_id: command.requestId, response: command.response }
          : { subtype: "error", request_id: command.requestId, error: command.error },
      };
      break;
  }
  // JSON.stringify escapes embedded newlines, so the frame is always one line.
  return `${JSON.stringify(frame)}\n`;
}

// ─── Decode ───

function decodeAssistant(frame: JsonObject): AgentMessage[] {
  const message = requireRecord(frame, "message", "assistant");
  const content = message.content;
  if (!Array.isArray(content)) {
    throw new FrameShapeError("assistant.message.content: expected array");
  }

  const parentToolUseId = optionalString(frame.parent_tool_use_id);
  const blocks: AssistantBlock[] = [];
  const toolUses: ToolUseMessage[] = [];

  for (const block of content) {
    if (!isRecord(block)) continue;
    if (block.type === "text" && typeof block.text === "string") {
      blocks.push({ kind: "text", text: block.text });
    } else if (block.type === "thinking" && typeof block.thinking === "string") {
      blocks.push({ kind: "thinking", thinking: block.thinking });
    } else if (block.type === "tool_use") {
      toolUses.push({
        type: "tool_use",
        toolUseId: requireString(block, "id", "assistant.tool_use"),
        name: requireString(block, "name", "assistant.tool_use"),
        input: isRecord(block.input) ? block.input : {},
        ...(parentToolUseId ? { parentToolUseId } : {}),
      });
    }
  }

  const out: AgentMessage[] = [];
  if (blocks.length > 0 || toolUses.length === 0) {
    out.push({
      type: "assistant",
      model: optionalString(message.model),
      content: blocks,
      ...(parentToolUseId ? { parentToolUseId } : {}),
    });
  }
  out.push(...toolUses);
  return out;
}

function decodeUser(frame: JsonObject): AgentMessage[] {
  const message = requireRecord(frame, "message", "user");
  const parentToolUseId = optionalString(frame.parent_tool_use_id);
  const content = message.content;

  if (typeof content === "string") {
    return [{ type: "user", text: content, ...(parentToolUseId ? { parentToolUseId } : {}) }];
  }
  if (!Array.isArray(content)) {
    throw new FrameShapeError("user.message.content: expected string or array");
  }

  const texts: string[] = [];
  const results: ToolResultMessage[] = [];
  for (const block of content) {
    if (!isRecord(block)) continue;
    if (block.type === "text" && typeof block.text === "string") {
      texts.push(block.text);
    } else if (block.type === "tool_result") {
      const raw = block.content;
      results.push({
        type: "tool_result",
        toolUseId: requireString(block, "tool_use_id", "user.tool_result"),
        content: typeof raw === "string" || Array.isArray(raw) ? raw : null,
        isError: block.is_error === true,
      });
    }
  }

  const out: AgentMessage[] = [];
  if (texts.length > 0) {
    out.push({ type: "user", text: texts.join("\n"), ...(parentToolUseId ? { parentToolUseId } : {}) });
  }
  out.push(...results);
  return out;
}

function decodeControlRequestBody(request: JsonObject): ControlRequestBody {
  const subtype = requireString(request, "subtype", "control_request.request");
  if (subtype === "can_use_tool") {
    return {
      subtype,
      toolName: requireString(request, "tool_name", "control_request.can_use_tool"),
      input: requireRecord(request, "input", "control_request.can_use_tool"),
      toolUseId: optionalString(request.tool_use_id),
      suggestions: Array.isArray(request.permission_suggestions)
        ? request.permission_suggestions
        : undefined,
    };
  }
  if (subtype === "hook_callback") {
    return {
      subtype,
      callbackId: requireString(request, "callback_id", "control_request.hook_callback"),
      input: isRecord(request.input) ? request.input : {},
      toolUseId: optionalString(request.tool_use_id),
    };
  }
  return { subtype: "other", name: subtype, raw: request };
}

/**
 * A request with a usable request_id but a bad body still decodes, as
 * `malformed`, so the host can answer it with an error.
 */
function decodeControlRequest(frame: JsonObject): AgentMessage {
  const requestId = requireString(frame, "request_id", "control_request");
  let body: ControlRequestBody;
  try {
    body = decodeControlRequestBody(requireRecord(frame, "request", "control_request"));
  } catch (err) {
    if (!(err instanceof FrameShapeError)) throw err;
    body = { subtype: "malformed", error: err.message, raw: frame.request };
  }
  return { type: "control_request", requestId, request: body };
}

function decodeControlResponse(frame: JsonObject): AgentMessage {
  const response = requireRecord(frame, "response", "control_response");
  const subtype = requireString(response, "subtype", "control_response.response");
  if (subtype !== "success" && subtype !== "error") {
    throw new FrameShapeError(`control_response.response.subtype: unexpected "${subtype}"`);
  }
  return {
    type: "control_response",
    requestId: requireString(response, "request_id", "control_response.response"),
    subtype,
    response: isRecord(response.response) ? response.response : undefined,
    error: optionalString(response.error),
  };
}

/** Decode one parsed frame. Throws FrameShapeError for a malformed known frame. */
function decodeObject(frame: JsonObject): AgentMessage[] {
  const type = frame.type;
  if (typeof type !== "string") {
    throw new FrameShapeError("frame.type: expected string");
  }

  switch (type) {
    case "assistant":
      return decodeAssistant(frame);
    case "user":
      return decodeUser(frame);
    case "system": {
      const { type: _type, subtype, ...data } = frame;
      return [{ type: "system", subtype: typeof subtype === "string" ? subtype : "unknown", data }];
    }
    case "result": {
      const numTurns = frame.num_turns;
      if (typeof numTurns !== "number" || !Number.isInteger(numTurns) || numTurns < 0) {
        throw new FrameShapeError("result.num_turns: expected non-negative integer");
      }
      return [
        {
          type: "result",
          subtype: requireString(frame, "subtype", "result"),
          isError: frame.is_error === true,
          numTurns,
          durationMs: optionalNumber(frame.duration_ms),
          durationApiMs: optionalNumber(frame.duration_api_ms),
          totalCostUsd: optionalNumber(frame.total_cost_usd),
          result: optionalString(frame.result),
          agentSessionId: optionalString(frame.session_id),
        },
      ];
    }
    case "stream_event":
      return [{ type: "stream_event", event: requireRecord(frame, "event", "stream_event") }];
    case "control_request":
      return [decodeControlRequest(frame)];
    case "control_response":
      return [decodeControlResponse(frame)];
    default:
      return [{ type: "unknown", frameType: type, raw: frame }];
  }
}

/** Decode a single line (without its newline). */
export function decodeLine(line: string, bytes = Buffer.byteLength(line, "utf8")): FrameDecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, bytes, error: new AgentHostError(`Malformed frame: ${reason}`, "PROTOCOL_DECODE") };
  }

  if (!isRecord(parsed)) {
    return {
      ok: false,
      bytes,
      error: new AgentHostError("Malformed frame: expected a JSON object", "PROTOCOL_DECODE"),
    };
  }

  try {
    return { ok: true, bytes, messages: decodeObject(parsed) };
  } catch (err) {
    if (err instanceof FrameShapeError) {
      return { ok: false, bytes, error: new AgentHostError(`Malformed frame: ${err.message}`, "PROTOCOL_DECODE") };
    }
    throw err;
  }
}

// ─── Framing ───

/**
 * Stateful line framer. Buffers an incomplete trailing frame across pushes
 * and caps every frame at `maxFrameBytes`; an oversized frame is reported
 * once and skipped through its terminating newline.
 */
export class FrameDecoder {
  private readonly utf8 = new StringDecoder("utf8");
  private pending = "";
  private pendingBytes = 0;
  private discarding = false;

  constructor(readonly maxFrameBytes = DEFAULT_MAX_FRAME_BYTES) {}

  push(chunk: Buffer | string): FrameDecodeResult[] {
    const text = typeof chunk === "string" ? chunk : this.utf8.write(chunk);
    const results: FrameDecodeResult[] = [];

    let start = 0;
    for (;;) {
      const newline = text.indexOf("\n", start);
      if (newline === -1) {
        this.accumulate(text.slice(start), results);
        break;
      }

      const piece = text.slice(start, newline);
      start = newline + 1;

      if (this.discarding) {
        this.discarding = false;
        continue;
      }

      const bytes = this.pendingBytes + Buffer.byteLength(piece, "utf8");
      const line = this.pending + piece;
      this.pending = "";
      this.pendingBytes = 0;

      if (bytes > this.maxFrameBytes) {
        results.push(this.oversized(bytes));
        continue;
      }
      this.decodeInto(line, bytes, results);
    }

    return results;
  }

  /** Flush a final unterminated frame when the stream ends. */
  end(): FrameDecodeResult[] {
    const results: FrameDecodeResult[] = [];
    this.accumulate(this.utf8.end(), results);
    if (!this.discarding && this.pending.length > 0) {
      const line = this.pending;
      const bytes = this.pendingBytes;
      this.pending = "";
      this.pendingBytes = 0;
      this.decodeInto(line, bytes, results);
    }
    this.discarding = false;
    return results;
  }

  /** True while bytes of an unterminated frame are buffered or being skipped. */
  get hasPartialFrame(): boolean {
    return this.discarding || this.pending.trim().length > 0;
  }

  private accumulate(rest: string, results: FrameDecodeResult[]): void {
    if (rest.length === 0 || this.discarding) {
      return;
    }
    this.pending += rest;
    this.pendingBytes += Buffer.byteLength(rest, "utf8");
    if (this.pendingBytes > this.maxFrameBytes) {
      results.push(this.oversized(this.pendingBytes));
      this.pending = "";
      this.pendingBytes = 0;
      this.discarding = true;
    }
  }

  private decodeInto(line: string, bytes: number, results: FrameDecodeResult[]): void {
    const trimmed = line.trim();
    if (trimmed.length === 0) {
      return;
    }
    results.push(decodeLine(trimmed, bytes));
  }

  private oversized(bytes: number): FrameDecodeResult {
    return {
      ok: false,
      bytes,
      error: new AgentHostError(
        `Frame exceeded maximum size of ${this.maxFrameBytes} bytes`,
        "PROTOCOL_DECODE",
      ),
    };
  }
}

/**
 * Lazily decode a byte stream. Restartable per call; the decoder carries
 * partial frames across chunks of the same stream.
 */
export async function* decodeFrames(
  stream: AsyncIterable<Buffer | string>,
  decoder = new FrameDecoder(),
): AsyncGenerator<FrameDecodeResult> {
  for await (const chunk of stream) {
    yield* decoder.push(chunk);
  }
  yield* decoder.end();
}
