import { EventEmitter } from "node:events";
import { afterEach, describe, expect, it } from "vitest";
import { WebSocket } from "ws";
import { SessionManager } from "../src/sessions.js";
import {
  SessionStreamServer,
  parseClientMessage,
  type StreamServerMessage,
  type StreamSocket,
} from "../src/stream.js";
import { waitForCondition } from "./harness/async.js";
import { FakeLauncher, assistantFrame, testConfig } from "./harness/fake-agent.js";

function parseServerMessage(data: string): StreamServerMessage {
  return JSON.parse(data);
}

class FakeWebSocket extends EventEmitter implements StreamSocket {
  readyState: number = WebSocket.OPEN;
  bufferedAmount = 0;
  sent: StreamServerMessage[] = [];

  send(data: string): void {
    this.sent.push(parseServerMessage(data));
  }

  emitMessage(msg: unknown): void {
    this.emit("message", Buffer.from(JSON.stringify(msg)));
  }

  emitRaw(text: string): void {
    this.emit("message", Buffer.from(text));
  }

  emitClose(code = 1000): void {
    this.readyState = WebSocket.CLOSED;
    this.emit("close", code, Buffer.from(""));
  }
}

const managers: SessionManager[] = [];

afterEach(async () => {
  await Promise.all(managers.splice(0).map((manager) => manager.shutdown()));
});

async function setup(maxBufferedBytes?: number, bufferCapacity = 100) {
  const launcher = new FakeLauncher();
  const manager = new SessionManager({
    config: testConfig({ bufferCapacity }),
    launcher: launcher.launch,
    env: { PATH: "/usr/bin" },
  });
  managers.push(manager);
  const { sessions } = await manager.spawn({ prompt: "ping" });
  const sessionId = sessions[0]?.sessionId ?? "";

  const server = new SessionStreamServer(manager, { maxBufferedBytes });
  const ws = new FakeWebSocket();
  server.handleConnection(ws);
  return { launcher, manager, sessionId, ws };
}

describe("SessionStreamServer", () => {
  it("confirms a subscription and forwards live output", async () => {
    const { launcher, sessionId, ws } = await setup();

    ws.emitMessage({ type: "subscribe", sessionId });
    expect(ws.sent).toEqual([{ type: "subscribed", sessionId, state: "initializing", nextSeq: 0, truncated: false }]);

    launcher.last.emitFrame(assistantFrame("pong"));
    await waitForCondition(() => ws.sent.length === 3);

    expect(ws.sent[1]).toMatchObject({ type: "state", session: { sessionId, state: "active" } });
    expect(ws.sent[2]).toMatchObject({
      type: "message",
      sessionId,
      seq: 0,
      message: { type: "assistant", content: [{ kind: "text", text: "pong" }] },
    });
  });

  it("replays buffered output from a sequence number", async () => {
    const { launcher, manager, sessionId, ws } = await setup();
    launcher.last.emitFrame(assistantFrame("one"));
    launcher.last.emitFrame(assistantFrame("two"));
    await waitForCondition(() => manager.getSessionInfo(sessionId).totalMessages === 2);

    ws.emitMessage({ type: "subscribe", sessionId, sinceSeq: 1 });

    expect(ws.sent.map((msg) => msg.type)).toEqual(["message", "subscribed"]);
    expect(ws.sent[0]).toMatchObject({ type: "message", seq: 1 });
    expect(ws.sent[1]).toEqual({ type: "subscribed", sessionId, state: "active", nextSeq: 2, truncated: false });
  });

  it("reports truncation when the replay start was evicted", async () => {
    const { launcher, manager, sessionId, ws } = await setup(undefined, 2);
    for (const text of ["one", "two", "three"]) {
      launcher.last.emitFrame(assistantFrame(text));
    }
    await waitForCondition(() => manager.getSessionInfo(sessionId).totalMessages === 3);

    ws.emitMessage({ type: "subscribe", sessionId, sinceSeq: 0 });

    expect(ws.sent.map((msg) => (msg.type === "message" ? msg.seq : msg.type))).toEqual([1, 2, "subscribed"]);
    expect(ws.sent[2]).toMatchObject({ type: "subscribed", nextSeq: 3, truncated: true });
  });

  it("drops partial-message events for a slow client", async () => {
    const { launcher, sessionId, ws } = await setup(1024);
    ws.emitMessage({ type: "subscribe", sessionId });
    ws.bufferedAmount = 4096;

    launcher.last.emitFrame({ type: "stream_event", event: { type: "content_block_delta" } });
    launcher.last.emitFrame(assistantFrame("complete"));
    await waitForCondition(() => ws.sent.some((msg) => msg.type === "message"));

    expect(ws.sent.map((msg) => msg.type)).toEqual(["subscribed", "state", "message"]);
    expect(ws.sent[2]).toMatchObject({ seq: 1, message: { type: "assistant" } });
  });

  it("stops forwarding after unsubscribe", async () => {
    const { launcher, manager, sessionId, ws } = await setup();
    ws.emitMessage({ type: "subscribe", sessionId });
    ws.emitMessage({ type: "unsubscribe", sessionId });

    launcher.last.emitFrame(assistantFrame("unseen"));
    await waitForCondition(() => manager.getSessionInfo(sessionId).totalMessages === 1);

    expect(ws.sent.map((msg) => msg.type)).toEqual(["subscribed", "unsubscribed"]);
  });

  it("stops forwarding after the socket closes", async () => {
    const { launcher, manager, sessionId, ws } = await setup();
    ws.emitMessage({ type: "subscribe", sessionId });
    ws.emitClose();
    ws.readyState = WebSocket.OPEN;

    launcher.last.emitFrame(assistantFrame("unseen"));
    await waitForCondition(() => manager.getSessionInfo(sessionId).totalMessages === 1);

    expect(ws.sent.map((msg) => msg.type)).toEqual(["subscribed"]);
  });

  it("reports errors with codes", async () => {
    const { ws } = await setup();

    ws.emitMessage({ type: "subscribe", sessionId: "missing" });
    ws.emitRaw("not json");

    expect(ws.sent).toEqual([
      { type: "error", code: "SESSION_NOT_FOUND", message: "Session not found: missing", sessionId: "missing" },
      { type: "error", code: "INVALID_REQUEST", message: "Malformed stream message: expected JSON" },
    ]);
  });
});

describe("parseClientMessage", () => {
  it("validates client messages", () => {
    expect(parseClientMessage('{"type":"subscribe","sessionId":"s1","sinceSeq":3}')).toEqual({
      type: "subscribe",
      sessionId: "s1",
      sinceSeq: 3,
    });
    expect(() => parseClientMessage("[]")).toThrow("Malformed stream message: expected object");
    expect(() => parseClientMessage('{"type":"subscribe"}')).toThrow("sessionId: expected non-empty string");
    expect(() => parseClientMessage('{"type":"subscribe","sessionId":"s1","sinceSeq":-1}')).toThrow(
      "sinceSeq must be a non-negative integer",
    );
    expect(() => parseClientMessage('{"type":"publish","sessionId":"s1"}')).toThrow(
      "Unknown stream message type: publish",
    );
  });
});
