/**
 * Session output stream.
 *
 * Read-only WebSocket live tail of session output. A client subscribes to a
 * session, optionally from a sequence number; buffered messages from there
 * are replayed, then new messages and state changes are pushed as they
 * happen. Partial-message `stream_event`s are dropped for a client that is
 * not keeping up.
 */

import { WebSocket, WebSocketServer, type RawData } from "ws";
import { AgentHostError, type AgentHostErrorCode } from "./errors.js";
import { errorMessage, ts } from "./log-utils.js";
import type { SessionEvent, SessionManager } from "./sessions.js";
import type { AgentMessage, SessionInfo, SessionState } from "./types.js";

// ─── Wire Types ───

export type StreamClientMessage =
  | { type: "subscribe"; sessionId: string; sinceSeq?: number }
  | { type: "unsubscribe"; sessionId: string };

export type StreamServerMessage =
  | { type: "subscribed"; sessionId: string; state: SessionState; nextSeq: number; truncated: boolean }
  | { type: "unsubscribed"; sessionId: string }
  | { type: "message"; sessionId: string; seq: number; timestamp: number; message: AgentMessage }
  | { type: "state"; session: SessionInfo }
  | { type: "error"; code: AgentHostErrorCode; message: string; sessionId?: string };

/** The slice of a `ws` WebSocket the stream writes to. */
export interface StreamSocket {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string): void;
  on(event: "message", listener: (data: RawData) => void): unknown;
  on(event: "close", listener: (code: number, reason: Buffer) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export const STREAM_MAX_BUFFERED_BYTES = 64 * 1024;
const REPLAY_PAGE_SIZE = 500;

function invalid(message: string): AgentHostError {
  return new AgentHostError(message, "INVALID_REQUEST");
}

export function parseClientMessage(data: string): StreamClientMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    throw invalid("Malformed stream message: expected JSON");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw invalid("Malformed stream message: expected object");
  }

  const type = "type" in parsed ? parsed.type : undefined;
  const sessionId = "sessionId" in parsed ? parsed.sessionId : undefined;
  if (typeof sessionId !== "string" || sessionId.length === 0) {
    throw invalid("sessionId: expected non-empty string");
  }

  if (type === "unsubscribe") {
    return { type, sessionId };
  }
  if (type === "subscribe") {
    const sinceSeq = "sinceSeq" in parsed ? parsed.sinceSeq : undefined;
    if (sinceSeq === undefined) {
      return { type, sessionId };
    }
    if (typeof sinceSeq !== "number" || !Number.isInteger(sinceSeq) || sinceSeq < 0) {
      throw invalid("sinceSeq must be a non-negative integer");
    }
    return { type, sessionId, sinceSeq };
  }
  throw invalid(`Unknown stream message type: ${String(type)}`);
}

// ─── Server ───

export interface SessionStreamOptions {
  maxBufferedBytes?: number;
}

export class SessionStreamServer {
  private wss: WebSocketServer | null = null;
  private readonly maxBufferedBytes: number;

  constructor(
    private readonly sessions: SessionManager,
    options: SessionStreamOptions = {},
  ) {
    this.maxBufferedBytes = options.maxBufferedBytes ?? STREAM_MAX_BUFFERED_BYTES;
  }

  /** Start a standalone WebSocket server. Resolves with the bound port. */
  listen(port: number, host = "127.0.0.1"): Promise<number> {
    if (this.wss) {
      return Promise.reject(new Error("Stream server already listening"));
    }

    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port, host });
      this.wss = wss;
      wss.once("error", reject);
      wss.once("listening", () => {
        wss.off("error", reject);
        wss.on("error", (err) => {
          console.error(`${ts()} [stream] server error:`, err);
        });
        const address = wss.address();
        const bound = typeof address === "object" && address !== null ? address.port : port;
        console.log(`${ts()} [stream] listening on ${host}:${bound}`);
        resolve(bound);
      });
      wss.on("connection", (ws) => this.handleConnection(ws));
    });
  }

  close(): Promise<void> {
    const wss = this.wss;
    if (!wss) return Promise.resolve();
    this.wss = null;
    for (const client of wss.clients) {
      client.terminate();
    }
    return new Promise((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  handleConnection(ws: StreamSocket): void {
    const subscriptions = new Map<string, () => void>();
    let sent = 0;
    let dropped = 0;

    const send = (msg: StreamServerMessage, droppable = false): void => {
      if (ws.readyState !== WebSocket.OPEN) {
        return;
      }
      if (droppable && ws.bufferedAmount > this.maxBufferedBytes) {
        dropped += 1;
        return;
      }
      sent += 1;
      ws.send(JSON.stringify(msg));
    };

    const sendError = (err: unknown, sessionId?: string): void => {
      const code = err instanceof AgentHostError ? err.code : "INVALID_REQUEST";
      send({ type: "error", code, message: errorMessage(err), ...(sessionId ? { sessionId } : {}) });
    };

    const forward = (event: SessionEvent): void => {
      if (event.type === "state") {
        send({ type: "state", session: event.session });
        return;
      }
      const { sessionId, entry } = event;
      send(
        { type: "message", sessionId, seq: entry.seq, timestamp: entry.timestamp, message: entry.message },
        entry.message.type === "stream_event",
      );
    };

    const unsubscribe = (sessionId: string): void => {
      subscriptions.get(sessionId)?.();
      subscriptions.delete(sessionId);
    };

    const clearAll = (): void => {
      for (const stop of subscriptions.values()) {
        stop();
      }
      subscriptions.clear();
    };

    const subscribe = (sessionId: string, sinceSeq: number | undefined): void => {
      const info = this.sessions.getSessionInfo(sessionId, 0);
      unsubscribe(sessionId);

      // Replay and subscribe run in one synchronous section: no message can
      // be appended between the last replayed one and the first live one.
      let truncated = false;
      let nextSeq = this.sessions.tailSessionOutput(sessionId, 1).nextSeq;
      if (sinceSeq !== undefined) {
        let offset = sinceSeq;
        for (;;) {
          const page = this.sessions.getSessionOutput(sessionId, offset, REPLAY_PAGE_SIZE);
          truncated ||= page.truncated;
          for (const entry of page.messages) {
            send({
              type: "message",
              sessionId,
              seq: entry.seq,
              timestamp: entry.timestamp,
              message: entry.message,
            });
          }
          nextSeq = page.nextSeq;
          if (page.nextOffset >= page.nextSeq || page.nextOffset === offset) break;
          offset = page.nextOffset;
        }
      }

      subscriptions.set(sessionId, this.sessions.subscribe(sessionId, forward));
      send({ type: "subscribed", sessionId, state: info.state, nextSeq, truncated });
    };

    ws.on("message", (data: RawData) => {
      let msg: StreamClientMessage;
      try {
        msg = parseClientMessage(data.toString());
      } catch (err: unknown) {
        sendError(err);
        return;
      }

      try {
        if (msg.type === "subscribe") {
          subscribe(msg.sessionId, msg.sinceSeq);
        } else {
          unsubscribe(msg.sessionId);
          send({ type: "unsubscribed", sessionId: msg.sessionId });
        }
      } catch (err: unknown) {
        sendError(err, msg.sessionId);
      }
    });

    ws.on("close", (code: number) => {
      console.log(`${ts()} [stream] disconnected (code=${code}, sent=${sent}, dropped=${dropped})`);
      clearAll();
    });

    ws.on("error", (err: Error) => {
      console.error(`${ts()} [stream] socket error:`, err);
      clearAll();
    });
  }
}
