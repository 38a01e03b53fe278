/**
 * One agent session: a transport, its message buffer, and the state machine
 *
 *   initializing ──first frame──▶ active ──▶ completed | failed | terminated
 *        │                                     ▲
 *        └──────── spawn error / early exit ───┘ (failed)
 *
 * Terminal states are final. The transport's read loop is the buffer's only
 * writer; callers read snapshots at any time, also after the session ended.
 */

import type { AgentHostConfig } from "./config.js";
import { AgentHostError, sessionNotActive, toAgentHostError } from "./errors.js";
import { errorMessage, ts } from "./log-utils.js";
import { MessageBuffer } from "./message-buffer.js";
import {
  evaluatePolicy,
  verdictToResponse,
  type PermissionPolicy,
  type PolicyQuery,
} from "./permission-policy.js";
import { nextRequestId } from "./protocol.js";
import { AgentTransport, type AgentLauncher, type TransportClose, type TransportExit } from "./transport.js";
import {
  isTerminalState,
  type AgentMessage,
  type ControlRequestMessage,
  type ReadResult,
  type SequencedMessage,
  type SessionInfo,
  type SessionOutput,
  type SessionState,
} from "./types.js";

export type SessionLimits = Pick<
  AgentHostConfig,
  | "bufferCapacity"
  | "bufferMaxBytes"
  | "maxFrameBytes"
  | "ioTimeoutMs"
  | "terminateGraceMs"
  | "idleTimeoutMs"
  | "workingThresholdMs"
  | "maxPendingWrites"
  | "stderrTailLines"
>;

export interface SessionLaunch {
  command: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
  launcher?: AgentLauncher;
}

export interface SessionObserver {
  onMessage(session: AgentSession, entry: SequencedMessage): void;
  onStateChange(session: AgentSession, previous: SessionState): void;
}

export interface AgentSessionOptions {
  id: string;
  label: string;
  maxTurns: number;
  launch: SessionLaunch;
  limits: SessionLimits;
  policy: PermissionPolicy;
  observer?: SessionObserver;
}

export const TERMINATED_BY_CALLER = "terminated by caller";

export class AgentSession {
  readonly id: string;
  readonly label: string;
  readonly maxTurns: number;
  readonly createdAt = Date.now();
  readonly buffer: MessageBuffer;

  private stateValue: SessionState = "initializing";
  private lastActivityAt = this.createdAt;
  private lastMessageAt = 0;
  private endedAtValue: number | undefined;
  private promptCountValue = 0;
  private turnCountValue = 0;
  private resultSeen = false;
  private exitCodeValue: number | null | undefined;
  private failureReasonValue: string | undefined;
  private agentSessionId: string | undefined;

  private terminateReason: string | undefined;
  private turnLimitReached = false;
  private idleTimer: NodeJS.Timeout | undefined;
  private resolveSettled: (state: SessionState) => void = () => {};

  private readonly transport: AgentTransport;
  private readonly limits: SessionLimits;
  private readonly policy: PermissionPolicy;
  private readonly observer: SessionObserver | undefined;

  /** Resolves with the terminal state. */
  readonly settled: Promise<SessionState>;

  constructor(options: AgentSessionOptions) {
    this.id = options.id;
    this.label = options.label;
    this.maxTurns = options.maxTurns;
    this.limits = options.limits;
    this.policy = options.policy;
    this.observer = options.observer;
    this.buffer = new MessageBuffer(options.limits.bufferCapacity, options.limits.bufferMaxBytes);
    this.settled = new Promise((resolve) => {
      this.resolveSettled = resolve;
    });

    this.transport = new AgentTransport(
      {
        sessionId: this.id,
        ...options.launch,
        ioTimeoutMs: options.limits.ioTimeoutMs,
        terminateGraceMs: options.limits.terminateGraceMs,
        maxFrameBytes: options.limits.maxFrameBytes,
        maxPendingWrites: options.limits.maxPendingWrites,
        stderrTailLines: options.limits.stderrTailLines,
      },
      {
        onMessages: (messages, bytes) => this.handleMessages(messages, bytes),
        onDecodeError: (error) => this.recordError(error.code, error.message),
        onClose: (close) => this.handleClose(close),
      },
    );
  }

  // ─── Accessors ───

  get state(): SessionState {
    return this.stateValue;
  }

  get turnCount(): number {
    return this.turnCountValue;
  }

  get promptCount(): number {
    return this.promptCountValue;
  }

  get endedAt(): number | undefined {
    return this.endedAtValue;
  }

  get failureReason(): string | undefined {
    return this.failureReasonValue;
  }

  get isTerminal(): boolean {
    return isTerminalState(this.stateValue);
  }

  get pid(): number | undefined {
    return this.transport.pid;
  }

  /** Resolves once the agent process is gone. */
  get processExited(): Promise<TransportExit> {
    return this.transport.exited;
  }

  isWorking(now = Date.now()): boolean {
    return (
      !this.isTerminal &&
      this.lastMessageAt > 0 &&
      now - this.lastMessageAt < this.limits.workingThresholdMs
    );
  }

  // ─── Lifecycle ───

  /**
   * Launch the agent and queue the opening prompts. Resolves once the
   * process has spawned; the writes complete in the background and a failed
   * one fails the session through the transport.
   */
  async start(prompts: readonly string[]): Promise<void> {
    if (this.isTerminal || this.terminateReason !== undefined) {
      this.finish("terminated", this.terminateReason ?? TERMINATED_BY_CALLER);
      return;
    }

    try {
      await this.transport.start();
    } catch (err: unknown) {
      const error = toAgentHostError(err, this.id);
      this.fail(error.code, error.message);
      throw error;
    }

    if (this.terminateReason !== undefined) {
      await this.transport.terminate(false);
      return;
    }
    this.armIdleTimer();

    this.writeOpening(prompts).catch((err: unknown) => {
      console.error(`${ts()} [session:${this.id}] opening writes crashed: ${errorMessage(err)}`);
    });
  }

  async sendPrompt(text: string): Promise<void> {
    if (this.isTerminal || this.terminateReason !== undefined || !this.transport.isRunning) {
      throw sessionNotActive(this.id, this.stateValue);
    }
    if (this.turnLimitReached) {
      throw new AgentHostError(
        `Session ${this.id} reached its turn limit (${this.maxTurns})`,
        "SESSION_NOT_ACTIVE",
        this.id,
      );
    }
    await this.writePrompt(text);
  }

  /**
   * Stop the session. Idempotent: a terminal session is left as it is and
   * repeated calls settle on the same state.
   */
  async terminate(reason = TERMINATED_BY_CALLER): Promise<SessionState> {
    if (this.isTerminal) {
      return this.stateValue;
    }
    this.terminateReason ??= reason;
    this.clearIdleTimer();
    if (!this.transport.launched) {
      this.finish("terminated", this.terminateReason);
      return this.stateValue;
    }

    await this.transport.terminate(true);
    if (!this.isTerminal) {
      await this.waitSettled(this.limits.terminateGraceMs);
    }
    if (!this.isTerminal) {
      // Output never closed after the process went away.
      this.finish("terminated", this.terminateReason);
    }
    return this.stateValue;
  }

  // ─── Reads ───

  read(offset: number, limit: number): ReadResult {
    return this.buffer.read(offset, limit);
  }

  tail(count: number): ReadResult {
    return this.buffer.tail(count);
  }

  output(result: ReadResult, now = Date.now()): SessionOutput {
    return {
      sessionId: this.id,
      state: this.stateValue,
      working: this.isWorking(now),
      turnCount: this.turnCountValue,
      maxTurns: this.maxTurns,
      ...result,
    };
  }

  info(lastOutputLines = 3, now = Date.now()): SessionInfo {
    const state = this.stateValue;
    return {
      sessionId: this.id,
      label: this.label,
      state,
      working: this.isWorking(now),
      turnCount: this.turnCountValue,
      maxTurns: this.maxTurns,
      promptCount: this.promptCountValue,
      messageCount: this.buffer.size,
      totalMessages: this.buffer.totalAppended,
      createdAt: this.createdAt,
      lastActivity: this.lastActivityAt,
      ...(this.endedAtValue !== undefined ? { endedAt: this.endedAtValue } : {}),
      runtimeMs: (this.endedAtValue ?? now) - this.createdAt,
      ...(this.exitCodeValue !== undefined ? { exitCode: this.exitCodeValue } : {}),
      ...(this.failureReasonValue ? { failureReason: this.failureReasonValue } : {}),
      lastOutput: lastOutputLines > 0 ? this.lastOutput(lastOutputLines) : [],
    };
  }

  /** Last `count` non-empty lines of assistant text, oldest first. */
  lastOutput(count: number): string[] {
    const recent = this.buffer.findRecent(
      (entry) => entry.message.type === "assistant" && entry.message.content.some((b) => b.kind === "text"),
      count,
    );

    const lines: string[] = [];
    for (const entry of recent) {
      if (entry.message.type !== "assistant") continue;
      const text = entry.message.content
        .map((block) => (block.kind === "text" ? block.text : ""))
        .join("\n");
      const messageLines = text.split("\n").map((line) => line.trim()).filter((line) => line.length > 0);
      lines.unshift(...messageLines);
      if (lines.length >= count) break;
    }
    return lines.slice(-count);
  }

  // ─── Transport Callbacks ───

  private handleMessages(messages: AgentMessage[], bytes: number): void {
    const now = Date.now();
    this.lastActivityAt = now;
    this.lastMessageAt = now;
    if (this.stateValue === "initializing") {
      this.setState("active");
    }
    this.armIdleTimer();

    for (const message of messages) {
      this.append(message, messages.length === 1 ? bytes : undefined);

      switch (message.type) {
        case "system":
          if (message.subtype === "init" && typeof message.data.session_id === "string") {
            this.agentSessionId = message.data.session_id;
          }
          break;
        case "result":
          this.handleResult(message.numTurns, message.agentSessionId);
          break;
        case "control_request":
          this.answerControlRequest(message).catch((err: unknown) => {
            console.error(`${ts()} [session:${this.id}] control response failed: ${errorMessage(err)}`);
          });
          break;
        default:
          break;
      }
    }
  }

  private handleResult(numTurns: number, agentSessionId: string | undefined): void {
    this.resultSeen = true;
    this.turnCountValue = Math.max(this.turnCountValue, numTurns);
    this.agentSessionId = agentSessionId ?? this.agentSessionId;

    if (this.turnCountValue >= this.maxTurns && !this.turnLimitReached) {
      this.turnLimitReached = true;
      console.log(`${ts()} [session:${this.id}] turn limit reached (${this.turnCountValue}/${this.maxTurns}), closing input`);
      this.transport.closeInput();
    }
  }

  private handleClose(close: TransportClose): void {
    this.clearIdleTimer();
    this.exitCodeValue = close.code;
    if (this.isTerminal) {
      return;
    }

    if (this.terminateReason !== undefined) {
      this.finish("terminated", this.terminateReason);
      return;
    }

    if (close.error) {
      this.fail(close.error.code, close.error.message);
      return;
    }

    const stderr = this.transport.stderrLines;
    const detail = stderr.length > 0 ? `: ${stderr[stderr.length - 1]}` : "";
    if (close.signal) {
      this.fail("TRANSPORT_IO", `Agent killed by ${close.signal}${detail}`);
    } else if (close.code !== 0) {
      this.fail("TRANSPORT_IO", `Agent exited with code ${close.code}${detail}`);
    } else if (!this.resultSeen) {
      this.fail("TRANSPORT_IO", "Agent exited before completing a turn");
    } else {
      this.finish("completed");
    }
  }

  // ─── Control Requests ───

  private async answerControlRequest(message: ControlRequestMessage): Promise<void> {
    const { requestId, request } = message;
    if (request.subtype === "malformed" || request.subtype === "other") {
      const error =
        request.subtype === "malformed"
          ? `Malformed control request: ${request.error}`
          : `Unsupported control request: ${request.name}`;
      console.warn(`${ts()} [session:${this.id}] ${error}`);
      await this.transport.write({ type: "control_response", requestId, ok: false, error });
      return;
    }

    const query: PolicyQuery =
      request.subtype === "can_use_tool"
        ? {
            kind: "tool",
            sessionId: this.id,
            toolName: request.toolName,
            input: request.input,
            toolUseId: request.toolUseId,
          }
        : {
            kind: "hook",
            sessionId: this.id,
            callbackId: request.callbackId,
            input: request.input,
            toolUseId: request.toolUseId,
          };

    const verdict = await evaluatePolicy(this.policy, query, this.limits.ioTimeoutMs);
    const subject = query.kind === "tool" ? query.toolName : `hook ${query.callbackId}`;
    console.log(
      `${ts()} [session:${this.id}] permission ${subject}: ${verdict.action}${verdict.reason ? ` (${verdict.reason})` : ""}`,
    );

    if (this.isTerminal) {
      return;
    }
    await this.transport.write({
      type: "control_response",
      requestId,
      ok: true,
      response: verdictToResponse(query, verdict),
    });
  }

  // ─── Internals ───

  /** Queues init and every prompt synchronously, so later prompts line up behind them. */
  private async writeOpening(prompts: readonly string[]): Promise<void> {
    const writes = [
      this.transport.write({ type: "init", requestId: nextRequestId() }),
      ...prompts.map((text) => this.writePrompt(text)),
    ];
    const results = await Promise.allSettled(writes);
    const failed = results.find((result) => result.status === "rejected");
    if (failed?.status === "rejected") {
      console.warn(`${ts()} [session:${this.id}] opening write failed: ${errorMessage(failed.reason)}`);
    }
  }

  private async writePrompt(text: string): Promise<void> {
    await this.transport.write({ type: "prompt", text, agentSessionId: this.agentSessionId });
    this.promptCountValue += 1;
    this.lastActivityAt = Date.now();
    this.armIdleTimer();
  }

  private append(message: AgentMessage, bytes?: number): void {
    const seq = this.buffer.append(message, bytes);
    const read = this.buffer.read(seq, 1);
    const entry = read.messages[0];
    if (entry && this.observer) {
      try {
        this.observer.onMessage(this, entry);
      } catch (err) {
        console.error(`${ts()} [session:${this.id}] observer error:`, err);
      }
    }
  }

  private recordError(code: string, message: string): void {
    this.append({ type: "error", code, message });
  }

  private fail(code: string, reason: string): void {
    this.recordError(code, reason);
    this.finish("failed", reason);
  }

  private finish(state: "completed" | "failed" | "terminated", reason?: string): void {
    if (this.isTerminal) return;
    if (reason !== undefined && state !== "completed") {
      this.failureReasonValue = reason;
    }
    this.setState(state);
  }

  private setState(next: SessionState): void {
    if (this.isTerminal || next === this.stateValue) return;
    const previous = this.stateValue;
    this.stateValue = next;
    console.log(`${ts()} [session:${this.id}] ${previous} -> ${next}`);

    if (isTerminalState(next)) {
      this.endedAtValue = Date.now();
      this.clearIdleTimer();
      this.resolveSettled(next);
    }

    if (this.observer) {
      try {
        this.observer.onStateChange(this, previous);
      } catch (err) {
        console.error(`${ts()} [session:${this.id}] observer error:`, err);
      }
    }
  }

  private waitSettled(timeoutMs: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(resolve, timeoutMs);
      this.settled.then(
        () => {
          clearTimeout(timer);
          resolve();
        },
        () => resolve(),
      );
    });
  }

  private armIdleTimer(): void {
    this.clearIdleTimer();
    if (this.isTerminal) return;
    const timeoutMs = this.limits.idleTimeoutMs;
    this.idleTimer = setTimeout(() => {
      console.log(`${ts()} [session:${this.id}] idle timeout after ${timeoutMs}ms`);
      this.terminate("idle timeout").catch((err: unknown) => {
        console.error(`${ts()} [session:${this.id}] idle terminate failed: ${errorMessage(err)}`);
      });
    }, timeoutMs);
    this.idleTimer.unref();
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = undefined;
    }
  }
}
