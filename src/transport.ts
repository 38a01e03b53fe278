/**
 * Agent process transport: owns one child process end to end.
 *
 * stdout is decoded frame by frame into messages, stderr is logged and its
 * tail kept for failure reports, stdin carries a queue of encoded commands.
 * Every read and write is bounded by `ioTimeoutMs`; every exit path ends
 * with the process reaped and `onClose` called exactly once.
 */

import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { AgentHostError, spawnFailed, timeoutError, toAgentHostError } from "./errors.js";
import { errorMessage, ts } from "./log-utils.js";
import { decodeFrames, encodeCommand, FrameDecoder, nextRequestId } from "./protocol.js";
import type { AgentCommand, AgentMessage } from "./types.js";

// ─── Process Seam ───

/** The slice of ChildProcess the transport depends on. */
export interface AgentProcess extends EventEmitter {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export interface LaunchOptions {
  cwd: string;
  env: Record<string, string>;
}

export type AgentLauncher = (command: string, args: string[], options: LaunchOptions) => AgentProcess;

export const spawnAgentProcess: AgentLauncher = (command, args, options) =>
  spawn(command, args, {
    cwd: options.cwd,
    env: options.env,
    stdio: ["pipe", "pipe", "pipe"],
  });

// ─── Transport ───

export interface TransportOptions {
  sessionId: string;
  command: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
  launcher?: AgentLauncher;
  ioTimeoutMs: number;
  terminateGraceMs: number;
  maxFrameBytes: number;
  maxPendingWrites: number;
  stderrTailLines: number;
}

export interface TransportExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface TransportClose extends TransportExit {
  /** Set when the read loop or a write failed; absent on a plain exit. */
  error?: AgentHostError;
}

export interface TransportHandlers {
  /** Called once per decoded frame, also when the frame carried no messages. */
  onMessages(messages: AgentMessage[], bytes: number): void;
  onDecodeError(error: AgentHostError): void;
  onClose(close: TransportClose): void;
}

export class AgentTransport {
  private proc: AgentProcess | null = null;
  private started = false;
  private exitInfo: TransportExit | null = null;
  private resolveExited: (exit: TransportExit) => void = () => {};
  private failure: AgentHostError | undefined;
  private closeReported = false;

  private inputClosed = false;
  private writeBroken = false;
  private pendingWrites = 0;
  private writeChain: Promise<void> = Promise.resolve();
  private stallTimer: NodeJS.Timeout | undefined;
  private terminating: Promise<TransportExit> | null = null;
  private readonly stderrTail: string[] = [];

  /** Resolves once the process is gone (or never started). */
  readonly exited: Promise<TransportExit>;

  constructor(
    private readonly options: TransportOptions,
    private readonly handlers: TransportHandlers,
  ) {
    this.exited = new Promise((resolve) => {
      this.resolveExited = resolve;
    });
  }

  get pid(): number | undefined {
    return this.proc?.pid;
  }

  /** True once the launcher has been called, whether or not the spawn succeeded. */
  get launched(): boolean {
    return this.proc !== null;
  }

  get isRunning(): boolean {
    return this.started && this.exitInfo === null;
  }

  get pendingWriteCount(): number {
    return this.pendingWrites;
  }

  /** Last stderr lines, oldest first. */
  get stderrLines(): readonly string[] {
    return this.stderrTail;
  }

  /**
   * Launch the process. Resolves once it has spawned; rejects SPAWN_FAILED
   * or TIMEOUT. A timed-out launch is killed, and `exited` still settles.
   */
  async start(): Promise<void> {
    if (this.proc) {
      throw new AgentHostError("Transport already started", "TRANSPORT_IO", this.options.sessionId);
    }

    const { sessionId, command, args, cwd, env } = this.options;
    const launcher = this.options.launcher ?? spawnAgentProcess;

    let proc: AgentProcess;
    try {
      proc = launcher(command, args, { cwd, env });
    } catch (err: unknown) {
      this.markExited({ code: null, signal: null });
      throw spawnFailed(`Failed to launch ${command}: ${errorMessage(err)}`, sessionId);
    }
    this.proc = proc;

    const { stdout, stdin } = proc;
    if (!stdout || !stdin) {
      proc.kill("SIGKILL");
      this.markExited({ code: null, signal: null });
      throw spawnFailed(`Agent process for ${sessionId} has no stdio pipes`, sessionId);
    }

    // EPIPE on stdin is expected once the process has exited.
    stdin.on("error", (err: Error) => {
      if ("code" in err && err.code === "EPIPE") return;
      console.error(`${ts()} [agent:${sessionId}] stdin error:`, err);
    });

    proc.on("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      console.log(`${ts()} [agent:${sessionId}] exited (code=${code}, signal=${signal})`);
      this.markExited({ code, signal });
    });

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        cleanup();
        proc.kill("SIGKILL");
        reject(timeoutError(`Timeout waiting for agent process to spawn: ${sessionId}`, sessionId));
      }, this.options.ioTimeoutMs);

      const onSpawn = (): void => {
        cleanup();
        resolve();
      };
      const onError = (err: Error): void => {
        cleanup();
        this.markExited({ code: null, signal: null });
        reject(spawnFailed(`Failed to spawn ${command}: ${err.message}`, sessionId));
      };
      const cleanup = (): void => {
        clearTimeout(timer);
        proc.off("spawn", onSpawn);
        proc.off("error", onError);
      };

      proc.once("spawn", onSpawn);
      proc.once("error", onError);
    });

    this.started = true;
    console.log(`${ts()} [agent:${sessionId}] spawned pid=${proc.pid ?? "?"} via ${command}`);

    proc.on("error", (err: Error) => {
      console.error(`${ts()} [agent:${sessionId}] process error:`, err);
    });
    this.watchStderr(proc.stderr);
    this.readLoop(stdout).catch((err: unknown) => {
      console.error(`${ts()} [agent:${sessionId}] read loop crashed:`, err);
    });
  }

  /**
   * Queue one command. Frames are written whole and in submission order;
   * a write that fails or does not complete within `ioTimeoutMs` rejects and
   * force-terminates the transport.
   */
  async write(command: AgentCommand): Promise<void> {
    const { sessionId, maxPendingWrites } = this.options;
    if (!this.isRunning || this.inputClosed || this.writeBroken) {
      throw new AgentHostError(`Agent input is closed: ${sessionId}`, "TRANSPORT_IO", sessionId);
    }
    if (this.pendingWrites >= maxPendingWrites) {
      throw new AgentHostError(
        `Write queue full (${maxPendingWrites} pending): ${sessionId}`,
        "CAPACITY_EXCEEDED",
        sessionId,
      );
    }

    const frame = encodeCommand(command);
    this.pendingWrites += 1;
    const run = this.writeChain.then(() => this.writeFrame(frame));
    // The caller observes failures through `run`; the chain only orders writes.
    this.writeChain = run.then(
      () => undefined,
      () => undefined,
    );
    try {
      await run;
    } finally {
      this.pendingWrites -= 1;
    }
  }

  /** End the agent's stdin. The agent finishes its turn and exits. */
  closeInput(): void {
    if (this.inputClosed) return;
    this.inputClosed = true;
    const stdin = this.proc?.stdin;
    if (stdin && !stdin.destroyed && !stdin.writableEnded) {
      this.writeChain = this.writeChain.then(() => {
        stdin.end();
      });
    }
  }

  /**
   * Stop the process. Graceful: interrupt, close stdin, wait up to the
   * grace window, then SIGKILL. Repeated calls share one outcome.
   */
  terminate(graceful = true): Promise<TransportExit> {
    this.terminating ??= this.shutdown(graceful);
    return this.terminating;
  }

  private async shutdown(graceful: boolean): Promise<TransportExit> {
    const { sessionId, terminateGraceMs } = this.options;
    const proc = this.proc;
    if (!proc || this.exitInfo) {
      return this.exitInfo ?? { code: null, signal: null };
    }

    if (graceful && !this.writeBroken) {
      const stdin = proc.stdin;
      this.inputClosed = true;
      if (stdin && !stdin.destroyed && !stdin.writableEnded) {
        stdin.write(encodeCommand({ type: "interrupt", requestId: nextRequestId() }));
        stdin.end();
      }
      const exit = await this.waitForExit(terminateGraceMs);
      if (exit) {
        return exit;
      }
      console.warn(`${ts()} [agent:${sessionId}] did not exit within ${terminateGraceMs}ms, killing`);
    }

    this.inputClosed = true;
    proc.kill("SIGKILL");
    const exit = await this.waitForExit(terminateGraceMs);
    if (exit) {
      return exit;
    }
    console.error(`${ts()} [agent:${sessionId}] still running after SIGKILL`);
    return { code: null, signal: "SIGKILL" };
  }

  private waitForExit(timeoutMs: number): Promise<TransportExit | null> {
    if (this.exitInfo) {
      return Promise.resolve(this.exitInfo);
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(null), timeoutMs);
      this.exited.then(
        (exit) => {
          clearTimeout(timer);
          resolve(exit);
        },
        () => resolve(null),
      );
    });
  }

  private writeFrame(frame: string): Promise<void> {
    const { sessionId, ioTimeoutMs } = this.options;
    const stdin = this.proc?.stdin;
    if (!stdin || this.writeBroken || stdin.destroyed || stdin.writableEnded) {
      return Promise.reject(new AgentHostError(`Agent input is closed: ${sessionId}`, "TRANSPORT_IO", sessionId));
    }

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        // A half-written frame must never be followed by another.
        this.writeBroken = true;
        const error = timeoutError(`Write to agent timed out after ${ioTimeoutMs}ms: ${sessionId}`, sessionId);
        this.failure ??= error;
        reject(error);
        this.terminate(false).catch((err: unknown) => {
          console.error(`${ts()} [agent:${sessionId}] terminate after write timeout failed:`, err);
        });
      }, ioTimeoutMs);

      stdin.write(frame, (err?: Error | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (err) {
          // A failed write leaves the agent unusable; fail the transport like a timeout.
          this.writeBroken = true;
          const error = toAgentHostError(err, sessionId);
          this.failure ??= error;
          reject(error);
          this.terminate(false).catch((terminateErr: unknown) => {
            console.error(`${ts()} [agent:${sessionId}] terminate after write error failed:`, terminateErr);
          });
        } else {
          resolve();
        }
      });
    });
  }

  private watchStderr(stderr: Readable | null): void {
    if (!stderr) return;
    const { sessionId, stderrTailLines } = this.options;
    const rl = createInterface({ input: stderr });
    rl.on("line", (line) => {
      const trimmed = line.trimEnd();
      if (trimmed.length === 0) return;
      console.error(`${ts()} [agent:${sessionId}] ${trimmed}`);
      if (stderrTailLines === 0) return;
      this.stderrTail.push(trimmed);
      if (this.stderrTail.length > stderrTailLines) {
        this.stderrTail.shift();
      }
    });
  }

  /** Yield stdout chunks, failing the stream if a partial frame stalls. */
  private async *watchStalls(stdout: Readable, decoder: FrameDecoder): AsyncGenerator<Buffer | string> {
    const { sessionId, ioTimeoutMs } = this.options;
    for await (const chunk of stdout) {
      this.clearStallTimer();
      yield chunk;
      if (decoder.hasPartialFrame) {
        this.stallTimer = setTimeout(() => {
          stdout.destroy(timeoutError(`Read from agent stalled mid-frame for ${ioTimeoutMs}ms: ${sessionId}`, sessionId));
        }, ioTimeoutMs);
      }
    }
  }

  private clearStallTimer(): void {
    if (this.stallTimer) {
      clearTimeout(this.stallTimer);
      this.stallTimer = undefined;
    }
  }

  private async readLoop(stdout: Readable): Promise<void> {
    const { sessionId, maxFrameBytes } = this.options;
    const decoder = new FrameDecoder(maxFrameBytes);

    try {
      for await (const result of decodeFrames(this.watchStalls(stdout, decoder), decoder)) {
        if (result.ok) {
          this.handlers.onMessages(result.messages, result.bytes);
        } else {
          console.warn(`${ts()} [agent:${sessionId}] ${result.error.message}`);
          this.handlers.onDecodeError(result.error);
        }
      }
    } catch (err: unknown) {
      const error = toAgentHostError(err, sessionId);
      console.error(`${ts()} [agent:${sessionId}] read loop failed: ${error.message}`);
      this.failure ??= error;
    } finally {
      this.clearStallTimer();
    }

    let exit: TransportExit;
    if (this.failure) {
      exit = await this.terminate(false);
    } else {
      // stdout closed: the process is exiting. Reap it, bounded by the grace window.
      exit = (await this.waitForExit(this.options.terminateGraceMs)) ?? (await this.terminate(false));
    }
    this.reportClose(exit);
  }

  private reportClose(exit: TransportExit): void {
    if (this.closeReported) return;
    this.closeReported = true;
    this.handlers.onClose(this.failure ? { ...exit, error: this.failure } : exit);
  }

  private markExited(exit: TransportExit): void {
    if (this.exitInfo) return;
    this.exitInfo = exit;
    this.inputClosed = true;
    this.resolveExited(exit);
  }
}
