import { EventEmitter } from "node:events";
import { createDefaultConfig, type AgentHostConfig } from "./config.js";
import { AgentHostError, sessionNotFound, toAgentHostError } from "./errors.js";
import { generateSessionId } from "./id.js";
import {
  buildAgentArgs,
  buildAgentEnv,
  resolveAgentExecutable,
  resolveWorkingDirectory,
  validateEnvOverrides,
} from "./launch-policy.js";
import { ts } from "./log-utils.js";
import { ToolListPolicy, type PermissionPolicy } from "./permission-policy.js";
import { AgentSession, type SessionObserver } from "./session.js";
import type { AgentLauncher } from "./transport.js";
import {
  isTerminalState,
  type ListSessionsResult,
  type PromptInput,
  type SequencedMessage,
  type SessionInfo,
  type SessionOutput,
  type SpawnOptions,
  type SpawnRequest,
  type SpawnResult,
  type TerminateResult,
} from "./types.js";

export const DEFAULT_SESSION_LABEL = "agent";

export type SessionEvent =
  | { type: "message"; sessionId: string; entry: SequencedMessage }
  | { type: "state"; session: SessionInfo };

export type PolicyFactory = (sessionId: string, options: SpawnOptions) => PermissionPolicy;

export interface SessionManagerOptions {
  config?: Partial<AgentHostConfig>;
  launcher?: AgentLauncher;
  policyFactory?: PolicyFactory;
  /** Environment the agent inherits from, before filtering. */
  env?: NodeJS.ProcessEnv;
}

export interface ListSessionsOptions {
  includeCompleted?: boolean;
  lastOutputLines?: number;
}

function invalidRequest(message: string): AgentHostError {
  return new AgentHostError(message, "INVALID_REQUEST");
}

/** Flatten a prompt into the user turns to send, in order. */
export function normalizePrompt(prompt: PromptInput): string[] {
  const turns = typeof prompt === "string" ? [prompt] : prompt.map((turn) => turn.content);
  if (turns.length === 0) {
    throw invalidRequest("prompt: expected at least one turn");
  }
  for (const [i, text] of turns.entries()) {
    if (text.trim().length === 0) {
      throw invalidRequest(typeof prompt === "string" ? "prompt: expected non-empty string" : `prompt[${i}].content: expected non-empty string`);
    }
  }
  return turns;
}

function requireInteger(name: string, value: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
    throw invalidRequest(`${name}: expected integer ${range}`);
  }
  return value;
}

// ─── Session Manager ───

/**
 * Registry of agent sessions.
 *
 * The map is only mutated in synchronous sections; spawn admission (capacity
 * check + insert) is one of them and finishes before any process is
 * launched. Terminal sessions stay readable until acknowledged or until the
 * retention window has passed.
 */
export class SessionManager extends EventEmitter {
  readonly config: AgentHostConfig;
  private readonly sessions = new Map<string, AgentSession>();
  private readonly subscribers = new Map<string, Set<(event: SessionEvent) => void>>();
  private readonly launcher: AgentLauncher | undefined;
  private readonly policyFactory: PolicyFactory;
  private readonly env: NodeJS.ProcessEnv;
  private executable: string | undefined;
  private cleanupTimer: NodeJS.Timeout | null = null;
  private closed = false;

  private readonly observer: SessionObserver = {
    onMessage: (session, entry) => {
      this.broadcast(session.id, { type: "message", sessionId: session.id, entry });
    },
    onStateChange: (session) => {
      this.broadcast(session.id, { type: "state", session: session.info() });
    },
  };

  constructor(options: SessionManagerOptions = {}) {
    super();
    this.config = { ...createDefaultConfig(), ...options.config };
    this.launcher = options.launcher;
    this.env = options.env ?? process.env;
    this.policyFactory =
      options.policyFactory ??
      ((_sessionId, spawnOptions) =>
        new ToolListPolicy({
          allowedTools: spawnOptions.allowedTools,
          disallowedTools: spawnOptions.disallowedTools,
          permissionMode: spawnOptions.permissionMode ?? this.config.defaultPermissionMode,
        }));

    this.cleanupTimer = setInterval(() => {
      this.cleanup();
    }, this.config.cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  // ─── Spawn ───

  /**
   * Spawn `workerCount` identical sessions. Every option is validated and
   * capacity is checked for the whole batch before any process is created.
   * Resolves once the processes have spawned, without waiting for output.
   */
  async spawn(request: SpawnRequest): Promise<SpawnResult> {
    if (this.closed) {
      throw new AgentHostError("Session manager is shut down", "CAPACITY_EXCEEDED");
    }

    const prompts = normalizePrompt(request.prompt);
    const options = request.options ?? {};
    const config = this.config;

    const maxTurns = requireInteger("options.maxTurns", options.maxTurns ?? config.defaultMaxTurns, 1, config.maxTurnsCeiling);
    const workerCount = requireInteger("options.workerCount", options.workerCount ?? 1, 1, config.maxWorkersPerSpawn);
    const label = options.label?.trim() || DEFAULT_SESSION_LABEL;

    // Launch policy: rejects with SPAWN_FAILED before any process exists.
    const cwd = resolveWorkingDirectory(options.workingDirectory);
    if (options.env) {
      validateEnvOverrides(options.env, config);
    }
    const args = buildAgentArgs(
      {
        maxTurns,
        permissionMode: options.permissionMode ?? config.defaultPermissionMode,
        model: options.model,
        allowedTools: options.allowedTools,
        disallowedTools: options.disallowedTools,
        systemPrompt: options.systemPrompt,
        appendSystemPrompt: options.appendSystemPrompt,
        addDirs: options.addDirs,
        extraArgs: options.extraArgs,
      },
      config.allowedExtraFlags,
    );
    this.executable ??= resolveAgentExecutable(config.agentExecutable, this.env);
    const command = this.executable;

    // Admission: capacity check and insert run without an await in between.
    const active = this.countActive();
    if (active + workerCount > config.maxSessions) {
      throw new AgentHostError(
        `Session limit reached (${active}/${config.maxSessions} active, ${workerCount} requested)`,
        "CAPACITY_EXCEEDED",
      );
    }

    const created: AgentSession[] = [];
    for (let i = 0; i < workerCount; i += 1) {
      const id = generateSessionId();
      const session = new AgentSession({
        id,
        label: workerCount > 1 ? `${label}-${i + 1}` : label,
        maxTurns,
        launch: {
          command,
          args,
          cwd,
          env: buildAgentEnv(id, options.env, config, this.env),
          launcher: this.launcher,
        },
        limits: config,
        policy: this.policyFactory(id, options),
        observer: this.observer,
      });
      this.sessions.set(id, session);
      created.push(session);
    }

    console.log(
      `${ts()} [sessions] spawning ${created.length} session(s): ${created.map((s) => s.id).join(", ")} (maxTurns=${maxTurns}, cwd=${cwd})`,
    );

    const results = await Promise.allSettled(created.map((session) => session.start(prompts)));
    const failures = results.flatMap((result) => (result.status === "rejected" ? [result.reason] : []));
    if (failures.length > 0 && (workerCount === 1 || failures.length === created.length)) {
      throw toAgentHostError(failures[0]);
    }
    for (const failure of failures) {
      console.warn(`${ts()} [sessions] worker failed to start: ${toAgentHostError(failure).message}`);
    }

    return { sessions: created.map((session) => session.info()) };
  }

  // ─── Interaction ───

  async sendPrompt(sessionId: string, prompt: PromptInput): Promise<void> {
    const session = this.require(sessionId);
    const turns = normalizePrompt(prompt);
    for (const text of turns) {
      await session.sendPrompt(text);
    }
  }

  getSessionOutput(sessionId: string, offset: number, limit: number): SessionOutput {
    const session = this.require(sessionId);
    requireInteger("offset", offset, 0);
    requireInteger("limit", limit, 1);
    return session.output(session.read(offset, limit));
  }

  tailSessionOutput(sessionId: string, count: number): SessionOutput {
    const session = this.require(sessionId);
    requireInteger("count", count, 1);
    return session.output(session.tail(count));
  }

  getSessionInfo(sessionId: string, lastOutputLines = 3): SessionInfo {
    return this.require(sessionId).info(lastOutputLines);
  }

  /**
   * Snapshot of the registry. Each session's state is read once, so a
   * session racing to a terminal state lands in exactly one list.
   */
  listSessions(options: ListSessionsOptions = {}): ListSessionsResult {
    const includeCompleted = options.includeCompleted ?? true;
    const lastOutputLines = options.lastOutputLines ?? 3;
    const now = Date.now();

    const active: SessionInfo[] = [];
    const completed: SessionInfo[] = [];
    for (const session of [...this.sessions.values()]) {
      const info = session.info(lastOutputLines, now);
      (isTerminalState(info.state) ? completed : active).push(info);
    }

    const byWorkingThenNewest = (a: SessionInfo, b: SessionInfo): number =>
      Number(b.working) - Number(a.working) || b.createdAt - a.createdAt;
    active.sort(byWorkingThenNewest);
    completed.sort(byWorkingThenNewest);

    return {
      active,
      completed: includeCompleted ? completed : [],
      totalActive: active.length,
      totalCompleted: completed.length,
    };
  }

  /** Idempotent: a terminal session reports its existing state. */
  async terminateSession(sessionId: string): Promise<TerminateResult> {
    const session = this.require(sessionId);
    const state = await session.terminate();
    const info = session.info(0);
    return {
      sessionId,
      state,
      turnCount: info.turnCount,
      totalMessages: info.totalMessages,
      runtimeMs: info.runtimeMs,
    };
  }

  /** Evict a terminal session now instead of waiting for retention. */
  acknowledge(sessionId: string): void {
    const session = this.require(sessionId);
    if (!session.isTerminal) {
      throw new AgentHostError(
        `Session ${sessionId} is still ${session.state}; terminate it first`,
        "INVALID_REQUEST",
        sessionId,
      );
    }
    this.evict(sessionId);
  }

  // ─── Cleanup ───

  /** Evict terminal sessions whose retention window has passed. */
  cleanup(now = Date.now()): string[] {
    const evicted: string[] = [];
    for (const [id, session] of [...this.sessions]) {
      const endedAt = session.endedAt;
      if (session.isTerminal && endedAt !== undefined && now - endedAt >= this.config.retentionMs) {
        this.evict(id);
        evicted.push(id);
      }
    }
    if (evicted.length > 0) {
      console.log(`${ts()} [sessions] cleanup evicted ${evicted.length} session(s)`);
    }
    return evicted;
  }

  /** Terminate every session and stop the cleanup timer. */
  async shutdown(): Promise<void> {
    this.closed = true;
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    await Promise.all([...this.sessions.values()].map((session) => session.terminate("host shutdown")));
  }

  // ─── Subscribe / Broadcast ───

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  subscribe(sessionId: string, callback: (event: SessionEvent) => void): () => void {
    let set = this.subscribers.get(sessionId);
    if (!set) {
      set = new Set();
      this.subscribers.set(sessionId, set);
    }
    set.add(callback);
    return () => {
      const current = this.subscribers.get(sessionId);
      current?.delete(callback);
      if (current?.size === 0) {
        this.subscribers.delete(sessionId);
      }
    };
  }

  private broadcast(sessionId: string, event: SessionEvent): void {
    if (event.type === "message") {
      this.emit("message", event);
    } else {
      this.emit("state", event.session);
    }

    for (const cb of this.subscribers.get(sessionId) ?? []) {
      try {
        cb(event);
      } catch (err) {
        console.error(`${ts()} [sessions] subscriber error:`, err);
      }
    }
  }

  // ─── Internals ───

  private require(sessionId: string): AgentSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw sessionNotFound(sessionId);
    }
    return session;
  }

  private countActive(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (!session.isTerminal) count += 1;
    }
    return count;
  }

  private evict(sessionId: string): void {
    this.sessions.delete(sessionId);
    this.subscribers.delete(sessionId);
  }
}
