/**
 * Request boundary for front-ends (tool servers, HTTP routes, CLIs).
 *
 * Takes untyped request bodies, validates their shape, calls the manager and
 * returns an envelope; nothing thrown below escapes as a fault.
 */

import { AgentHostError, toAgentHostError, type AgentHostErrorCode } from "./errors.js";
import { ts } from "./log-utils.js";
import type { SessionManager } from "./sessions.js";
import {
  PERMISSION_MODES,
  type ListSessionsResult,
  type PromptInput,
  type PromptTurn,
  type SessionInfo,
  type SessionOutput,
  type SpawnOptions,
  type SpawnRequest,
  type SpawnResult,
  type TerminateResult,
} from "./types.js";

export interface ApiError {
  code: AgentHostErrorCode;
  message: string;
  sessionId?: string;
}

export type ApiResult<T> = { ok: true; result: T } | { ok: false; error: ApiError };

// ─── Shape Validation ───

type Fields = Record<string, unknown>;

function invalid(message: string): AgentHostError {
  return new AgentHostError(message, "INVALID_REQUEST");
}

function asFields(raw: unknown, path: string): Fields {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw invalid(`${path}: expected object`);
  }
  const fields: Fields = {};
  for (const [key, value] of Object.entries(raw)) {
    fields[key] = value;
  }
  return fields;
}

function rejectUnknownKeys(fields: Fields, allowed: readonly string[], path: string): void {
  for (const key of Object.keys(fields)) {
    if (!allowed.includes(key)) {
      throw invalid(`${path}.${key}: unknown key`);
    }
  }
}

function readSessionId(fields: Fields): string {
  const value = fields.sessionId;
  if (typeof value !== "string" || value.length === 0) {
    throw invalid("sessionId: expected non-empty string");
  }
  return value;
}

function optionalString(fields: Fields, key: string, path: string): string | undefined {
  const value = fields[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw invalid(`${path}.${key}: expected string`);
  }
  return value;
}

function optionalInteger(fields: Fields, key: string, path: string): number | undefined {
  const value = fields[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw invalid(`${path}.${key}: expected integer`);
  }
  return value;
}

function optionalBoolean(fields: Fields, key: string, path: string): boolean | undefined {
  const value = fields[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw invalid(`${path}.${key}: expected boolean`);
  }
  return value;
}

function optionalStringList(fields: Fields, key: string, path: string): string[] | undefined {
  const value = fields[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw invalid(`${path}.${key}: expected array of strings`);
  }
  return value.map((item: unknown, i) => {
    if (typeof item !== "string") {
      throw invalid(`${path}.${key}[${i}]: expected string`);
    }
    return item;
  });
}

function optionalStringMap(fields: Fields, key: string, path: string): Record<string, string> | undefined {
  const value = fields[key];
  if (value === undefined) return undefined;
  const map: Record<string, string> = {};
  for (const [name, entry] of Object.entries(asFields(value, `${path}.${key}`))) {
    if (typeof entry !== "string") {
      throw invalid(`${path}.${key}.${name}: expected string`);
    }
    map[name] = entry;
  }
  return map;
}

function optionalFlagMap(fields: Fields, key: string, path: string): Record<string, string | null> | undefined {
  const value = fields[key];
  if (value === undefined) return undefined;
  const map: Record<string, string | null> = {};
  for (const [name, entry] of Object.entries(asFields(value, `${path}.${key}`))) {
    if (entry !== null && typeof entry !== "string") {
      throw invalid(`${path}.${key}.${name}: expected string or null`);
    }
    map[name] = entry;
  }
  return map;
}

export function parsePrompt(raw: unknown): PromptInput {
  if (typeof raw === "string") {
    return raw;
  }
  if (!Array.isArray(raw)) {
    throw invalid("prompt: expected string or array of turns");
  }
  return raw.map((item: unknown, i): PromptTurn => {
    const turn = asFields(item, `prompt[${i}]`);
    rejectUnknownKeys(turn, ["role", "content"], `prompt[${i}]`);
    if (turn.role !== "user") {
      throw invalid(`prompt[${i}].role: expected "user"`);
    }
    if (typeof turn.content !== "string") {
      throw invalid(`prompt[${i}].content: expected string`);
    }
    return { role: "user", content: turn.content };
  });
}

const SPAWN_OPTION_KEYS = [
  "label",
  "maxTurns",
  "allowedTools",
  "disallowedTools",
  "workingDirectory",
  "env",
  "permissionMode",
  "model",
  "systemPrompt",
  "appendSystemPrompt",
  "addDirs",
  "extraArgs",
  "workerCount",
] as const;

export function parseSpawnRequest(raw: unknown): SpawnRequest {
  const fields = asFields(raw, "request");
  rejectUnknownKeys(fields, ["prompt", "options"], "request");
  const prompt = parsePrompt(fields.prompt);
  if (fields.options === undefined) {
    return { prompt };
  }

  const path = "options";
  const opts = asFields(fields.options, path);
  rejectUnknownKeys(opts, SPAWN_OPTION_KEYS, path);

  const permissionModeRaw = opts.permissionMode;
  const permissionMode =
    permissionModeRaw === undefined
      ? undefined
      : PERMISSION_MODES.find((mode) => mode === permissionModeRaw);
  if (permissionModeRaw !== undefined && permissionMode === undefined) {
    throw invalid(`options.permissionMode: expected one of ${PERMISSION_MODES.join("|")}`);
  }

  const options: SpawnOptions = {
    label: optionalString(opts, "label", path),
    maxTurns: optionalInteger(opts, "maxTurns", path),
    allowedTools: optionalStringList(opts, "allowedTools", path),
    disallowedTools: optionalStringList(opts, "disallowedTools", path),
    workingDirectory: optionalString(opts, "workingDirectory", path),
    env: optionalStringMap(opts, "env", path),
    permissionMode,
    model: optionalString(opts, "model", path),
    systemPrompt: optionalString(opts, "systemPrompt", path),
    appendSystemPrompt: optionalString(opts, "appendSystemPrompt", path),
    addDirs: optionalStringList(opts, "addDirs", path),
    extraArgs: optionalFlagMap(opts, "extraArgs", path),
    workerCount: optionalInteger(opts, "workerCount", path),
  };
  return { prompt, options };
}

// ─── API ───

export class SessionApi {
  constructor(private readonly manager: SessionManager) {}

  spawn(request: unknown): Promise<ApiResult<SpawnResult>> {
    return this.run("spawn", async () => this.manager.spawn(parseSpawnRequest(request)));
  }

  send(request: unknown): Promise<ApiResult<{ sessionId: string }>> {
    return this.run("send", async () => {
      const fields = asFields(request, "request");
      rejectUnknownKeys(fields, ["sessionId", "prompt"], "request");
      const sessionId = readSessionId(fields);
      await this.manager.sendPrompt(sessionId, parsePrompt(fields.prompt));
      return { sessionId };
    });
  }

  /** `{ sessionId, offset, limit }`, or `{ sessionId, tail }` for the newest messages. */
  read(request: unknown): Promise<ApiResult<SessionOutput>> {
    return this.run("read", () => {
      const fields = asFields(request, "request");
      rejectUnknownKeys(fields, ["sessionId", "offset", "limit", "tail"], "request");
      const sessionId = readSessionId(fields);
      const tail = optionalInteger(fields, "tail", "request");
      if (tail !== undefined) {
        return this.manager.tailSessionOutput(sessionId, tail);
      }
      const offset = optionalInteger(fields, "offset", "request") ?? 0;
      const limit = optionalInteger(fields, "limit", "request") ?? 100;
      return this.manager.getSessionOutput(sessionId, offset, limit);
    });
  }

  list(request: unknown = {}): Promise<ApiResult<ListSessionsResult>> {
    return this.run("list", () => {
      const fields = asFields(request, "request");
      rejectUnknownKeys(fields, ["includeCompleted", "lastOutputLines"], "request");
      return this.manager.listSessions({
        includeCompleted: optionalBoolean(fields, "includeCompleted", "request"),
        lastOutputLines: optionalInteger(fields, "lastOutputLines", "request"),
      });
    });
  }

  info(request: unknown): Promise<ApiResult<SessionInfo>> {
    return this.run("info", () => {
      const fields = asFields(request, "request");
      rejectUnknownKeys(fields, ["sessionId", "lastOutputLines"], "request");
      return this.manager.getSessionInfo(
        readSessionId(fields),
        optionalInteger(fields, "lastOutputLines", "request"),
      );
    });
  }

  terminate(request: unknown): Promise<ApiResult<TerminateResult>> {
    return this.run("terminate", () => {
      const fields = asFields(request, "request");
      rejectUnknownKeys(fields, ["sessionId"], "request");
      return this.manager.terminateSession(readSessionId(fields));
    });
  }

  acknowledge(request: unknown): Promise<ApiResult<{ sessionId: string }>> {
    return this.run("acknowledge", () => {
      const fields = asFields(request, "request");
      rejectUnknownKeys(fields, ["sessionId"], "request");
      const sessionId = readSessionId(fields);
      this.manager.acknowledge(sessionId);
      return { sessionId };
    });
  }

  private async run<T>(operation: string, fn: () => T | Promise<T>): Promise<ApiResult<T>> {
    try {
      return { ok: true, result: await fn() };
    } catch (err: unknown) {
      const error = toAgentHostError(err);
      if (!(err instanceof AgentHostError)) {
        console.error(`${ts()} [api] ${operation} failed unexpectedly:`, err);
      }
      return { ok: false, error: error.toJSON() };
    }
  }
}
