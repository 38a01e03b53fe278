// ─── Session State ───

export type SessionState = "initializing" | "active" | "completed" | "failed" | "terminated";

export const TERMINAL_STATES: ReadonlySet<SessionState> = new Set([
  "completed",
  "failed",
  "terminated",
]);

export function isTerminalState(state: SessionState): boolean {
  return TERMINAL_STATES.has(state);
}

// ─── Messages (decoded from the agent's stdout) ───

export type JsonObject = Record<string, unknown>;

export type AssistantBlock =
  | { kind: "text"; text: string }
  | { kind: "thinking"; thinking: string };

export interface AssistantMessage {
  type: "assistant";
  model?: string;
  content: AssistantBlock[];
  parentToolUseId?: string;
}

export interface UserMessage {
  type: "user";
  text: string;
  parentToolUseId?: string;
}

export interface ToolUseMessage {
  type: "tool_use";
  toolUseId: string;
  name: string;
  input: JsonObject;
  parentToolUseId?: string;
}

export interface ToolResultMessage {
  type: "tool_result";
  toolUseId: string;
  content: string | unknown[] | null;
  isError: boolean;
}

/** Decision requests the agent sends to the host. */
export type ControlRequestBody =
  | {
      subtype: "can_use_tool";
      toolName: string;
      input: JsonObject;
      toolUseId?: string;
      suggestions?: unknown[];
    }
  | {
      subtype: "hook_callback";
      callbackId: string;
      input: JsonObject;
      toolUseId?: string;
    }
  | { subtype: "other"; name: string; raw: JsonObject }
  | { subtype: "malformed"; error: string; raw: unknown };

export interface ControlRequestMessage {
  type: "control_request";
  requestId: string;
  request: ControlRequestBody;
}

export interface ControlResponseMessage {
  type: "control_response";
  requestId: string;
  subtype: "success" | "error";
  response?: JsonObject;
  error?: string;
}

export interface SystemMessage {
  type: "system";
  subtype: string;
  data: JsonObject;
}

/** End-of-turn "done" frame. */
export interface ResultMessage {
  type: "result";
  subtype: string;
  isError: boolean;
  numTurns: number;
  durationMs?: number;
  durationApiMs?: number;
  totalCostUsd?: number;
  result?: string;
  agentSessionId?: string;
}

export interface StreamEventMessage {
  type: "stream_event";
  event: JsonObject;
}

/** Host-generated lifecycle/error event. */
export interface ErrorEventMessage {
  type: "error";
  code: string;
  message: string;
}

export interface UnknownMessage {
  type: "unknown";
  frameType: string;
  raw: JsonObject;
}

export type AgentMessage =
  | AssistantMessage
  | UserMessage
  | ToolUseMessage
  | ToolResultMessage
  | ControlRequestMessage
  | ControlResponseMessage
  | SystemMessage
  | ResultMessage
  | StreamEventMessage
  | ErrorEventMessage
  | UnknownMessage;

export type AgentMessageType = AgentMessage["type"];

export interface SequencedMessage {
  seq: number;
  timestamp: number;
  message: AgentMessage;
}

// ─── Commands (encoded onto the agent's stdin) ───

export interface InitCommand {
  type: "init";
  requestId: string;
  hooks?: JsonObject;
}

export interface PromptCommand {
  type: "prompt";
  text: string;
  agentSessionId?: string;
}

export interface InterruptCommand {
  type: "interrupt";
  requestId: string;
}

export type ControlResponseCommand =
  | { type: "control_response"; requestId: string; ok: true; response: JsonObject }
  | { type: "control_response"; requestId: string; ok: false; error: string };

export type AgentCommand = InitCommand | PromptCommand | InterruptCommand | ControlResponseCommand;

// ─── Spawn Requests ───

export type PermissionMode = "default" | "acceptEdits" | "plan" | "bypassPermissions";

export const PERMISSION_MODES: readonly PermissionMode[] = [
  "default",
  "acceptEdits",
  "plan",
  "bypassPermissions",
];

export interface PromptTurn {
  role: "user";
  content: string;
}

export type PromptInput = string | PromptTurn[];

export interface SpawnOptions {
  label?: string;
  maxTurns?: number;
  allowedTools?: string[];
  disallowedTools?: string[];
  workingDirectory?: string;
  env?: Record<string, string>;
  permissionMode?: PermissionMode;
  model?: string;
  systemPrompt?: string;
  appendSystemPrompt?: string;
  addDirs?: string[];
  /** Extra CLI flags by name (without leading dashes); null for boolean flags. */
  extraArgs?: Record<string, string | null>;
  workerCount?: number;
}

export interface SpawnRequest {
  prompt: PromptInput;
  options?: SpawnOptions;
}

// ─── Caller-facing Views ───

export interface SessionInfo {
  sessionId: string;
  label: string;
  state: SessionState;
  working: boolean;
  turnCount: number;
  maxTurns: number;
  promptCount: number;
  messageCount: number;
  totalMessages: number;
  createdAt: number;
  lastActivity: number;
  endedAt?: number;
  runtimeMs: number;
  exitCode?: number | null;
  failureReason?: string;
  lastOutput: string[];
}

export interface ReadResult {
  messages: SequencedMessage[];
  truncated: boolean;
  nextOffset: number;
  oldestSeq: number;
  nextSeq: number;
}

export interface SessionOutput extends ReadResult {
  sessionId: string;
  state: SessionState;
  working: boolean;
  turnCount: number;
  maxTurns: number;
}

export interface SpawnResult {
  sessions: SessionInfo[];
}

export interface ListSessionsResult {
  active: SessionInfo[];
  completed: SessionInfo[];
  totalActive: number;
  totalCompleted: number;
}

export interface TerminateResult {
  sessionId: string;
  state: SessionState;
  turnCount: number;
  totalMessages: number;
  runtimeMs: number;
}
