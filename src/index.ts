export { loadConfig, normalizeConfig, createDefaultConfig, parsePositiveIntEnv } from "./config.js";
export type { AgentHostConfig, ConfigValidationResult } from "./config.js";
export { AgentHostError, isAgentHostError, toAgentHostError } from "./errors.js";
export type { AgentHostErrorCode } from "./errors.js";
export {
  buildAgentArgs,
  buildAgentEnv,
  filterInheritedEnv,
  resolveAgentExecutable,
  validateArgs,
  validateEnvOverrides,
} from "./launch-policy.js";
export { MessageBuffer } from "./message-buffer.js";
export { ToolListPolicy, evaluatePolicy, matchesToolPattern } from "./permission-policy.js";
export type { PermissionPolicy, PolicyQuery, PolicyVerdict } from "./permission-policy.js";
export { FrameDecoder, decodeFrames, decodeLine, encodeCommand } from "./protocol.js";
export type { FrameDecodeResult } from "./protocol.js";
export { AgentSession } from "./session.js";
export { SessionApi, parseSpawnRequest } from "./session-api.js";
export type { ApiError, ApiResult } from "./session-api.js";
export { SessionManager } from "./sessions.js";
export type { ListSessionsOptions, SessionEvent, SessionManagerOptions } from "./sessions.js";
export { SessionStreamServer } from "./stream.js";
export type { StreamClientMessage, StreamServerMessage, StreamSocket } from "./stream.js";
export { AgentTransport, spawnAgentProcess } from "./transport.js";
export type { AgentLauncher, AgentProcess, TransportExit } from "./transport.js";
export * from "./types.js";
