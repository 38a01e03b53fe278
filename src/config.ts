import { existsSync, readFileSync } from "node:fs";
import { PERMISSION_MODES, type PermissionMode } from "./types.js";

export interface AgentHostConfig {
  /** Agent CLI to launch. Resolved at spawn time when unset. */
  agentExecutable?: string;
  maxSessions: number;
  maxWorkersPerSpawn: number;
  defaultMaxTurns: number;
  maxTurnsCeiling: number;

  bufferCapacity: number;
  bufferMaxBytes: number;
  maxFrameBytes: number;

  ioTimeoutMs: number;
  terminateGraceMs: number;
  idleTimeoutMs: number;
  retentionMs: number;
  cleanupIntervalMs: number;
  workingThresholdMs: number;

  maxPendingWrites: number;
  stderrTailLines: number;

  /** Inherited variables passed through to the agent. `*` suffix matches a prefix. */
  envAllowlist: string[];
  deniedEnvVars: string[];
  /** Flags (without dashes) a caller may add through `extraArgs`. */
  allowedExtraFlags: string[];
  defaultPermissionMode: PermissionMode;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  config: AgentHostConfig;
}

export const DEFAULT_ENV_ALLOWLIST: readonly string[] = [
  "HOME",
  "USER",
  "LOGNAME",
  "SHELL",
  "PATH",
  "TERM",
  "COLORTERM",
  "LANG",
  "LANGUAGE",
  "LC_*",
  "TMPDIR",
  "TZ",
  "XDG_CONFIG_HOME",
  "XDG_DATA_HOME",
  "XDG_CACHE_HOME",
  "HTTP_PROXY",
  "HTTPS_PROXY",
  "NO_PROXY",
  "ANTHROPIC_*",
  "CLAUDE_*",
  "AWS_*",
  "GOOGLE_*",
  "VERTEX_*",
];

export const DEFAULT_DENIED_ENV_VARS: readonly string[] = [
  "LD_PRELOAD",
  "LD_LIBRARY_PATH",
  "LD_AUDIT",
  "DYLD_INSERT_LIBRARIES",
  "DYLD_LIBRARY_PATH",
  "DYLD_FRAMEWORK_PATH",
  "NODE_OPTIONS",
  "NODE_PATH",
  "PYTHONPATH",
  "PYTHONSTARTUP",
  "PERL5LIB",
  "PERL5OPT",
  "RUBYLIB",
  "RUBYOPT",
  "BASH_ENV",
  "ENV",
];

export const DEFAULT_ALLOWED_EXTRA_FLAGS: readonly string[] = ["timeout", "retries", "log-level", "cache-dir"];

export function createDefaultConfig(): AgentHostConfig {
  return {
    maxSessions: 10,
    maxWorkersPerSpawn: 10,
    defaultMaxTurns: 10,
    maxTurnsCeiling: 1000,

    bufferCapacity: 1000,
    bufferMaxBytes: 1024 * 1024,
    maxFrameBytes: 1024 * 1024,

    ioTimeoutMs: 30_000,
    terminateGraceMs: 5_000,
    idleTimeoutMs: 10 * 60_000, // 10 min
    retentionMs: 60_000,
    cleanupIntervalMs: 60_000,
    workingThresholdMs: 2_000,

    maxPendingWrites: 64,
    stderrTailLines: 20,

    envAllowlist: [...DEFAULT_ENV_ALLOWLIST],
    deniedEnvVars: [...DEFAULT_DENIED_ENV_VARS],
    allowedExtraFlags: [...DEFAULT_ALLOWED_EXTRA_FLAGS],
    defaultPermissionMode: "default",
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

type IntegerKey = {
  [K in keyof AgentHostConfig]-?: AgentHostConfig[K] extends number ? K : never;
}[keyof AgentHostConfig];

const INTEGER_KEYS: Array<{ key: IntegerKey; min: number }> = [
  { key: "maxSessions", min: 1 },
  { key: "maxWorkersPerSpawn", min: 1 },
  { key: "defaultMaxTurns", min: 1 },
  { key: "maxTurnsCeiling", min: 1 },
  { key: "bufferCapacity", min: 1 },
  { key: "bufferMaxBytes", min: 1 },
  { key: "maxFrameBytes", min: 64 },
  { key: "ioTimeoutMs", min: 1 },
  { key: "terminateGraceMs", min: 0 },
  { key: "idleTimeoutMs", min: 1 },
  { key: "retentionMs", min: 0 },
  { key: "cleanupIntervalMs", min: 1 },
  { key: "workingThresholdMs", min: 0 },
  { key: "maxPendingWrites", min: 1 },
  { key: "stderrTailLines", min: 0 },
];

type StringListKey = "envAllowlist" | "deniedEnvVars" | "allowedExtraFlags";

const STRING_LIST_KEYS: StringListKey[] = ["envAllowlist", "deniedEnvVars", "allowedExtraFlags"];

const TOP_LEVEL_KEYS = new Set<string>([
  "agentExecutable",
  "defaultPermissionMode",
  ...INTEGER_KEYS.map((entry) => entry.key),
  ...STRING_LIST_KEYS,
]);

/**
 * Validate a raw (parsed JSON) config object. Invalid fields are reported
 * and fall back to their defaults; the returned config is always usable.
 */
export function normalizeConfig(raw: unknown, strictUnknown = true): ConfigValidationResult {
  const config = createDefaultConfig();
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isRecord(raw)) {
    errors.push("config: expected top-level JSON object");
    return { valid: false, errors, warnings, config };
  }

  for (const key of Object.keys(raw)) {
    if (!TOP_LEVEL_KEYS.has(key)) {
      (strictUnknown ? errors : warnings).push(`config.${key}: unknown key`);
    }
  }

  for (const { key, min } of INTEGER_KEYS) {
    if (!(key in raw)) continue;
    const value = raw[key];
    if (typeof value !== "number" || !Number.isFinite(value)) {
      errors.push(`config.${key}: expected number`);
    } else if (!Number.isInteger(value)) {
      errors.push(`config.${key}: expected integer`);
    } else if (value < min) {
      errors.push(`config.${key}: expected >= ${min}`);
    } else {
      config[key] = value;
    }
  }

  for (const key of STRING_LIST_KEYS) {
    if (!(key in raw)) continue;
    const value = raw[key];
    if (!Array.isArray(value) || value.some((item) => typeof item !== "string" || item.trim().length === 0)) {
      errors.push(`config.${key}: expected array of non-empty strings`);
      continue;
    }
    config[key] = value.map((item: string) => item.trim());
  }

  if ("agentExecutable" in raw) {
    const value = raw.agentExecutable;
    if (typeof value !== "string" || value.trim().length === 0) {
      errors.push("config.agentExecutable: expected non-empty string");
    } else {
      config.agentExecutable = value;
    }
  }

  if ("defaultPermissionMode" in raw) {
    const value = raw.defaultPermissionMode;
    const mode = PERMISSION_MODES.find((candidate) => candidate === value);
    if (mode === undefined) {
      errors.push(`config.defaultPermissionMode: expected one of ${PERMISSION_MODES.join("|")}`);
    } else {
      config.defaultPermissionMode = mode;
    }
  }

  if (config.defaultMaxTurns > config.maxTurnsCeiling) {
    errors.push(`config.defaultMaxTurns: expected <= maxTurnsCeiling (${config.maxTurnsCeiling})`);
    config.defaultMaxTurns = Math.min(createDefaultConfig().defaultMaxTurns, config.maxTurnsCeiling);
  }

  if (!config.envAllowlist.includes("PATH")) {
    warnings.push("config.envAllowlist: PATH is not inherited; the agent may fail to find its tools");
  }
  for (const name of config.deniedEnvVars) {
    if (config.envAllowlist.includes(name)) {
      warnings.push(`config.envAllowlist: ${name} is also denied and will never be passed through`);
    }
  }

  return { valid: errors.length === 0, errors, warnings, config };
}

export function parsePositiveIntEnv(
  name: string,
  fallback: number,
  env: NodeJS.ProcessEnv = process.env,
): number {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return fallback;
  }

  return parsed;
}

const ENV_OVERRIDES: Array<{ env: string; key: IntegerKey }> = [
  { env: "AGENT_HOST_MAX_SESSIONS", key: "maxSessions" },
  { env: "AGENT_HOST_IO_TIMEOUT_MS", key: "ioTimeoutMs" },
  { env: "AGENT_HOST_IDLE_TIMEOUT_MS", key: "idleTimeoutMs" },
  { env: "AGENT_HOST_RETENTION_MS", key: "retentionMs" },
  { env: "AGENT_HOST_BUFFER_CAPACITY", key: "bufferCapacity" },
];

/**
 * Build the runtime config: defaults, then the JSON file named by
 * AGENT_HOST_CONFIG (invalid fields fall back with a warning), then
 * integer env overrides.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentHostConfig {
  let config = createDefaultConfig();

  const configPath = env.AGENT_HOST_CONFIG;
  if (configPath) {
    if (!existsSync(configPath)) {
      console.warn(`[config] ${configPath}: file not found (using defaults)`);
    } else {
      let raw: unknown;
      try {
        raw = JSON.parse(readFileSync(configPath, "utf-8"));
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        console.warn(`[config] ${configPath}: invalid JSON (${message}), using defaults`);
        raw = {};
      }

      const normalized = normalizeConfig(raw, false);
      for (const err of normalized.errors) {
        console.warn(`[config] ${err} (using default for invalid field)`);
      }
      for (const warning of normalized.warnings) {
        console.warn(`[config] ${warning}`);
      }
      config = normalized.config;
    }
  }

  for (const { env: name, key } of ENV_OVERRIDES) {
    config[key] = parsePositiveIntEnv(name, config[key], env);
  }

  return config;
}
