/**
 * Launch policy for agent processes.
 *
 * Everything that reaches the agent's command line or environment goes
 * through here and is rejected with SPAWN_FAILED before any process exists:
 *
 *   1. environment: inherited variables filtered to an allowlist, minus a
 *      denylist of loader/runtime injection variables; caller overrides
 *      may only name allowlisted, non-denied variables (never PATH)
 *   2. arguments: built from spawn options, then validated against a
 *      fixed flag table plus the configured extra flags
 *   3. working directory: must exist
 *
 * Executable resolution order (highest priority first):
 *   1. config.agentExecutable
 *   2. AGENT_HOST_AGENT_BIN, when it exists
 *   3. `which claude`
 *   4. well-known install locations
 *   5. plain "claude" (spawn surfaces ENOENT)
 */

import { execFileSync } from "node:child_process";
import { existsSync, statSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { spawnFailed } from "./errors.js";
import type { PermissionMode } from "./types.js";

export interface EnvPolicy {
  envAllowlist: readonly string[];
  deniedEnvVars: readonly string[];
}

export const SESSION_ENV_VAR = "AGENT_HOST_SESSION";

const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** `NAME` matches exactly; `PREFIX_*` matches any name starting with `PREFIX_`. */
export function matchesEnvPattern(name: string, pattern: string): boolean {
  if (pattern.endsWith("*")) {
    return name.startsWith(pattern.slice(0, -1));
  }
  return name === pattern;
}

function isAllowlisted(name: string, policy: EnvPolicy): boolean {
  return policy.envAllowlist.some((pattern) => matchesEnvPattern(name, pattern));
}

function isDenied(name: string, policy: EnvPolicy): boolean {
  return policy.deniedEnvVars.some((pattern) => matchesEnvPattern(name, pattern));
}

/** Inherited variables the agent may see. */
export function filterInheritedEnv(
  source: NodeJS.ProcessEnv,
  policy: EnvPolicy,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [name, value] of Object.entries(source)) {
    if (value === undefined) continue;
    if (!isAllowlisted(name, policy) || isDenied(name, policy)) continue;
    env[name] = value;
  }
  return env;
}

/** Throws SPAWN_FAILED for the first override the policy rejects. */
export function validateEnvOverrides(overrides: Record<string, string>, policy: EnvPolicy): void {
  for (const [name, value] of Object.entries(overrides)) {
    if (!ENV_NAME.test(name)) {
      throw spawnFailed(`Invalid environment variable name: ${JSON.stringify(name)}`);
    }
    if (name === "PATH") {
      throw spawnFailed("Environment override of PATH is not allowed");
    }
    if (name === SESSION_ENV_VAR) {
      throw spawnFailed(`Environment override of ${SESSION_ENV_VAR} is not allowed`);
    }
    if (isDenied(name, policy)) {
      throw spawnFailed(`Environment variable ${name} is denied`);
    }
    if (!isAllowlisted(name, policy)) {
      throw spawnFailed(`Environment variable ${name} is not in the allowlist`);
    }
    if (value.includes("\0")) {
      throw spawnFailed(`Environment variable ${name} contains a NUL byte`);
    }
  }
}

export function buildAgentEnv(
  sessionId: string,
  overrides: Record<string, string> | undefined,
  policy: EnvPolicy,
  source: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  if (overrides) {
    validateEnvOverrides(overrides, policy);
  }
  return {
    ...filterInheritedEnv(source, policy),
    ...overrides,
    [SESSION_ENV_VAR]: sessionId,
  };
}

// ─── Arguments ───

export interface AgentArgOptions {
  maxTurns: number;
  permissionMode: PermissionMode;
  model?: string;
  allowedTools?: string[];
  disallowedTools?: string[];
  systemPrompt?: string;
  appendSystemPrompt?: string;
  addDirs?: string[];
  extraArgs?: Record<string, string | null>;
}

/** Flags the host itself emits, by number of values each takes. */
const FLAG_ARITY: ReadonlyMap<string, 0 | 1> = new Map<string, 0 | 1>([
  ["--print", 0],
  ["--verbose", 0],
  ["--output-format", 1],
  ["--input-format", 1],
  ["--max-turns", 1],
  ["--model", 1],
  ["--allowedTools", 1],
  ["--disallowedTools", 1],
  ["--permission-mode", 1],
  ["--permission-prompt-tool", 1],
  ["--system-prompt", 1],
  ["--append-system-prompt", 1],
  ["--add-dir", 1],
]);

const EXTRA_FLAG_NAME = /^[a-z][a-z0-9-]*$/;

export function buildAgentArgs(options: AgentArgOptions, allowedExtraFlags: readonly string[]): string[] {
  const args = [
    "--print",
    "--output-format",
    "stream-json",
    "--input-format",
    "stream-json",
    "--verbose",
    "--max-turns",
    String(options.maxTurns),
    "--permission-prompt-tool",
    "stdio",
  ];

  if (options.permissionMode !== "default") {
    args.push("--permission-mode", options.permissionMode);
  }
  if (options.model) {
    args.push("--model", options.model);
  }
  if (options.allowedTools?.length) {
    args.push("--allowedTools", options.allowedTools.join(","));
  }
  if (options.disallowedTools?.length) {
    args.push("--disallowedTools", options.disallowedTools.join(","));
  }
  if (options.systemPrompt) {
    args.push("--system-prompt", options.systemPrompt);
  }
  if (options.appendSystemPrompt) {
    args.push("--append-system-prompt", options.appendSystemPrompt);
  }
  for (const dir of options.addDirs ?? []) {
    args.push("--add-dir", dir);
  }

  for (const [name, value] of Object.entries(options.extraArgs ?? {})) {
    if (!EXTRA_FLAG_NAME.test(name) || !allowedExtraFlags.includes(name)) {
      throw spawnFailed(`Flag --${name} is not allowed`);
    }
    if (value === null) {
      args.push(`--${name}`);
      continue;
    }
    if (value.startsWith("-")) {
      throw spawnFailed(`Value for --${name} must not start with "-"`);
    }
    args.push(`--${name}`, value);
  }

  validateArgs(args, allowedExtraFlags);
  return args;
}

/**
 * Check a finished argv against the flag table. Known flags consume their
 * fixed number of values; allowed extra flags take at most one value.
 */
export function validateArgs(args: readonly string[], allowedExtraFlags: readonly string[]): void {
  let i = 0;
  while (i < args.length) {
    const token = args[i];
    if (token.includes("\0")) {
      throw spawnFailed("Arguments must not contain NUL bytes");
    }
    if (!token.startsWith("--")) {
      throw spawnFailed(`Unexpected positional argument: ${JSON.stringify(token)}`);
    }

    const arity = FLAG_ARITY.get(token);
    if (arity !== undefined) {
      if (arity > 0 && i + arity >= args.length) {
        throw spawnFailed(`Flag ${token} requires a value`);
      }
      for (let v = 1; v <= arity; v += 1) {
        if (args[i + v].includes("\0")) {
          throw spawnFailed("Arguments must not contain NUL bytes");
        }
      }
      i += 1 + arity;
      continue;
    }

    if (allowedExtraFlags.includes(token.slice(2))) {
      const next = args[i + 1];
      i += next !== undefined && !next.startsWith("-") ? 2 : 1;
      continue;
    }

    throw spawnFailed(`Unknown flag: ${token}`);
  }
}

// ─── Working Directory ───

export function resolveWorkingDirectory(dir: string | undefined): string {
  if (dir === undefined) {
    return process.cwd();
  }
  const expanded = dir === "~" || dir.startsWith("~/") ? join(homedir(), dir.slice(1)) : dir;
  const absolute = resolve(expanded);
  if (!existsSync(absolute) || !statSync(absolute).isDirectory()) {
    throw spawnFailed(`Working directory not found: ${absolute}`);
  }
  return absolute;
}

// ─── Executable Resolution ───

function whichSync(name: string): string | null {
  try {
    const discovered = execFileSync("which", [name], {
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "ignore"],
    }).trim();
    return discovered.length > 0 ? discovered : null;
  } catch {
    return null;
  }
}

export function wellKnownAgentPaths(): string[] {
  const home = homedir();
  return [
    join(home, ".claude", "local", "claude"),
    join(home, ".local", "bin", "claude"),
    "/opt/homebrew/bin/claude",
    "/usr/local/bin/claude",
  ];
}

export function resolveAgentExecutable(
  configured: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (configured) {
    return configured;
  }

  const envPath = env.AGENT_HOST_AGENT_BIN;
  if (envPath && existsSync(envPath)) {
    return envPath;
  }

  const discovered = whichSync("claude");
  if (discovered) {
    return discovered;
  }

  for (const candidate of wellKnownAgentPaths()) {
    if (existsSync(candidate)) {
      return candidate;
    }
  }

  return "claude";
}
