import type { JsonObject, PermissionMode } from "./types.js";

export type PolicyAction = "allow" | "deny";

export type PolicyQuery =
  | { kind: "tool"; sessionId: string; toolName: string; input: JsonObject; toolUseId?: string }
  | { kind: "hook"; sessionId: string; callbackId: string; input: JsonObject; toolUseId?: string };

export type PolicyVerdict =
  | { action: "allow"; updatedInput?: JsonObject; reason?: string }
  | { action: "deny"; reason: string; interrupt?: boolean };

/** Answers the agent's permission and hook queries. */
export interface PermissionPolicy {
  decide(query: PolicyQuery): PolicyVerdict | Promise<PolicyVerdict>;
}

// ─── Tool Patterns ───

function escapeRegExp(text: string): string {
  return text.replace(/[.+?^${}()[\]\\]/g, "\\$&");
}

/**
 * Match a tool name against a pattern. `*` matches any run of characters
 * and `|` separates alternatives: `Read|Grep`, `mcp__*`, `*`.
 */
export function matchesToolPattern(toolName: string, pattern: string): boolean {
  return pattern.split("|").some((raw) => {
    const alt = raw.trim();
    if (alt.length === 0) return false;
    if (alt === "*") return true;
    if (!alt.includes("*")) return alt === toolName;
    const regex = new RegExp(`^${alt.split("*").map(escapeRegExp).join(".*")}$`);
    return regex.test(toolName);
  });
}

// ─── ToolListPolicy ───

export interface ToolListPolicyOptions {
  allowedTools?: string[];
  disallowedTools?: string[];
  permissionMode?: PermissionMode;
  defaultAction?: PolicyAction;
}

/**
 * Default policy built from a session's spawn options.
 *
 * Order: denied patterns, allowed patterns, bypassPermissions mode, then
 * the default action (deny). Hook callbacks are always continued.
 */
export class ToolListPolicy implements PermissionPolicy {
  private readonly allowed: string[];
  private readonly denied: string[];
  private readonly permissionMode: PermissionMode;
  private readonly defaultAction: PolicyAction;

  constructor(options: ToolListPolicyOptions = {}) {
    this.allowed = options.allowedTools ?? [];
    this.denied = options.disallowedTools ?? [];
    this.permissionMode = options.permissionMode ?? "default";
    this.defaultAction = options.defaultAction ?? "deny";
  }

  decide(query: PolicyQuery): PolicyVerdict {
    if (query.kind === "hook") {
      return { action: "allow" };
    }

    const { toolName } = query;
    const deniedBy = this.denied.find((pattern) => matchesToolPattern(toolName, pattern));
    if (deniedBy) {
      return { action: "deny", reason: `Tool ${toolName} is denied (${deniedBy})` };
    }

    const allowedBy = this.allowed.find((pattern) => matchesToolPattern(toolName, pattern));
    if (allowedBy) {
      return { action: "allow", reason: `allowed (${allowedBy})` };
    }

    if (this.permissionMode === "bypassPermissions") {
      return { action: "allow", reason: "bypassPermissions" };
    }

    return this.defaultAction === "allow"
      ? { action: "allow", reason: "default" }
      : { action: "deny", reason: `Tool ${toolName} is not in the allowed tools` };
  }
}

// ─── Evaluation ───

/**
 * Ask the policy, bounded by `timeoutMs`. A policy that throws or does not
 * answer in time is treated as deny.
 */
export async function evaluatePolicy(
  policy: PermissionPolicy,
  query: PolicyQuery,
  timeoutMs: number,
): Promise<PolicyVerdict> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<PolicyVerdict>((resolve) => {
    timer = setTimeout(() => {
      resolve({ action: "deny", reason: `Permission policy timed out after ${timeoutMs}ms` });
    }, timeoutMs);
  });

  try {
    return await Promise.race([Promise.resolve().then(() => policy.decide(query)), timeout]);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { action: "deny", reason: `Permission policy failed: ${message}` };
  } finally {
    clearTimeout(timer);
  }
}

/** The `response` payload of a successful control_response for this verdict. */
export function verdictToResponse(query: PolicyQuery, verdict: PolicyVerdict): JsonObject {
  if (query.kind === "hook") {
    return verdict.action === "allow"
      ? { continue: true }
      : { continue: false, decision: "block", reason: verdict.reason };
  }

  if (verdict.action === "allow") {
    return { behavior: "allow", updatedInput: verdict.updatedInput ?? query.input };
  }
  return { behavior: "deny", message: verdict.reason, interrupt: verdict.interrupt ?? false };
}
