import { afterEach, describe, expect, it } from "vitest";
import { ToolListPolicy } from "../src/permission-policy.js";
import { AgentSession, type AgentSessionOptions, type SessionLimits } from "../src/session.js";
import type { SessionState } from "../src/types.js";
import { delay, waitForCondition } from "./harness/async.js";
import {
  FakeLauncher,
  type FakeAgentProcess,
  assistantFrame,
  canUseToolFrame,
  resultFrame,
  systemInitFrame,
  type FakeAgentOptions,
} from "./harness/fake-agent.js";

const LIMITS: SessionLimits = {
  bufferCapacity: 100,
  bufferMaxBytes: 1024 * 1024,
  maxFrameBytes: 1024 * 1024,
  ioTimeoutMs: 200,
  terminateGraceMs: 100,
  idleTimeoutMs: 60_000,
  workingThresholdMs: 2_000,
  maxPendingWrites: 16,
  stderrTailLines: 5,
};

const sessions: AgentSession[] = [];

afterEach(async () => {
  await Promise.all(sessions.splice(0).map((session) => session.terminate()));
});

function setup(
  options: {
    agent?: FakeAgentOptions;
    session?: Partial<AgentSessionOptions>;
    limits?: Partial<SessionLimits>;
    configure?: (proc: FakeAgentProcess) => void;
  } = {},
) {
  const launcher = new FakeLauncher(options.agent, options.configure);
  const transitions: Array<[SessionState, SessionState]> = [];
  const session = new AgentSession({
    id: "s1",
    label: "agent",
    maxTurns: 3,
    launch: { command: "fake-agent", args: [], cwd: "/tmp", env: {}, launcher: launcher.launch },
    limits: { ...LIMITS, ...options.limits },
    policy: new ToolListPolicy({ allowedTools: ["Read"] }),
    observer: {
      onMessage: () => {},
      onStateChange: (s, previous) => {
        transitions.push([previous, s.state]);
      },
    },
    ...options.session,
  });
  sessions.push(session);
  return { launcher, session, transitions };
}

describe("AgentSession lifecycle", () => {
  it("writes init, then the opening prompts", async () => {
    const { launcher, session } = setup();

    await session.start(["hello", "and more"]);
    await waitForCondition(() => session.promptCount === 2);

    const proc = launcher.last;
    expect(proc.received[0]).toMatchObject({ type: "control_request", request: { subtype: "initialize" } });
    expect(proc.prompts).toEqual(["hello", "and more"]);
    expect(session.state).toBe("initializing");
    expect(session.promptCount).toBe(2);
  });

  it("returns from start before the agent has read its input", async () => {
    const { launcher, session } = setup({
      limits: { ioTimeoutMs: 30 },
      configure: (proc) => {
        proc.stallWrites = true;
      },
    });

    await session.start(["hello"]);
    expect(session.state).toBe("initializing");
    expect(session.promptCount).toBe(0);

    await expect(session.settled).resolves.toBe("failed");
    expect(session.failureReason).toBe("Write to agent timed out after 30ms: s1");
    expect(launcher.last.kills).toEqual(["SIGKILL"]);
  });

  it("becomes active on the first frame and completes at the turn limit", async () => {
    const { launcher, session, transitions } = setup({ session: { maxTurns: 1 } });
    await session.start(["hello"]);

    const proc = launcher.last;
    proc.emitFrame(systemInitFrame());
    proc.emitFrame(assistantFrame("Hi there\nSecond line"));
    proc.emitFrame(resultFrame(1));

    await expect(session.settled).resolves.toBe("completed");
    expect(proc.stdinEnded).toBe(true);
    expect(transitions).toEqual([
      ["initializing", "active"],
      ["active", "completed"],
    ]);

    const info = session.info();
    expect(info.turnCount).toBe(1);
    expect(info.messageCount).toBe(3);
    expect(info.exitCode).toBe(0);
    expect(info.lastOutput).toEqual(["Hi there", "Second line"]);
    expect(info.failureReason).toBeUndefined();
    expect(info.endedAt).toBeDefined();
  });

  it("addresses follow-up prompts to the agent's own session id", async () => {
    const { launcher, session } = setup();
    await session.start(["hello"]);

    launcher.last.emitFrame(systemInitFrame());
    await waitForCondition(() => session.state === "active");
    await session.sendPrompt("next");

    const users = launcher.last.framesOfType("user");
    expect(users.map((frame) => frame.session_id)).toEqual(["default", "agent-session-1"]);
    expect(session.promptCount).toBe(2);
  });

  it("fails when the agent exits before finishing a turn", async () => {
    const { launcher, session, transitions } = setup();
    await session.start(["hello"]);

    launcher.last.exit(0);

    await expect(session.settled).resolves.toBe("failed");
    expect(session.failureReason).toBe("Agent exited before completing a turn");
    expect(transitions).toEqual([["initializing", "failed"]]);
    expect(session.read(0, 10).messages.map((entry) => entry.message)).toEqual([
      { type: "error", code: "TRANSPORT_IO", message: "Agent exited before completing a turn" },
    ]);
  });

  it("reports the exit code with the last stderr line", async () => {
    const { launcher, session } = setup();
    await session.start(["hello"]);

    launcher.last.emitStderr("fatal: bad credentials\n");
    await delay(20);
    launcher.last.exit(1);

    await expect(session.settled).resolves.toBe("failed");
    expect(session.failureReason).toBe("Agent exited with code 1: fatal: bad credentials");
  });

  it("reports an agent killed by a signal", async () => {
    const { launcher, session } = setup();
    await session.start(["hello"]);

    launcher.last.exit(null, "SIGSEGV");

    await expect(session.settled).resolves.toBe("failed");
    expect(session.failureReason).toBe("Agent killed by SIGSEGV");
  });

  it("fails when the process cannot be spawned", async () => {
    const { session } = setup({ agent: { spawn: { error: new Error("spawn fake-agent ENOENT") } } });

    await expect(session.start(["hello"])).rejects.toMatchObject({ code: "SPAWN_FAILED" });
    expect(session.state).toBe("failed");
    expect(session.failureReason).toBe("Failed to spawn fake-agent: spawn fake-agent ENOENT");
  });

  it("becomes active on a frame that carries no messages", async () => {
    const { launcher, session } = setup();
    await session.start(["hello"]);

    launcher.last.emitFrame({ type: "user", message: { role: "user", content: [] } });

    await waitForCondition(() => session.state === "active");
    expect(session.buffer.totalAppended).toBe(0);
  });

  it("records malformed frames without changing state", async () => {
    const { launcher, session } = setup();
    await session.start(["hello"]);

    launcher.last.emitRaw("garbage\n");

    await waitForCondition(() => session.buffer.size === 1);
    const [entry] = session.read(0, 1).messages;
    expect(entry?.message).toMatchObject({ type: "error", code: "PROTOCOL_DECODE" });
    expect(session.state).toBe("initializing");
  });

  it("reports working while messages are recent", async () => {
    const { launcher, session } = setup();
    await session.start(["hello"]);

    launcher.last.emitFrame(assistantFrame("thinking out loud"));
    await waitForCondition(() => session.buffer.size === 1);

    expect(session.isWorking()).toBe(true);
    expect(session.isWorking(Date.now() + 5_000)).toBe(false);
  });
});

describe("AgentSession termination", () => {
  it("terminates once and refuses further prompts", async () => {
    const { launcher, session } = setup();
    await session.start(["hello"]);

    await expect(session.terminate()).resolves.toBe("terminated");
    await expect(session.terminate()).resolves.toBe("terminated");
    expect(session.failureReason).toBe("terminated by caller");
    expect(launcher.last.framesOfType("control_request").at(-1)).toMatchObject({
      request: { subtype: "interrupt" },
    });

    const written = launcher.last.received.length;
    await expect(session.sendPrompt("more")).rejects.toMatchObject({
      code: "SESSION_NOT_ACTIVE",
      message: "Session s1 is not active (state=terminated)",
    });
    expect(launcher.last.received).toHaveLength(written);
  });

  it("terminates without launching when stopped before start", async () => {
    const { launcher, session } = setup();

    await expect(session.terminate()).resolves.toBe("terminated");
    await session.start(["hello"]);

    expect(launcher.calls).toHaveLength(0);
    expect(session.state).toBe("terminated");
  });

  it("terminates an idle session", async () => {
    const { session } = setup({ limits: { idleTimeoutMs: 30 } });
    await session.start(["hello"]);

    await expect(session.settled).resolves.toBe("terminated");
    expect(session.failureReason).toBe("idle timeout");
  });

  it("refuses prompts once the turn limit is reached", async () => {
    const { launcher, session } = setup({ session: { maxTurns: 1 }, agent: { exitOnStdinEnd: null } });
    await session.start(["hello"]);

    launcher.last.emitFrame(resultFrame(1));
    await waitForCondition(() => launcher.last.stdinEnded);

    await expect(session.sendPrompt("one more")).rejects.toMatchObject({
      code: "SESSION_NOT_ACTIVE",
      message: "Session s1 reached its turn limit (1)",
    });
  });
});

describe("AgentSession permission requests", () => {
  function responses(launcher: FakeLauncher) {
    return launcher.last.framesOfType("control_response").map((frame) => frame.response);
  }

  it("answers allowed and denied tools from the policy", async () => {
    const { launcher, session } = setup();
    await session.start(["hello"]);

    launcher.last.emitFrame(canUseToolFrame("req_1", "Read", { path: "a.txt" }));
    launcher.last.emitFrame(canUseToolFrame("req_2", "Bash", { command: "rm -rf /" }));

    await waitForCondition(() => responses(launcher).length === 2);
    expect(responses(launcher)).toEqual([
      { subtype: "success", request_id: "req_1", response: { behavior: "allow", updatedInput: { path: "a.txt" } } },
      {
        subtype: "success",
        request_id: "req_2",
        response: { behavior: "deny", message: "Tool Bash is not in the allowed tools", interrupt: false },
      },
    ]);
  });

  it("answers unsupported requests with an error", async () => {
    const { launcher, session } = setup();
    await session.start(["hello"]);

    launcher.last.emitFrame({ type: "control_request", request_id: "req_3", request: { subtype: "mcp_message" } });

    await waitForCondition(() => responses(launcher).length === 1);
    expect(responses(launcher)).toEqual([
      { subtype: "error", request_id: "req_3", error: "Unsupported control request: mcp_message" },
    ]);
  });

  it("uses a custom policy", async () => {
    const { launcher, session } = setup({
      session: { policy: { decide: () => ({ action: "allow", updatedInput: { path: "safe.txt" } }) } },
    });
    await session.start(["hello"]);

    launcher.last.emitFrame(canUseToolFrame("req_4", "Write", { path: "/etc/passwd" }));

    await waitForCondition(() => responses(launcher).length === 1);
    expect(responses(launcher)).toEqual([
      { subtype: "success", request_id: "req_4", response: { behavior: "allow", updatedInput: { path: "safe.txt" } } },
    ]);
  });
});
