import { ExecutionError } from "../src/core/errors";
import { systemScheduler } from "../src/core/scheduler";
import { EventEnvelope } from "../src/core/types";
import { ClientBridge, COMPUTER_ACTION_TOOL } from "../src/tools/clientBridge";

function setup(timeoutMs = 1_000) {
  const emit = jest.fn((_event: EventEnvelope) => undefined);
  let nextId = 0;
  const bridge = new ClientBridge("sess-1", emit, {
    timeoutMs,
    scheduler: systemScheduler,
    newId: () => `call-${++nextId}`,
  });
  return { emit, bridge };
}

beforeEach(() => {
  jest.useFakeTimers();
});

afterEach(() => {
  jest.useRealTimers();
});

describe("ClientBridge", () => {
  test("sends a tool.call and resolves with the client's output", async () => {
    const { emit, bridge } = setup();

    const pending = bridge.executeNamedFunction("get_weather", '{"city":"Paris"}');

    expect(emit).toHaveBeenCalledTimes(1);
    expect(emit.mock.calls[0][0]).toMatchObject({
      type: "tool.call",
      sessionId: "sess-1",
      payload: { callId: "call-1", name: "get_weather", arguments: '{"city":"Paris"}' },
    });

    expect(bridge.handleResult({ callId: "call-1", output: "sunny" })).toBe(true);
    await expect(pending).resolves.toBe("sunny");
    expect(bridge.pendingCount).toBe(0);
  });

  test("rejects when the client reports an error", async () => {
    const { bridge } = setup();

    const pending = bridge.executeNamedFunction("get_weather", "{}");
    bridge.handleResult({ callId: "call-1", error: "city not found" });

    await expect(pending).rejects.toEqual(new ExecutionError("city not found"));
  });

  test("runs computer actions and maps screenshot and location", async () => {
    const { emit, bridge } = setup();

    const pending = bridge.executeAction({ type: "scroll", x: 0, y: 0, scroll_y: 400 });
    expect(emit.mock.calls[0][0].payload).toEqual({
      callId: "call-1",
      name: COMPUTER_ACTION_TOOL,
      arguments: '{"type":"scroll","x":0,"y":0,"scroll_y":400}',
    });

    bridge.handleResult({ callId: "call-1", screenshot: "aGVsbG8=", currentUrl: "https://example.test/" });

    await expect(pending).resolves.toEqual({ visualArtifact: "aGVsbG8=", currentLocation: "https://example.test/" });
  });

  test("times out calls the client never answers", async () => {
    const { bridge } = setup(1_000);

    const pending = bridge.executeNamedFunction("slow_tool", "{}");
    const assertion = expect(pending).rejects.toEqual(new ExecutionError("Tool slow_tool timed out after 1000ms"));
    await jest.advanceTimersByTimeAsync(1_000);

    await assertion;
    expect(bridge.handleResult({ callId: "call-1", output: "late" })).toBe(false);
  });

  test("rejectAll fails every waiting call", async () => {
    const { bridge } = setup();

    const first = bridge.executeNamedFunction("a", "{}");
    const second = bridge.executeNamedFunction("b", "{}");
    bridge.rejectAll("Client disconnected");

    await expect(first).rejects.toEqual(new ExecutionError("Client disconnected"));
    await expect(second).rejects.toEqual(new ExecutionError("Client disconnected"));
    expect(bridge.pendingCount).toBe(0);
  });

  test("rebind sends later calls to the new socket", () => {
    const { emit, bridge } = setup();
    const replacement = jest.fn((_event: EventEnvelope) => undefined);

    bridge.rebind(replacement);
    void bridge.executeNamedFunction("get_time", "{}").catch(() => undefined);

    expect(emit).not.toHaveBeenCalled();
    expect(replacement).toHaveBeenCalledTimes(1);
  });
});
