import {
  APPROVAL_REQUIRED_NOTICE,
  ComputerUseLoop,
  describeAction,
  LoopOptions,
  WAIT_LIMIT_NOTICE,
} from "../src/core/computerUseLoop";
import { ContinuationContext } from "../src/core/continuationContext";
import { ContinuationDispatcher } from "../src/core/continuationDispatcher";
import { ExecutionError } from "../src/core/errors";
import { SafetyApprovalGate } from "../src/core/safetyGate";
import { systemScheduler } from "../src/core/scheduler";
import { ActionResult, ControlAction, ModelResponse, SafetyCheck } from "../src/core/types";
import { computerCall, deferred, FakeTransport, response } from "./helpers/fakeTransport";

const CLICK: ControlAction = { type: "click", x: 10, y: 20, button: "left" };
const WAIT: ControlAction = { type: "wait" };
const CHECK: SafetyCheck = { id: "sc_1", code: "malicious_instructions", message: "Review the page before continuing." };

function setup(options: Partial<LoopOptions> = {}) {
  const transport = new FakeTransport();
  const context = new ContinuationContext("sess-1");
  const dispatcher = new ContinuationDispatcher(
    {
      sessionId: "sess-1",
      transport,
      context,
      scheduler: systemScheduler,
      sink: {
        applyChunk: jest.fn(),
        applyResponse: (model: ModelResponse) => context.advance(model.id),
      },
    },
    { streaming: false, replaysReasoning: false, reasoningPollAttempts: 0, reasoningPollIntervalMs: 0 },
  );
  const gate = new SafetyApprovalGate("sess-1");
  const images: string[] = [];
  const host = {
    messageImages: jest.fn(() => images),
    attachVisual: jest.fn((_messageId: string, image: string) => {
      images.push(image);
    }),
    notice: jest.fn(),
    fail: jest.fn(),
    setStatus: jest.fn(),
    activity: jest.fn(),
  };
  const executor = {
    executeAction: jest.fn(async (_action: ControlAction): Promise<ActionResult> => ({
      visualArtifact: "shot-1",
      currentLocation: "https://example.test/",
    })),
  };
  const loop = new ComputerUseLoop(
    { sessionId: "sess-1", transport, dispatcher, context, executor, gate, host },
    { maxIterations: 5, maxConsecutiveWaits: 3, lowLevelThreshold: 3, blankThreshold: 2, strict: false, ...options },
  );
  return { transport, context, gate, images, host, executor, loop, controller: new AbortController() };
}

/** Stores `resp_1` holding `first` and queues one reply per later action, then a final reply without one. */
function chain(transport: FakeTransport, first: ControlAction | null, later: ControlAction[] = []): void {
  transport.store(response("resp_1", [computerCall("call_1", first)]));
  later.forEach((action, index) => {
    transport.enqueueResponse(response(`resp_${index + 2}`, [computerCall(`call_${index + 2}`, action)]));
  });
  transport.enqueueResponse(response(`resp_${later.length + 2}`, [], "Done."));
}

describe("ComputerUseLoop", () => {
  test("performs the pending action and sends the screenshot back", async () => {
    const { transport, context, images, host, executor, loop, controller } = setup();
    chain(transport, CLICK);
    context.advance("resp_1");

    const outcome = await loop.resolvePending("msg_1", controller.signal);

    expect(outcome).toEqual({ resolvedAny: true, alreadyRunning: false, suspended: false });
    expect(executor.executeAction).toHaveBeenCalledWith(CLICK);
    expect(transport.calls).toEqual([{
      method: "resume",
      outputs: [{
        type: "computer_call_output",
        callId: "call_1",
        screenshot: "shot-1",
        acknowledgedSafetyChecks: [],
        currentUrl: "https://example.test/",
      }],
      continuationId: "resp_1",
      reasoning: null,
    }]);
    expect(transport.fetched).toEqual(["resp_1", "resp_2"]);
    expect(images).toEqual(["shot-1"]);
    expect(host.activity).toHaveBeenCalledWith("Computer: click at (10, 20)");
    expect(context.continuationId).toBe("resp_2");
  });

  test("does nothing without a continuation id", async () => {
    const { transport, loop, controller } = setup();

    const outcome = await loop.resolvePending("msg_1", controller.signal);

    expect(outcome).toEqual({ resolvedAny: false, alreadyRunning: false, suspended: false });
    expect(transport.fetched).toEqual([]);
  });

  test("suspends an action that carries safety checks", async () => {
    const { transport, context, gate, host, executor, loop, controller } = setup();
    transport.store(response("resp_1", [computerCall("call_1", CLICK, [CHECK])]));
    context.advance("resp_1");

    const outcome = await loop.resolvePending("msg_1", controller.signal);

    expect(outcome).toEqual({ resolvedAny: false, alreadyRunning: false, suspended: true });
    expect(gate.pending).toEqual({
      action: CLICK,
      callId: "call_1",
      continuationId: "resp_1",
      messageId: "msg_1",
      checks: [CHECK],
    });
    expect(host.notice).toHaveBeenCalledWith(APPROVAL_REQUIRED_NOTICE);
    expect(host.setStatus).toHaveBeenLastCalledWith({ kind: "awaiting-approval" });
    expect(executor.executeAction).not.toHaveBeenCalled();
    expect(context.continuationId).toBe("resp_1");
  });

  test("an approved action carries its acknowledged checks", async () => {
    const { transport, context, loop, controller } = setup();
    transport.enqueueResponse(response("resp_2", [], "Done."));
    context.advance("resp_1");

    const outcome = await loop.approve(
      { action: CLICK, callId: "call_1", continuationId: "resp_1", messageId: "msg_1", checks: [CHECK] },
      controller.signal,
    );

    expect(outcome).toEqual({ resolvedAny: true, alreadyRunning: false, suspended: false });
    expect(transport.calls[0].outputs).toEqual([
      {
        type: "computer_call_output",
        callId: "call_1",
        screenshot: "shot-1",
        acknowledgedSafetyChecks: [CHECK],
        currentUrl: "https://example.test/",
      },
    ]);
    expect(context.continuationId).toBe("resp_2");
  });

  test("stops after too many consecutive waits once the last screenshot is sent", async () => {
    const { transport, context, host, executor, loop, controller } = setup();
    chain(transport, WAIT, [WAIT, WAIT]);
    context.advance("resp_1");

    const outcome = await loop.resolvePending("msg_1", controller.signal);

    expect(outcome).toEqual({ resolvedAny: true, alreadyRunning: false, suspended: false, halt: "wait_limit" });
    expect(executor.executeAction).toHaveBeenCalledTimes(3);
    expect(transport.calls).toHaveLength(3);
    expect(host.notice).toHaveBeenCalledWith(WAIT_LIMIT_NOTICE);
    expect(context.continuationId).toBeNull();
  });

  test("halts on a screenshot request when one is already attached", async () => {
    const { transport, context, images, executor, loop, controller } = setup();
    images.push("shot-0");
    chain(transport, { type: "screenshot" });
    context.advance("resp_1");

    const outcome = await loop.resolvePending("msg_1", controller.signal);

    expect(outcome).toEqual({ resolvedAny: false, alreadyRunning: false, suspended: false, halt: "redundant_capture" });
    expect(executor.executeAction).not.toHaveBeenCalled();
    expect(context.continuationId).toBeNull();
  });

  test("halts a low-level action on the third pass once a screenshot is attached", async () => {
    const { transport, context, executor, loop, controller } = setup();
    chain(transport, CLICK, [CLICK, CLICK, CLICK]);
    context.advance("resp_1");

    const outcome = await loop.resolvePending("msg_1", controller.signal);

    expect(outcome).toEqual({ resolvedAny: true, alreadyRunning: false, suspended: false, halt: "low_level_repeat" });
    expect(executor.executeAction).toHaveBeenCalledTimes(2);
    expect(context.continuationId).toBeNull();
  });

  test("halts a low-level action on the second pass when the page is blank", async () => {
    const { transport, context, executor, loop, controller } = setup();
    executor.executeAction.mockResolvedValue({ visualArtifact: "shot-1", currentLocation: "about:blank" });
    chain(transport, CLICK, [CLICK, CLICK]);
    context.advance("resp_1");

    const outcome = await loop.resolvePending("msg_1", controller.signal);

    expect(outcome).toEqual({ resolvedAny: true, alreadyRunning: false, suspended: false, halt: "blank_state" });
    expect(executor.executeAction).toHaveBeenCalledTimes(1);
  });

  test("strict mode skips the heuristics and stops at the iteration limit", async () => {
    const { transport, context, executor, loop, controller } = setup({ strict: true, maxIterations: 3 });
    executor.executeAction.mockResolvedValue({ visualArtifact: "shot-1", currentLocation: "about:blank" });
    chain(transport, CLICK, [CLICK, CLICK]);
    context.advance("resp_1");

    const outcome = await loop.resolvePending("msg_1", controller.signal);

    expect(outcome).toEqual({ resolvedAny: true, alreadyRunning: false, suspended: false, halt: "iteration_limit" });
    expect(executor.executeAction).toHaveBeenCalledTimes(3);
    expect(context.continuationId).toBeNull();
  });

  test("halts when the response cannot be fetched", async () => {
    const { context, host, loop, controller } = setup();
    context.advance("resp_missing");

    const outcome = await loop.resolvePending("msg_1", controller.signal);

    expect(outcome).toEqual({ resolvedAny: false, alreadyRunning: false, suspended: false, halt: "fetch_failed" });
    expect(host.fail).not.toHaveBeenCalled();
    expect(context.continuationId).toBeNull();
  });

  test("halts on a call without an action", async () => {
    const { transport, context, loop, controller } = setup();
    chain(transport, null);
    context.advance("resp_1");

    const outcome = await loop.resolvePending("msg_1", controller.signal);

    expect(outcome.halt).toBe("malformed_call");
  });

  test("reports an executor failure to the host", async () => {
    const { transport, context, host, executor, loop, controller } = setup();
    executor.executeAction.mockRejectedValue(new Error("display offline"));
    chain(transport, CLICK);
    context.advance("resp_1");

    const outcome = await loop.resolvePending("msg_1", controller.signal);

    expect(outcome.halt).toBe("execution_failed");
    expect(host.fail).toHaveBeenCalledWith("msg_1", new ExecutionError('Computer action "click" failed: display offline'));
    expect(transport.calls).toHaveLength(0);
  });

  test("halts when the action produced no screenshot", async () => {
    const { transport, context, executor, loop, controller } = setup();
    executor.executeAction.mockResolvedValue({});
    chain(transport, CLICK);
    context.advance("resp_1");

    const outcome = await loop.resolvePending("msg_1", controller.signal);

    expect(outcome.halt).toBe("no_visual");
    expect(transport.calls).toHaveLength(0);
  });

  test("runs one resolution at a time", async () => {
    const { transport, context, executor, loop, controller } = setup();
    const screenshot = deferred<ActionResult>();
    executor.executeAction.mockReturnValue(screenshot.promise);
    chain(transport, CLICK);
    context.advance("resp_1");

    const first = loop.resolvePending("msg_1", controller.signal);
    await Promise.resolve();
    const second = await loop.resolvePending("msg_1", controller.signal);

    expect(second).toEqual({ resolvedAny: false, alreadyRunning: true, suspended: false });
    screenshot.resolve({ visualArtifact: "shot-1" });
    expect(await first).toEqual({ resolvedAny: true, alreadyRunning: false, suspended: false });
    expect(loop.isRunning).toBe(false);
  });
});

describe("describeAction", () => {
  test("labels actions by their most telling field", () => {
    expect(describeAction(CLICK)).toBe("Computer: click at (10, 20)");
    expect(describeAction({ type: "type", text: "hello" })).toBe('Computer: type "hello"');
    expect(describeAction({ type: "navigate", url: "https://example.test/" })).toBe("Computer: navigate https://example.test/");
    expect(describeAction(WAIT)).toBe("Computer: wait");
  });
});
