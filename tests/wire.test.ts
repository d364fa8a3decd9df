import { parseOutputItem, parseResponse, parseStreamEvent, stampResponseIds, toInputItems } from "../src/providers/wire";
import { StreamChunk } from "../src/core/types";

async function collect(events: unknown[]): Promise<StreamChunk[]> {
  async function* source() {
    yield* events;
  }
  const chunks: StreamChunk[] = [];
  for await (const chunk of stampResponseIds(source())) {
    chunks.push(chunk);
  }
  return chunks;
}

describe("parseOutputItem", () => {
  test("reads function calls", () => {
    expect(parseOutputItem({
      type: "function_call",
      id: "fc_1",
      call_id: "call_1",
      name: "get_weather",
      arguments: '{"city":"Paris"}',
      status: "completed",
    })).toEqual({
      type: "function_call",
      id: "fc_1",
      callId: "call_1",
      name: "get_weather",
      arguments: '{"city":"Paris"}',
      status: "completed",
    });
  });

  test("reads computer calls with their safety checks", () => {
    expect(parseOutputItem({
      type: "computer_call",
      id: "cu_1",
      call_id: "call_1",
      action: { type: "click", x: 3, y: 4, button: "left" },
      pending_safety_checks: [{ id: "sc_1", code: "sensitive_domain", message: "Payments page" }, "junk"],
    })).toEqual({
      type: "computer_call",
      id: "cu_1",
      callId: "call_1",
      action: { type: "click", x: 3, y: 4, button: "left" },
      pendingSafetyChecks: [{ id: "sc_1", code: "sensitive_domain", message: "Payments page" }],
      status: undefined,
    });
  });

  test("keeps a missing action as null", () => {
    expect(parseOutputItem({ type: "computer_call", id: "cu_1", call_id: "call_1", action: {} }))
      .toMatchObject({ action: null, pendingSafetyChecks: [] });
  });

  test("reads reasoning summaries and leaves an absent summary null", () => {
    expect(parseOutputItem({
      type: "reasoning",
      id: "rs_1",
      summary: [{ type: "summary_text", text: "Compared prices" }],
      encrypted_content: "opaque",
    })).toEqual({ type: "reasoning", id: "rs_1", summary: ["Compared prices"], encryptedContent: "opaque" });
    expect(parseOutputItem({ type: "reasoning", id: "rs_2" })).toMatchObject({ summary: null });
  });

  test("marks unfamiliar items", () => {
    expect(parseOutputItem({ type: "web_search_call", id: "ws_1" })).toEqual({ type: "unknown", id: "ws_1", kind: "web_search_call" });
    expect(parseOutputItem("nope")).toBeNull();
  });
});

describe("parseResponse", () => {
  test("joins message text when output_text is absent", () => {
    const parsed = parseResponse({
      id: "resp_1",
      output: [
        { type: "message", id: "msg_a", content: [{ type: "output_text", text: "Hello " }, { type: "refusal", refusal: "x" }] },
        { type: "message", id: "msg_b", content: [{ type: "output_text", text: "there." }] },
      ],
    });

    expect(parsed.id).toBe("resp_1");
    expect(parsed.status).toBe("completed");
    expect(parsed.outputText).toBe("Hello there.");
    expect(parsed.error).toBeUndefined();
  });
});

describe("parseStreamEvent", () => {
  test("reads deltas", () => {
    expect(parseStreamEvent({ type: "response.output_text.delta", delta: "Hi", item_id: "msg_1" }))
      .toEqual({ kind: "response.output_text.delta", delta: "Hi" });
  });

  test("reads error events", () => {
    expect(parseStreamEvent({ type: "error", code: "server_error", message: "Overloaded" })).toEqual({
      kind: "error",
      error: { code: "server_error", message: "Overloaded" },
    });
  });

  test("takes a failed response's error", () => {
    const chunk = parseStreamEvent({
      type: "response.failed",
      response: { id: "resp_1", status: "failed", output: [], error: { code: "server_error", message: "Boom" } },
    });

    expect(chunk.responseId).toBe("resp_1");
    expect(chunk.error).toEqual({ code: "server_error", message: "Boom" });
  });
});

describe("stampResponseIds", () => {
  test("stamps item events with the last response id seen", async () => {
    const chunks = await collect([
      { type: "response.created", response: { id: "resp_1", status: "in_progress", output: [] } },
      { type: "response.output_text.delta", delta: "Hi" },
    ]);

    expect(chunks.map((chunk) => chunk.responseId)).toEqual(["resp_1", "resp_1"]);
  });
});

describe("toInputItems", () => {
  test("builds reasoning and output items in order", () => {
    expect(toInputItems(
      [
        { type: "function_call_output", callId: "call_1", output: "sunny" },
        {
          type: "computer_call_output",
          callId: "call_2",
          screenshot: "aGVsbG8=",
          acknowledgedSafetyChecks: [{ id: "sc_1", code: "sensitive_domain", message: "Payments page" }],
        },
        { type: "mcp_approval_response", approvalRequestId: "mcpr_1", approve: false, reason: "Not now" },
      ],
      [{ type: "reasoning", id: "rs_1", summary: ["Compared prices"], encryptedContent: "opaque" }],
    )).toEqual([
      {
        type: "reasoning",
        id: "rs_1",
        summary: [{ type: "summary_text", text: "Compared prices" }],
        encrypted_content: "opaque",
      },
      { type: "function_call_output", call_id: "call_1", output: "sunny" },
      {
        type: "computer_call_output",
        call_id: "call_2",
        output: { type: "computer_screenshot", image_url: "data:image/png;base64,aGVsbG8=" },
        acknowledged_safety_checks: [{ id: "sc_1", code: "sensitive_domain", message: "Payments page" }],
      },
      { type: "mcp_approval_response", approval_request_id: "mcpr_1", approve: false, reason: "Not now" },
    ]);
  });

  test("keeps screenshots that already are data URLs", () => {
    const [item] = toInputItems(
      [{ type: "computer_call_output", callId: "call_1", screenshot: "data:image/jpeg;base64,AAAA", acknowledgedSafetyChecks: [] }],
      null,
    );

    expect(item).toMatchObject({ output: { image_url: "data:image/jpeg;base64,AAAA" } });
  });

  test("reports the page the action ended on", () => {
    const [item] = toInputItems(
      [{
        type: "computer_call_output",
        callId: "call_1",
        screenshot: "AAAA",
        acknowledgedSafetyChecks: [],
        currentUrl: "https://example.test/cart",
      }],
      null,
    );

    expect(item).toEqual({
      type: "computer_call_output",
      call_id: "call_1",
      output: {
        type: "computer_screenshot",
        image_url: "data:image/png;base64,AAAA",
        current_url: "https://example.test/cart",
      },
      acknowledged_safety_checks: [],
    });
  });
});
