import { describe, expect, it, vi } from "vitest";
import type { Message } from "@a2a-js/sdk";
import {
  A2AError,
  DefaultExecutionEventBus,
  RequestContext,
  type AgentExecutionEvent,
} from "@a2a-js/sdk/server";
import { SearchSuggestionsExecutor, userInputOf } from "./agentExecutor";
import type { QueryProcessorPort } from "../core/ports/inboundPorts";
import type { ClockPort, IdGeneratorPort } from "../core/ports/outboundPorts";

const userMessage = (...texts: string[]): Message => ({
  kind: "message",
  messageId: "msg-1",
  role: "user",
  parts: texts.map((text) => ({ kind: "text", text })),
});

const fixedClock: ClockPort = {
  now: () => new Date("2026-03-02T10:00:00.000Z"),
};

const fixedIds: IdGeneratorPort = {
  next: () => "artifact-1",
};

const recordEvents = (bus: DefaultExecutionEventBus) => {
  const events: AgentExecutionEvent[] = [];
  let finished = false;
  bus.on("event", (event) => events.push(event));
  bus.on("finished", () => {
    finished = true;
  });

  return { events, isFinished: () => finished };
};

describe("userInputOf", () => {
  it("joins text parts with newlines", () => {
    expect(userInputOf(userMessage("patent cases", "in Delaware"))).toBe(
      "patent cases\nin Delaware",
    );
  });
});

describe("SearchSuggestionsExecutor", () => {
  it("publishes one completed task carrying the rendered query result", async () => {
    const processor: QueryProcessorPort = {
      processQuery: vi.fn(async () => ({
        result: [
          {
            description_url: "/desc/1",
            enriched_description: { text: "Description for /desc/1" },
          },
        ],
      })),
    };
    const executor = new SearchSuggestionsExecutor(
      processor,
      fixedIds,
      fixedClock,
    );
    const message = userMessage("patent cases");
    const bus = new DefaultExecutionEventBus();
    const recorded = recordEvents(bus);

    await executor.execute(
      new RequestContext(message, "task123", "ctx456"),
      bus,
    );

    expect(processor.processQuery).toHaveBeenCalledWith("patent cases");
    expect(recorded.isFinished()).toBe(true);
    expect(recorded.events).toEqual([
      {
        kind: "task",
        id: "task123",
        contextId: "ctx456",
        status: {
          state: "completed",
          timestamp: "2026-03-02T10:00:00.000Z",
        },
        artifacts: [
          {
            artifactId: "artifact-1",
            name: "suggestion_task123",
            parts: [
              {
                kind: "text",
                text: '{"result":[{"description_url":"/desc/1","enriched_description":{"text":"Description for /desc/1"}}]}',
              },
            ],
          },
        ],
        history: [message],
      },
    ]);
  });

  it("renders first-stage failures as the artifact text", async () => {
    const executor = new SearchSuggestionsExecutor(
      {
        processQuery: async () => ({
          error: "Failed to get initial suggestions.",
          details: { result: [] },
        }),
      },
      fixedIds,
      fixedClock,
    );
    const bus = new DefaultExecutionEventBus();
    const recorded = recordEvents(bus);

    await executor.execute(
      new RequestContext(userMessage("abc"), "task123", "ctx456"),
      bus,
    );

    expect(recorded.events).toHaveLength(1);
    expect(recorded.events[0]).toMatchObject({
      artifacts: [
        {
          parts: [
            {
              kind: "text",
              text: '{"error":"Failed to get initial suggestions.","details":{"result":[]}}',
            },
          ],
        },
      ],
    });
  });

  it("rejects requests without a task id as invalid params", async () => {
    const processQuery = vi.fn();
    const executor = new SearchSuggestionsExecutor({ processQuery });
    const bus = new DefaultExecutionEventBus();
    const recorded = recordEvents(bus);

    const failure = await executor
      .execute(new RequestContext(userMessage("abc"), "", "ctx456"), bus)
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(A2AError);
    expect(failure).toMatchObject({
      code: -32602,
      message: "Missing task_id or context_id or message",
    });
    expect(processQuery).not.toHaveBeenCalled();
    expect(recorded.events).toEqual([]);
  });

  it("propagates unexpected query failures without publishing", async () => {
    const executor = new SearchSuggestionsExecutor({
      processQuery: async () => {
        throw new Error("socket reset");
      },
    });
    const bus = new DefaultExecutionEventBus();
    const recorded = recordEvents(bus);

    await expect(
      executor.execute(
        new RequestContext(userMessage("abc"), "task123", "ctx456"),
        bus,
      ),
    ).rejects.toThrow("socket reset");
    expect(recorded.events).toEqual([]);
  });

  it("refuses cancellation as an unsupported operation", async () => {
    const executor = new SearchSuggestionsExecutor({
      processQuery: vi.fn(),
    });

    const failure = await executor
      .cancelTask("task123")
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(A2AError);
    expect(failure).toMatchObject({ code: -32004 });
  });
});
