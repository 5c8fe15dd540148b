import type { Message, Task } from "@a2a-js/sdk";
import {
  A2AError,
  type AgentExecutor,
  type ExecutionEventBus,
  type RequestContext,
} from "@a2a-js/sdk/server";
import type { QueryResult } from "../core/entities/suggestion";
import type { QueryProcessorPort } from "../core/ports/inboundPorts";
import type { ClockPort, IdGeneratorPort } from "../core/ports/outboundPorts";
import { SystemClock, UuidIdGenerator } from "../infra/system/systemPorts";
import { logger, toErrorDetails } from "../shared/logger/logger";

/**
 * Joins the text parts of a user message the way a plain-text query is expected upstream.
 */
export const userInputOf = (message: Message): string =>
  message.parts
    .flatMap((part) => (part.kind === "text" ? [part.text] : []))
    .join("\n");

/**
 * Bridges A2A task execution to the query orchestrator: one request, one completed task with a
 * single text artifact holding the rendered query result.
 */
export class SearchSuggestionsExecutor implements AgentExecutor {
  constructor(
    private readonly queryProcessor: QueryProcessorPort,
    private readonly ids: IdGeneratorPort = new UuidIdGenerator(),
    private readonly clock: ClockPort = new SystemClock(),
  ) {}

  async execute(
    requestContext: RequestContext,
    eventBus: ExecutionEventBus,
  ): Promise<void> {
    const { taskId, contextId, userMessage } = requestContext;
    if (!taskId || !contextId || !userMessage) {
      throw A2AError.invalidParams("Missing task_id or context_id or message");
    }

    const query = userInputOf(userMessage);
    logger.info({ taskId, contextId }, "Executing search suggestions task");

    let result: QueryResult;
    try {
      result = await this.queryProcessor.processQuery(query);
    } catch (error) {
      logger.error(
        { taskId, contextId, error: toErrorDetails(error) },
        "Search suggestions task failed",
      );
      throw error;
    }

    eventBus.publish(this.completedTask(taskId, contextId, userMessage, result));
    eventBus.finished();
  }

  async cancelTask(taskId: string): Promise<void> {
    logger.warn({ taskId }, "Cancellation requested but not supported");
    throw A2AError.unsupportedOperation("tasks/cancel");
  }

  private completedTask(
    taskId: string,
    contextId: string,
    userMessage: Message,
    result: QueryResult,
  ): Task {
    return {
      kind: "task",
      id: taskId,
      contextId,
      status: {
        state: "completed",
        timestamp: this.clock.now().toISOString(),
      },
      artifacts: [
        {
          artifactId: this.ids.next(),
          name: `suggestion_${taskId}`,
          parts: [{ kind: "text", text: JSON.stringify(result) }],
        },
      ],
      history: [userMessage],
    };
  }
}
