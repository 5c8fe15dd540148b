import express, { type Express } from "express";
import type { AgentCard } from "@a2a-js/sdk";
import {
  DefaultRequestHandler,
  InMemoryTaskStore,
  type AgentExecutor,
} from "@a2a-js/sdk/server";
import { A2AExpressApp } from "@a2a-js/sdk/server/express";

/**
 * Mounts the A2A JSON-RPC endpoint and the well-known agent card on a fresh Express app.
 */
export const createServerApp = (
  agentCard: AgentCard,
  executor: AgentExecutor,
): Express => {
  const requestHandler = new DefaultRequestHandler(
    agentCard,
    new InMemoryTaskStore(),
    executor,
  );

  return new A2AExpressApp(requestHandler).setupRoutes(express());
};
