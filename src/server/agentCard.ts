import type { AgentCard } from "@a2a-js/sdk";

export const SEARCH_SUGGESTIONS_SKILL_ID = "search_suggestions";

/**
 * Describes the agent to A2A clients. `url` is the externally reachable address of this server.
 */
export const buildAgentCard = (url: string): AgentCard => ({
  name: "Search Suggestions Agent",
  description: "Provide search suggestions based on user input.",
  url,
  version: "1.0.0",
  protocolVersion: "0.3.0",
  defaultInputModes: ["text"],
  defaultOutputModes: ["application/json"],
  capabilities: {
    streaming: false,
    pushNotifications: false,
  },
  skills: [
    {
      id: SEARCH_SUGGESTIONS_SKILL_ID,
      name: "Search Suggestions",
      description: "Provide search suggestions based on user input.",
      tags: ["search", "suggestions", "analytics"],
      examples: [
        "What is the average time to resolution for contracts cases in SDNY in the last 3 months?",
        "Time to trial in a Los Angeles County case before Judge Randy Rhodes?",
        "Reversal rate for employment cases in the 5th circuit?",
      ],
    },
  ],
});
