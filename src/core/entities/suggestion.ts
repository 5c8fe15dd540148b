export type JsonObject = { [key: string]: unknown };

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * One candidate search from the upstream suggest endpoint. Only `description_url` is relied on;
 * every other field is upstream-defined and passed through untouched.
 */
export type SuggestionRecord = JsonObject;

/**
 * Whatever JSON the description endpoint returned.
 */
export type DescriptionPayload = unknown;

export type EnrichmentFailure = { error: string };

export type EnrichedSuggestion = SuggestionRecord & {
  enriched_description: DescriptionPayload | EnrichmentFailure;
};

/**
 * Stage-1 response envelope. `result` is upstream-defined until the orchestrator gates on it;
 * extra upstream metadata survives enrichment.
 */
export type SuggestionsEnvelope = JsonObject;

export type EnrichedSuggestionsEnvelope = JsonObject & {
  result: EnrichedSuggestion[];
};

export type QueryFailure = {
  error: string;
  details: SuggestionsEnvelope | EnrichmentFailure;
};

export type QueryResult = EnrichedSuggestionsEnvelope | QueryFailure;

export const isQueryFailure = (result: QueryResult): result is QueryFailure =>
  typeof result.error === "string" && "details" in result;
