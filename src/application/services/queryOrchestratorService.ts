import {
  isJsonObject,
  type DescriptionPayload,
  type EnrichedSuggestionsEnvelope,
  type EnrichmentFailure,
  type QueryFailure,
  type QueryResult,
  type SuggestionsEnvelope,
} from "../../core/entities/suggestion";
import type { QueryProcessorPort } from "../../core/ports/inboundPorts";
import type { SearchSuggestionsPort } from "../../core/ports/outboundPorts";
import { logger, toErrorDetails } from "../../shared/logger/logger";

export const INITIAL_SUGGESTIONS_FAILURE = "Failed to get initial suggestions.";
export const MISSING_DESCRIPTION_URL = "Suggestion is missing description_url.";
export const INVALID_SUGGESTION = "Suggestion is not a JSON object.";

type Description = DescriptionPayload | EnrichmentFailure;

const isSuggestionList = (value: unknown): value is unknown[] =>
  Array.isArray(value);

/**
 * Runs the suggest-then-enrich flow: one suggestions call, then one description call per
 * suggestion, all in flight together and merged back by position.
 */
export class QueryOrchestratorService implements QueryProcessorPort {
  constructor(private readonly api: SearchSuggestionsPort) {}

  async processQuery(
    query: string,
    signal?: AbortSignal,
  ): Promise<QueryResult> {
    const initial = await this.api.getSuggestedSearches(query, signal);
    if (initial.isErr()) {
      return this.initialFailure({ error: initial.error.message });
    }

    const envelope = initial.value;
    const suggestions = envelope.result;
    // An empty list is reported like an upstream error: there is nothing to enrich.
    if (
      "error" in envelope ||
      !isSuggestionList(suggestions) ||
      suggestions.length === 0
    ) {
      return this.initialFailure(envelope);
    }

    logger.debug(
      { query, count: suggestions.length },
      "Fetching descriptions in parallel",
    );
    const descriptions = await this.fetchDescriptions(suggestions, signal);

    const enriched: EnrichedSuggestionsEnvelope = Object.assign(envelope, {
      // Items that are not objects cannot carry a field, so they are wrapped.
      result: suggestions.map((suggestion, index) =>
        Object.assign(isJsonObject(suggestion) ? suggestion : { suggestion }, {
          enriched_description: descriptions[index],
        }),
      ),
    });

    logger.debug({ query }, "Query processing complete");
    return enriched;
  }

  private initialFailure(
    details: SuggestionsEnvelope | EnrichmentFailure,
  ): QueryFailure {
    logger.error({ details }, "Failed to get initial suggestions");
    return { error: INITIAL_SUGGESTIONS_FAILURE, details };
  }

  /**
   * Starts every fetch before awaiting any. The first unexpected failure aborts the rest of the
   * batch; nothing is returned or thrown until every fetch has settled.
   */
  private async fetchDescriptions(
    suggestions: unknown[],
    signal?: AbortSignal,
  ): Promise<Description[]> {
    const batch = new AbortController();
    const cancelBatch = () => batch.abort(signal?.reason);
    signal?.addEventListener("abort", cancelBatch, { once: true });
    if (signal?.aborted) {
      cancelBatch();
    }

    const failures: unknown[] = [];

    try {
      const settled = await Promise.allSettled(
        suggestions.map((suggestion) =>
          this.describe(suggestion, batch.signal).catch((error: unknown) => {
            failures.push(error);
            batch.abort(error);
            throw error;
          }),
        ),
      );

      const descriptions: Description[] = [];
      for (const outcome of settled) {
        if (outcome.status === "rejected") {
          const failure = failures[0] ?? outcome.reason;
          logger.error(
            { error: toErrorDetails(failure) },
            "Description enrichment aborted",
          );
          throw failure;
        }

        descriptions.push(outcome.value);
      }

      return descriptions;
    } finally {
      signal?.removeEventListener("abort", cancelBatch);
    }
  }

  private async describe(
    suggestion: unknown,
    signal: AbortSignal,
  ): Promise<Description> {
    if (!isJsonObject(suggestion)) {
      logger.warn({ suggestion }, "Suggestion is not an object");
      return { error: INVALID_SUGGESTION };
    }

    const descriptionUrl = suggestion.description_url;
    if (typeof descriptionUrl !== "string" || !descriptionUrl.trim()) {
      logger.warn({ suggestion }, "Suggestion has no description_url");
      return { error: MISSING_DESCRIPTION_URL };
    }

    const description = await this.api.getSearchDescription(
      descriptionUrl,
      signal,
    );

    return description.match<Description>(
      (payload) => payload,
      (error) => ({ error: error.message }),
    );
  }
}
