import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type {
  DescriptionPayload,
  SuggestionsEnvelope,
} from "../entities/suggestion";

/**
 * Authenticated access to the upstream search API. HTTP status failures come back as `err`;
 * transport failures are thrown.
 */
export interface SearchSuggestionsPort {
  getSuggestedSearches(
    query: string,
    signal?: AbortSignal,
  ): Promise<Result<SuggestionsEnvelope, AppBoundaryError>>;
  getSearchDescription(
    descriptionUrl: string,
    signal?: AbortSignal,
  ): Promise<Result<DescriptionPayload, AppBoundaryError>>;
  close(): void;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}
