import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import {
  UpstreamTransportError,
  type AppBoundaryError,
} from "../../../core/entities/appError";
import type {
  DescriptionPayload,
  SuggestionsEnvelope,
} from "../../../core/entities/suggestion";
import type { SearchSuggestionsPort } from "../../../core/ports/outboundPorts";
import { logger } from "../../../shared/logger/logger";
import {
  HttpJsonClient,
  joinUrl,
  type HttpClientError,
} from "../../http/httpJsonClient";

export const SUGGESTIONS_PATH = "/search/ai_suggested";

const suggestionsEnvelopeSchema = z.record(z.unknown());

/**
 * Authenticated client for the legal-analytics search API. One instance is shared for the
 * lifetime of the agent; `close()` aborts whatever is still in flight and refuses new requests.
 */
export class SearchApiClient implements SearchSuggestionsPort {
  readonly headers: Readonly<Record<string, string>>;
  private readonly lifetime = new AbortController();

  constructor(
    readonly baseUrl: string,
    token: string,
    private readonly timeoutMs = 30_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!token.trim()) {
      throw new Error("A bearer token is required to build the search API client.");
    }

    this.headers = Object.freeze({
      Authorization: `Bearer ${token}`,
      Accept: "application/json",
    });
    logger.info({ baseUrl }, "Search API client initialized");
  }

  get closed(): boolean {
    return this.lifetime.signal.aborted;
  }

  async getSuggestedSearches(
    query: string,
    signal?: AbortSignal,
  ): Promise<Result<SuggestionsEnvelope, AppBoundaryError>> {
    logger.info({ query }, "Fetching suggested searches");

    const url = new URL(joinUrl(this.baseUrl, SUGGESTIONS_PATH));
    url.searchParams.set("q", query);

    const payloadResult = await this.get(url.toString(), signal);
    if (payloadResult.isErr()) {
      return err(this.toBoundaryError("suggestions", payloadResult.error));
    }

    const parsed = suggestionsEnvelopeSchema.safeParse(payloadResult.value);
    if (!parsed.success) {
      return err(
        this.logged({
          source: "suggestions",
          code: "malformed_response",
          message: "Suggested searches response was not a JSON object.",
          cause: parsed.error.issues,
        }),
      );
    }

    return ok(parsed.data);
  }

  async getSearchDescription(
    descriptionUrl: string,
    signal?: AbortSignal,
  ): Promise<Result<DescriptionPayload, AppBoundaryError>> {
    const url = joinUrl(this.baseUrl, descriptionUrl);
    logger.debug({ url }, "Fetching search description");

    const payloadResult = await this.get(url, signal);
    if (payloadResult.isErr()) {
      return err(this.toBoundaryError("description", payloadResult.error));
    }

    return ok(payloadResult.value);
  }

  close(): void {
    if (this.closed) {
      return;
    }

    this.lifetime.abort(new Error("Search API client closed."));
    logger.info({ baseUrl: this.baseUrl }, "Search API client closed");
  }

  private async get(
    url: string,
    signal?: AbortSignal,
  ): Promise<Result<unknown, HttpClientError>> {
    if (this.closed) {
      throw new UpstreamTransportError(
        "aborted",
        "Search API client is closed.",
        url,
      );
    }

    return this.httpClient.requestJson({
      url,
      method: "GET",
      headers: { ...this.headers },
      timeoutMs: this.timeoutMs,
      signal: signal
        ? AbortSignal.any([this.lifetime.signal, signal])
        : this.lifetime.signal,
    });
  }

  private toBoundaryError(
    source: AppBoundaryError["source"],
    failure: HttpClientError,
  ): AppBoundaryError {
    return this.logged({
      source,
      code: failure.code,
      message: failure.message,
      httpStatus: failure.httpStatus,
      cause: failure.cause,
    });
  }

  private logged(error: AppBoundaryError): AppBoundaryError {
    logger.error(
      {
        source: error.source,
        code: error.code,
        httpStatus: error.httpStatus,
        reason: error.message,
      },
      "Search API error",
    );
    return error;
  }
}
