import { err, ok, type Result } from "neverthrow";
import { UpstreamTransportError } from "../../core/entities/appError";

type HttpMethod = "GET" | "POST";

export type HttpRequestBody =
  | { kind: "json"; value: unknown }
  | { kind: "form"; value: Record<string, string> };

export type HttpJsonRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: HttpRequestBody;
  timeoutMs: number;
  signal?: AbortSignal;
};

export type HttpClientError = {
  code: "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  cause?: unknown;
};

const ABSOLUTE_URL = /^[a-z][a-z\d+.-]*:\/\//i;

/**
 * Appends a path to the base URL's own path, the way upstream description links are written.
 * Absolute URLs pass through unchanged.
 */
export const joinUrl = (baseUrl: string, path: string): string => {
  if (ABSOLUTE_URL.test(path)) {
    return path;
  }

  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
};

const encodeBody = (
  body: HttpRequestBody | undefined,
): { payload?: string | URLSearchParams; contentType?: string } => {
  if (!body) {
    return {};
  }

  if (body.kind === "form") {
    return { payload: new URLSearchParams(body.value) };
  }

  return {
    payload: JSON.stringify(body.value),
    contentType: "application/json",
  };
};

/**
 * Centralizes HTTP JSON IO so every upstream call shares one status and deadline policy.
 * Non-2xx responses and unparseable bodies are returned as `err`; requests that never got a
 * response throw `UpstreamTransportError`.
 */
export class HttpJsonClient {
  async requestJson(
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const timeoutSignal = AbortSignal.timeout(request.timeoutMs);
    const signal = request.signal
      ? AbortSignal.any([timeoutSignal, request.signal])
      : timeoutSignal;
    const { payload, contentType } = encodeBody(request.body);

    let response: Response;
    let text: string;
    try {
      response = await fetch(request.url, {
        method: request.method,
        headers: contentType
          ? { ...request.headers, "Content-Type": contentType }
          : request.headers,
        body: payload,
        signal,
      });
      text = await response.text();
    } catch (error) {
      throw this.toTransportError(request, timeoutSignal, error);
    }

    if (!response.ok) {
      return err({
        code: "non_success_status",
        message: `HTTP request failed with status ${response.status} for ${request.url}.`,
        httpStatus: response.status,
      });
    }

    try {
      return ok(JSON.parse(text));
    } catch (jsonError) {
      return err({
        code: "invalid_json",
        message: `HTTP response body from ${request.url} was not valid JSON.`,
        httpStatus: response.status,
        cause: jsonError,
      });
    }
  }

  private toTransportError(
    request: HttpJsonRequest,
    timeoutSignal: AbortSignal,
    error: unknown,
  ): UpstreamTransportError {
    if (request.signal?.aborted) {
      return new UpstreamTransportError(
        "aborted",
        "HTTP request was aborted.",
        request.url,
        { cause: request.signal.reason },
      );
    }

    if (timeoutSignal.aborted) {
      return new UpstreamTransportError(
        "timeout",
        `HTTP request timed out after ${request.timeoutMs}ms.`,
        request.url,
        { cause: error },
      );
    }

    return new UpstreamTransportError(
      "transport_error",
      error instanceof Error ? error.message : "HTTP transport failed.",
      request.url,
      { cause: error },
    );
  }
}
