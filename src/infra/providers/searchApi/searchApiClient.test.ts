import { afterEach, describe, expect, it } from "vitest";
import { SearchApiClient } from "./searchApiClient";

const originalFetch = globalThis.fetch;

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  globalThis.fetch = handler;
};

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status });

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe("SearchApiClient", () => {
  it("builds bearer and accept headers from the resolved token", () => {
    const client = new SearchApiClient("https://api.example.test", "tok");

    expect(client.headers).toEqual({
      Authorization: "Bearer tok",
      Accept: "application/json",
    });
  });

  it("throws when the token is blank", () => {
    expect(() => new SearchApiClient("https://api.example.test", " ")).toThrow(
      "A bearer token is required",
    );
  });

  it("requests suggestions with the query and auth headers", async () => {
    let requestedUrl = "";
    let seenHeaders = new Headers();

    setFetch(async (input, init) => {
      requestedUrl = String(input);
      seenHeaders = new Headers(init?.headers);
      return jsonResponse({
        result: [{ description_url: "/desc/1", name: "Patent cases" }],
        total: 1,
      });
    });

    const client = new SearchApiClient("https://api.example.test/", "tok");
    const suggestions = await client.getSuggestedSearches("patent cases");

    expect(suggestions.isOk()).toBe(true);
    if (suggestions.isErr()) {
      throw new Error(suggestions.error.message);
    }

    const url = new URL(requestedUrl);
    expect(url.origin + url.pathname).toBe(
      "https://api.example.test/search/ai_suggested",
    );
    expect(url.searchParams.get("q")).toBe("patent cases");
    expect(seenHeaders.get("authorization")).toBe("Bearer tok");
    expect(seenHeaders.get("accept")).toBe("application/json");
    expect(suggestions.value).toEqual({
      result: [{ description_url: "/desc/1", name: "Patent cases" }],
      total: 1,
    });
  });

  it("maps suggestion status failures to boundary errors", async () => {
    setFetch(async () => new Response("unauthorized", { status: 401 }));

    const client = new SearchApiClient("https://api.example.test", "tok");
    const suggestions = await client.getSuggestedSearches("abc");

    expect(suggestions.isErr()).toBe(true);
    if (suggestions.isOk()) {
      throw new Error("expected status error");
    }

    expect(suggestions.error.source).toBe("suggestions");
    expect(suggestions.error.code).toBe("non_success_status");
    expect(suggestions.error.httpStatus).toBe(401);
  });

  it("passes envelopes through whatever their result holds", async () => {
    setFetch(async () => jsonResponse({ result: "nothing here", request_id: "r1" }));

    const client = new SearchApiClient("https://api.example.test", "tok");
    const suggestions = await client.getSuggestedSearches("abc");

    expect(suggestions.isOk()).toBe(true);
    if (suggestions.isOk()) {
      expect(suggestions.value).toEqual({
        result: "nothing here",
        request_id: "r1",
      });
    }
  });

  it("rejects suggestion bodies that are not JSON objects", async () => {
    setFetch(async () => jsonResponse([{ description_url: "/desc/1" }]));

    const client = new SearchApiClient("https://api.example.test", "tok");
    const suggestions = await client.getSuggestedSearches("abc");

    expect(suggestions.isErr()).toBe(true);
    if (suggestions.isErr()) {
      expect(suggestions.error.code).toBe("malformed_response");
      expect(suggestions.error.message).toBe(
        "Suggested searches response was not a JSON object.",
      );
    }
  });

  it("returns description bodies of any JSON shape", async () => {
    setFetch(async () => jsonResponse(["a", "b"]));

    const client = new SearchApiClient("https://api.example.test", "tok");
    const description = await client.getSearchDescription("/desc/1");

    expect(description.isOk()).toBe(true);
    if (description.isOk()) {
      expect(description.value).toEqual(["a", "b"]);
    }
  });

  it("resolves relative description URLs against the base path", async () => {
    let requestedUrl = "";

    setFetch(async (input) => {
      requestedUrl = String(input);
      return jsonResponse({ text: "Patent case timing" });
    });

    const client = new SearchApiClient("https://api.example.test/v1", "tok");
    const description = await client.getSearchDescription("/desc/1");

    expect(requestedUrl).toBe("https://api.example.test/v1/desc/1");
    expect(description.isOk()).toBe(true);
    if (description.isOk()) {
      expect(description.value).toEqual({ text: "Patent case timing" });
    }
  });

  it("uses absolute description URLs as given", async () => {
    let requestedUrl = "";

    setFetch(async (input) => {
      requestedUrl = String(input);
      return jsonResponse({ text: "elsewhere" });
    });

    const client = new SearchApiClient("https://api.example.test", "tok");
    await client.getSearchDescription("https://docs.example.test/desc/7");

    expect(requestedUrl).toBe("https://docs.example.test/desc/7");
  });

  it("aborts in-flight requests and refuses new ones once closed", async () => {
    setFetch(
      async (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (!signal) {
            reject(new Error("missing abort signal"));
            return;
          }

          signal.addEventListener("abort", () => {
            reject(signal.reason);
          });
        }),
    );

    const client = new SearchApiClient("https://api.example.test", "tok");
    const pending = client.getSearchDescription("/desc/1");
    client.close();

    expect(client.closed).toBe(true);
    await expect(pending).rejects.toMatchObject({ code: "aborted" });
    await expect(client.getSuggestedSearches("abc")).rejects.toMatchObject({
      code: "aborted",
      message: "Search API client is closed.",
    });
  });
});
