import { z } from "zod";
import {
  ConfigurationError,
  MissingConfigurationError,
  RequiredConfigurationError,
  TokenExchangeError,
  UnimplementedCapabilityError,
} from "../../core/entities/appError";
import type { AppEnv } from "../../shared/config/env";
import { logger, toErrorDetails } from "../../shared/logger/logger";
import { HttpJsonClient, joinUrl } from "../http/httpJsonClient";
import { SearchApiClient } from "../providers/searchApi/searchApiClient";

export const TOKEN_PATH = "/api/token";

export const CREDENTIAL_FIELDS = [
  "API_TOKEN",
  "CLIENT_ID",
  "CLIENT_SECRET",
  "DELEGATION_URL",
] as const;

export type CredentialMethod =
  | { kind: "token"; token: string }
  | { kind: "client_credentials"; clientId: string; clientSecret: string }
  | { kind: "delegation"; delegationUrl: string };

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
});

/**
 * Picks exactly one authentication method, in priority order token > client credentials > delegation.
 * Throws before any network call when the configured values cannot be used together.
 */
export const selectCredentialMethod = (appEnv: AppEnv): CredentialMethod => {
  const {
    API_TOKEN: token,
    CLIENT_ID: clientId,
    CLIENT_SECRET: clientSecret,
    DELEGATION_URL: delegationUrl,
  } = appEnv;

  if ([token, clientId, clientSecret, delegationUrl].every((v) => !v)) {
    throw new MissingConfigurationError([...CREDENTIAL_FIELDS]);
  }

  if (clientId && !clientSecret) {
    throw new RequiredConfigurationError("CLIENT_SECRET");
  }

  if (clientSecret && !clientId) {
    throw new RequiredConfigurationError("CLIENT_ID");
  }

  if (token) {
    return { kind: "token", token };
  }

  if (clientId && clientSecret) {
    return { kind: "client_credentials", clientId, clientSecret };
  }

  if (delegationUrl) {
    return { kind: "delegation", delegationUrl };
  }

  throw new ConfigurationError();
};

/**
 * Turns validated configuration into the single authenticated client the agent reuses.
 */
export class CredentialResolver {
  constructor(private readonly httpClient = new HttpJsonClient()) {}

  async resolve(appEnv: AppEnv): Promise<SearchApiClient> {
    const method = selectCredentialMethod(appEnv);

    switch (method.kind) {
      case "token":
        logger.warn(
          "Using API_TOKEN for authentication. Consider using CLIENT_ID / CLIENT_SECRET, or DELEGATION_URL for better security.",
        );
        return this.buildClient(appEnv, method.token);
      case "client_credentials":
        return this.buildClient(
          appEnv,
          await this.exchangeClientCredentials(appEnv, method),
        );
      case "delegation":
        throw new UnimplementedCapabilityError(
          "delegation_url",
          "Delegation URL authentication not implemented yet.",
        );
    }
  }

  private buildClient(appEnv: AppEnv, token: string): SearchApiClient {
    return new SearchApiClient(
      appEnv.API_BASE_URL,
      token,
      appEnv.API_TIMEOUT_MS,
      this.httpClient,
    );
  }

  private async exchangeClientCredentials(
    appEnv: AppEnv,
    method: Extract<CredentialMethod, { kind: "client_credentials" }>,
  ): Promise<string> {
    const url = joinUrl(appEnv.API_BASE_URL, TOKEN_PATH);

    let response: Awaited<ReturnType<HttpJsonClient["requestJson"]>>;
    try {
      response = await this.httpClient.requestJson({
        url,
        method: "POST",
        headers: { Accept: "application/json" },
        body: {
          kind: "form",
          value: {
            grant_type: "client_credentials",
            client_id: method.clientId,
            client_secret: method.clientSecret,
          },
        },
        timeoutMs: appEnv.API_TIMEOUT_MS,
      });
    } catch (error) {
      logger.error({ url, error: toErrorDetails(error) }, "OAuth2 token request failed");
      throw new TokenExchangeError("OAuth2 token request failed.", {
        cause: error,
      });
    }

    if (response.isErr()) {
      logger.error(
        { url, httpStatus: response.error.httpStatus, reason: response.error.message },
        "OAuth2 token request failed",
      );
      throw new TokenExchangeError(
        `OAuth2 token request failed: ${response.error.message}`,
        { cause: response.error },
      );
    }

    const parsed = tokenResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      logger.error({ url }, "Token endpoint did not return access_token");
      throw new ConfigurationError();
    }

    return parsed.data.access_token;
  }
}
