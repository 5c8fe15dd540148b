import { QueryOrchestratorService } from "../services/queryOrchestratorService";
import { CredentialResolver } from "../../infra/auth/credentialResolver";
import type { SearchApiClient } from "../../infra/providers/searchApi/searchApiClient";
import { SearchSuggestionsExecutor } from "../../server/agentExecutor";
import type { AppEnv } from "../../shared/config/env";

export type Runtime = {
  searchApi: SearchApiClient;
  orchestratorService: QueryOrchestratorService;
  executor: SearchSuggestionsExecutor;
  close: () => void;
};

/**
 * Centralizes runtime wiring so the server and one-shot CLI queries share one composition root.
 * Credentials are resolved once here; configuration errors surface before anything is served.
 */
export const createRuntime = async (
  appEnv: AppEnv,
  resolver = new CredentialResolver(),
): Promise<Runtime> => {
  const searchApi = await resolver.resolve(appEnv);
  const orchestratorService = new QueryOrchestratorService(searchApi);
  const executor = new SearchSuggestionsExecutor(orchestratorService);

  return {
    searchApi,
    orchestratorService,
    executor,
    close: () => searchApi.close(),
  };
};
