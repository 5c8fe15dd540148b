import { Command, InvalidArgumentError } from "commander";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import { ConfigurationError } from "../core/entities/appError";
import { isQueryFailure } from "../core/entities/suggestion";
import { selectCredentialMethod } from "../infra/auth/credentialResolver";
import { buildAgentCard } from "../server/agentCard";
import { createServerApp } from "../server/app";
import { advertisedUrl, loadEnv, type AppEnv } from "../shared/config/env";
import { logger, toErrorDetails } from "../shared/logger/logger";

const parsePort = (value: string): number => {
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65_535) {
    throw new InvalidArgumentError("Port must be an integer between 1 and 65535.");
  }

  return port;
};

const describeCredentials = (appEnv: AppEnv): string => {
  try {
    return selectCredentialMethod(appEnv).kind;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return `invalid (${error.message})`;
    }
    throw error;
  }
};

/**
 * Defines a single command surface so serving and one-off queries share the same runtime wiring.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("legal-search-agent")
    .description("A2A agent for legal-analytics search suggestions");

  cli
    .command("serve")
    .description("Start the A2A agent server")
    .option("--host <host>", "Interface to bind (defaults to HOST)")
    .option("--port <port>", "Port to listen on (defaults to PORT)", parsePort)
    .action(async (opts: { host?: string; port?: number }) => {
      const appEnv = loadEnv();
      const host = opts.host ?? appEnv.HOST;
      const port = opts.port ?? appEnv.PORT;
      const runtime = await createRuntime(appEnv);
      const url = advertisedUrl(appEnv, host, port);

      const app = createServerApp(buildAgentCard(url), runtime.executor);
      const server = app.listen(port, host, () => {
        logger.info({ host, port, url }, "Agent server listening");
      });

      server.on("error", (error) => {
        logger.error({ error: toErrorDetails(error) }, "Agent server failed");
        runtime.close();
        process.exit(1);
      });

      const shutdown = (signal: NodeJS.Signals) => {
        logger.info({ signal }, "Shutting down agent server");
        runtime.close();
        server.close(() => process.exit(0));
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

  cli
    .command("query")
    .description("Run one query against the upstream API and print the enriched result")
    .argument("<text...>", "Natural-language query")
    .action(async (words: string[]) => {
      const runtime = await createRuntime(loadEnv());
      const controller = new AbortController();
      const cancel = () => controller.abort(new Error("Query cancelled."));
      process.once("SIGINT", cancel);

      try {
        const result = await runtime.orchestratorService.processQuery(
          words.join(" "),
          controller.signal,
        );
        console.log(JSON.stringify(result, null, 2));
        if (isQueryFailure(result)) {
          process.exitCode = 1;
        }
      } finally {
        process.off("SIGINT", cancel);
        runtime.close();
      }
    });

  cli
    .command("status")
    .description("Report effective configuration without contacting the upstream API")
    .action(() => {
      const appEnv = loadEnv();

      logger.info(
        {
          nodeEnv: appEnv.NODE_ENV,
          apiBaseUrl: appEnv.API_BASE_URL,
          apiTimeoutMs: appEnv.API_TIMEOUT_MS,
          credentialMethod: describeCredentials(appEnv),
          apiTokenConfigured: Boolean(appEnv.API_TOKEN),
          clientIdConfigured: Boolean(appEnv.CLIENT_ID),
          clientSecretConfigured: Boolean(appEnv.CLIENT_SECRET),
          delegationUrlConfigured: Boolean(appEnv.DELEGATION_URL),
          listen: `${appEnv.HOST}:${appEnv.PORT}`,
          advertisedUrl: advertisedUrl(appEnv, appEnv.HOST, appEnv.PORT),
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
