import "dotenv/config";
import { z } from "zod";

export const DEFAULT_API_BASE_URL = "https://law-api-poc.stage.lexmachina.com";
export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 10011;

// Blank values count as unset so `API_TOKEN=` in a .env file does not select token auth.
const optionalSetting = z.preprocess(
  (value) =>
    typeof value === "string" && value.trim().length === 0 ? undefined : value,
  z.string().trim().optional(),
);

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  API_BASE_URL: z.string().url().default(DEFAULT_API_BASE_URL),
  API_TOKEN: optionalSetting,
  CLIENT_ID: optionalSetting,
  CLIENT_SECRET: optionalSetting,
  DELEGATION_URL: optionalSetting,
  API_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  // Advertised address of this agent; derived from host/port when unset.
  BASE_URL: optionalSetting,
  HOST: z.string().default(DEFAULT_HOST),
  PORT: z.coerce.number().int().positive().max(65_535).default(DEFAULT_PORT),
});

export type AppEnv = Readonly<z.infer<typeof envSchema>>;

/**
 * Parses one immutable configuration object at startup; callers pass it down instead of re-reading process.env.
 */
export const loadEnv = (
  source: Record<string, string | undefined> = process.env,
): AppEnv => Object.freeze(envSchema.parse(source));

/**
 * Resolves the address the agent card advertises, preferring an explicit BASE_URL.
 */
export const advertisedUrl = (
  appEnv: AppEnv,
  host: string,
  port: number,
): string => appEnv.BASE_URL ?? `http://${host}:${port}/`;
