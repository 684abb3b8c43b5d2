import { z } from "zod";

/**
 * Server configuration schema.
 * Parsed from environment variables at startup.
 */
export const ServerConfigSchema = z.object({
  /** `http` serves SSE and Streamable HTTP; `stdio` talks over stdin/stdout. */
  transport: z.enum(["http", "stdio"]).default("http"),

  /** Interface the HTTP server binds to. */
  host: z.string().min(1).default("0.0.0.0"),

  /** Port the HTTP server listens on. */
  port: z.coerce.number().int().min(0).max(65_535).default(8000),

  /** Hyperliquid network to query. */
  network: z.enum(["mainnet", "testnet"]).default("mainnet"),

  /** Overrides the network's API URL (e.g. a local proxy). */
  apiUrl: z.string().url().optional(),

  /** Upstream request timeout in milliseconds. */
  timeoutMs: z.coerce.number().int().positive().default(10_000),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Load server config from environment variables. Empty values count as unset.
 *
 * @throws {z.ZodError} when a variable holds an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const read = (key: string) => {
    const value = env[key]?.trim();
    return value ? value : undefined;
  };

  return ServerConfigSchema.parse({
    transport: read("MCP_TRANSPORT"),
    host: read("HOST"),
    port: read("PORT"),
    network: read("HYPERLIQUID_NETWORK"),
    apiUrl: read("HYPERLIQUID_API_URL"),
    timeoutMs: read("HYPERLIQUID_TIMEOUT_MS"),
  });
}
