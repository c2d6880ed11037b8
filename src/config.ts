import fs from "node:fs/promises";
import net from "node:net";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors";
import { logLevels, type LogLevel } from "./logger";
import { DEFAULT_UPSTREAM_TIMEOUT_MS } from "./upstream";
import { DEFAULT_CACHE_MAX_ENTRIES } from "./types";

export interface ClientConfig {
  id: string;
  upstreamEndpoint: string;
  /** Source addresses whose queries this client serves. */
  addresses: string[];
}

export type Config = Readonly<{
  clients: ClientConfig[];
  cacheDir: string;
  cacheMaxEntries: number;
  listen: { address: string; port: number };
  upstreamTimeoutMs: number;
  upstreamRetries: number;
  logLevel?: LogLevel;
}>;

export const DEFAULT_CONFIG_PATH = "config.json";

/** Accepts `ip`, `ip:port` and `[ipv6]:port`, as `dns.setServers` does. */
export function isEndpoint(value: string): boolean {
  if (net.isIP(value) !== 0) {
    return true;
  }

  const match =
    /^\[([^\]]+)\]:(\d+)$/.exec(value) ?? /^([^:]+):(\d+)$/.exec(value);
  if (!match) {
    return false;
  }
  const [, host, port] = match;
  const portNumber = Number(port);
  return net.isIP(host) !== 0 && portNumber >= 1 && portNumber <= 65535;
}

const clientSchema = z.object({
  id: z
    .string()
    .trim()
    .min(1, "client id must not be empty")
    .regex(
      /^[A-Za-z0-9._-]+$/,
      "client id may only contain letters, digits, '.', '_' and '-'"
    ),
  upstream_endpoint: z.string().trim().refine(isEndpoint, {
    message: "upstream_endpoint must be an IP address with an optional port",
  }),
  addresses: z
    .array(
      z
        .string()
        .refine((value) => net.isIP(value) !== 0, "not an IP address")
    )
    .default([]),
});

const configSchema = z
  .object({
    clients: z.array(clientSchema).min(1, "at least one client is required"),
    cache_dir: z.string().min(1).default("./cache"),
    cache_max_entries: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_CACHE_MAX_ENTRIES),
    listen: z
      .object({
        address: z.string().min(1).default("0.0.0.0"),
        port: z.number().int().min(1).max(65535).default(8053),
      })
      .default({}),
    upstream_timeout_ms: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_UPSTREAM_TIMEOUT_MS),
    upstream_retries: z.number().int().min(0).max(10).default(0),
    log_level: z.enum(logLevels).optional(),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.clients.forEach((client, index) => {
      if (seen.has(client.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["clients", index, "id"],
          message: `duplicate client id "${client.id}"`,
        });
      }
      seen.add(client.id);
    });
  });

export function parseConfig(input: unknown): Config {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const data = result.data;
  return {
    clients: data.clients.map((client) => ({
      id: client.id,
      upstreamEndpoint: client.upstream_endpoint,
      addresses: client.addresses,
    })),
    cacheDir: data.cache_dir,
    cacheMaxEntries: data.cache_max_entries,
    listen: data.listen,
    upstreamTimeoutMs: data.upstream_timeout_ms,
    upstreamRetries: data.upstream_retries,
    logLevel: data.log_level,
  };
}

export async function loadConfig(file: string): Promise<Config> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${file}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(
      `Config file ${file} is not valid JSON: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  return parseConfig(parsed);
}

export function resolveConfigPath(
  argv: readonly string[] = process.argv.slice(2),
  env: Record<string, string | undefined> = process.env
): string {
  return argv[0] ?? env.PEER_DNS_CONFIG ?? DEFAULT_CONFIG_PATH;
}
