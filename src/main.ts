#!/usr/bin/env node
import { loadConfig, resolveConfigPath } from "./config";
import { ConfigError, errorMessage } from "./errors";
import { createLogger } from "./logger";
import { ResolverPool } from "./pool";
import { DnsProtocolServer } from "./server";

export async function main(
  argv: readonly string[] = process.argv.slice(2)
): Promise<DnsProtocolServer> {
  const configPath = resolveConfigPath(argv);
  const config = await loadConfig(configPath);
  const logger = createLogger({ level: config.logLevel });

  logger.info(`Starting with ${config.clients.length} clients`, {
    label: "Startup",
    config: configPath,
  });

  const pool = await ResolverPool.create(config, { logger });
  const server = new DnsProtocolServer({ logger });
  server.registerHandler(({ domain, sourceAddress }) =>
    pool.answer(domain, { sourceAddress })
  );
  await server.listen(config.listen.port, config.listen.address);

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`, { label: "Startup" });
    server
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`, {
          label: "Startup",
        });
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  return server;
}

if (require.main === module) {
  main().catch((error: unknown) => {
    const logger = createLogger();
    if (error instanceof ConfigError) {
      logger.error(error.message, { label: "Startup", code: error.code });
    } else {
      logger.error(`Failed to start: ${errorMessage(error)}`, {
        label: "Startup",
      });
    }
    process.exitCode = 1;
  });
}
