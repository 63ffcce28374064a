import "dotenv/config";
import { createApp } from "./app.js";
import { ConfigError, isFallbackOnly, loadConfig, type AppConfig } from "./config/index.js";
import { createLogger } from "./logging/index.js";
import { Orchestrator } from "./orchestrator.js";
import { createProvider } from "./providers/index.js";
import { SessionStore } from "./session.js";

function readConfig(): Readonly<AppConfig> {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

function main(): void {
  const config = readConfig();

  const logger = createLogger({ level: config.logLevel, file: config.logFile });
  const provider = createProvider(config, logger);
  const orchestrator = new Orchestrator(provider, {
    logger,
    defaults: { targetLength: config.defaultTargetLength, temperature: config.model.temperature }
  });
  const app = createApp({
    orchestrator,
    logger,
    fallbackOnly: isFallbackOnly(config),
    sessions: new SessionStore({ idleTtlMs: config.sessionTtlMs })
  });

  app.listen(config.port, () => {
    logger.info(`Draft critic backend listening on ${config.port}`, {
      provider: provider.name,
      env: config.env
    });
  });
}

main();
