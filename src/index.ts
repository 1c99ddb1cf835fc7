import { readEnv, redactEnvForLogs, reloadEnvFile } from "./config/env";
import { createLogger, errorMessage } from "./config/logger";
import { closePgPool, getPgPool } from "./db/postgres";
import { PostgresDirectory } from "./directory/postgresDirectory";
import { createAuthorizer } from "./authz/authorization";
import { createBundleProvider } from "./assets/bundle";
import { ConfigurationStore, configurationFromEnv, validateConfiguration } from "./settings/configuration";
import { startHttpServer } from "./http/server";

async function main(): Promise<void> {
  const env = readEnv();
  const logger = createLogger(env.SWITCHBOARD_LOG_LEVEL);

  logger.info("switchboard_boot", { env: redactEnvForLogs(env) });

  const configuration = new ConfigurationStore(configurationFromEnv(env));
  const initialCheck = validateConfiguration(configuration.current());
  if (!initialCheck.ok) {
    logger.warn("switchboard_configuration_invalid", { version: configuration.current().version, message: initialCheck.error.message });
  }

  const pool = getPgPool(env);
  const directory = new PostgresDirectory({ query: (text, values) => pool.query(text, values) });
  const server = startHttpServer({
    host: env.SWITCHBOARD_HOST,
    port: env.SWITCHBOARD_PORT,
    logger,
    configuration,
    directory,
    authorizer: createAuthorizer({ directory, logger }),
    bundle: createBundleProvider(env.SWITCHBOARD_BUNDLE_PATH),
    identityHeader: env.SWITCHBOARD_IDENTITY_HEADER,
  });

  const reloadConfiguration = (): void => {
    try {
      const next = configuration.update(configurationFromEnv(reloadEnvFile()));
      const check = validateConfiguration(next);
      logger.info("switchboard_configuration_reloaded", {
        version: next.version,
        valid: check.ok,
        ...(check.ok ? {} : { message: check.error.message }),
      });
    } catch (error) {
      logger.error("switchboard_configuration_reload_failed", { message: errorMessage(error) });
    }
  };

  let shuttingDown = false;
  const shutdown = async (signal: string, exitCode = 0): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("switchboard_shutdown_start", { signal });

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
    await closePgPool();
    logger.info("switchboard_shutdown_complete", {});
    process.exitCode = exitCode;
  };

  process.on("SIGHUP", reloadConfiguration);
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("uncaughtException", (error) => {
    logger.error("switchboard_uncaught_exception", {
      message: error.message,
      stack: error.stack ?? null,
    });
    void shutdown("uncaughtException", 1);
  });
  process.on("unhandledRejection", (reason) => {
    logger.error("switchboard_unhandled_rejection", {
      message: errorMessage(reason),
    });
    void shutdown("unhandledRejection", 1);
  });
}

void main().catch((error) => {
  process.stderr.write(`switchboard fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
