import { ConfigError, loadConfig, type AppConfig } from "./config.js";
import type { StorageBackend } from "./core/storageBackend.js";
import { DatalakeBookSource } from "./core/impl/index.js";
import { createBackend, createServices } from "./http/services.js";
import { startServer } from "./http/server.js";
import { Logger } from "./logger.js";

function configOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (e) {
    console.error(e instanceof ConfigError ? e.message : e);
    process.exit(1);
  }
}

// an unreachable backend at startup is fatal: exit before listening
async function connectOrExit(cfg: AppConfig["backend"], logger: Logger): Promise<StorageBackend> {
  let backend: StorageBackend | undefined;
  try {
    backend = createBackend(cfg, logger);
    await backend.testConnection();
    logger.info("storage backend connected", { backend: cfg.type });
    return backend;
  } catch (e) {
    logger.error("storage backend unreachable", e, { backend: cfg.type });
    await backend?.close().catch((closeErr: unknown) => logger.warn("backend close failed", { error: String(closeErr) }));
    process.exit(1);
  }
}

const config = configOrExit();
const logger = new Logger({ level: config.logLevel, context: { service: "book-index", role: config.role } });
const backend = await connectOrExit(config.backend, logger);

const services = createServices({ backend, source: new DatalakeBookSource(config.datalakePath), logger });
const { server, port } = await startServer({ port: config.port, role: config.role, services, logger });

function shutdown(): void {
  server.close(() => {
    backend.close().then(
      () => process.exit(0),
      (e: unknown) => {
        logger.error("backend close failed", e);
        process.exit(1);
      },
    );
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

logger.info(`listening on :${port}`, { port });
