export * from "./core/index.js";
export { loadConfig, ConfigError, type AppConfig, type BackendType, type ServiceRole } from "./config.js";
export { Logger, silentLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export { createBackend, createServices, type Services } from "./http/services.js";
export { createServer, startServer, type ServerOptions } from "./http/server.js";
