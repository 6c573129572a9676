import { z } from "zod";

import { LOG_LEVELS, type LogLevel } from "./logger.js";

const SERVICE_ROLES = ["indexing", "search", "all"] as const;
const BACKEND_TYPES = ["redis", "sqlite", "memory"] as const;

export type ServiceRole = (typeof SERVICE_ROLES)[number];
export type BackendType = (typeof BACKEND_TYPES)[number];

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(7002),
  SERVICE_ROLE: z.enum(SERVICE_ROLES).default("all"),
  BACKEND_TYPE: z
    .string()
    .transform((v) => v.trim().toLowerCase())
    .pipe(z.enum(BACKEND_TYPES))
    .default("redis"),
  REDIS_URL: z.string().url().default("redis://localhost:6379"),
  SQLITE_PATH: z.string().min(1).default("./data/index.db"),
  BACKEND_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  DATALAKE_PATH: z.string().min(1).default("./datalake"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface AppConfig {
  port: number;
  role: ServiceRole;
  backend:
    | { type: "redis"; url: string; timeoutMs: number }
    | { type: "sqlite"; path: string; timeoutMs: number }
    | { type: "memory" };
  datalakePath: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Parses environment variables; unset or empty variables take their defaults. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }

  const e = parsed.data;
  const backend: AppConfig["backend"] =
    e.BACKEND_TYPE === "redis"
      ? { type: "redis", url: e.REDIS_URL, timeoutMs: e.BACKEND_TIMEOUT_MS }
      : e.BACKEND_TYPE === "sqlite"
        ? { type: "sqlite", path: e.SQLITE_PATH, timeoutMs: e.BACKEND_TIMEOUT_MS }
        : { type: "memory" };

  return {
    port: e.PORT,
    role: e.SERVICE_ROLE,
    backend,
    datalakePath: e.DATALAKE_PATH,
    logLevel: e.LOG_LEVEL,
  };
}
