import z from "zod";
import { ConfigError } from "./errors";

/**
 * Server configuration read from environment variables.
 * The entry point loads `server/.env` with dotenv before calling loadConfig.
 */

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().default("0.0.0.0"),
  DATABASE_URL: z.string().min(1).optional(),
  DB_HOST: z.string().default("localhost"),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().default("postgres"),
  DB_USER: z.string().default("postgres"),
  DB_PASSWORD: z.string().default(""),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  CORS_ORIGINS: z.string().default("*"),
  MAX_UPLOAD_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(50 * 1024 * 1024),
});

export type LogLevel = z.infer<typeof ConfigSchema>["LOG_LEVEL"];

export type DatabaseConfig =
  | { connectionString: string; max: number }
  | {
      host: string;
      port: number;
      database: string;
      user: string;
      password: string;
      max: number;
    };

export interface AppConfig {
  port: number;
  host: string;
  database: DatabaseConfig;
  logLevel: LogLevel;
  /** `true` allows every origin */
  corsOrigins: string[] | true;
  maxUploadBytes: number;
}

function parseOrigins(raw: string): string[] | true {
  const origins = raw
    .split(",")
    .map((o) => o.trim())
    .filter((o) => o.length > 0);
  if (origins.length === 0 || origins.includes("*")) return true;
  return origins;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // blank variables fall back to their defaults
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`${issue.path.join(".")}: ${issue.message}`);
  }

  const vars = parsed.data;
  // DATABASE_URL wins over the individual settings
  const database: DatabaseConfig = vars.DATABASE_URL
    ? { connectionString: vars.DATABASE_URL, max: vars.DB_POOL_MAX }
    : {
        host: vars.DB_HOST,
        port: vars.DB_PORT,
        database: vars.DB_NAME,
        user: vars.DB_USER,
        password: vars.DB_PASSWORD,
        max: vars.DB_POOL_MAX,
      };

  return {
    port: vars.PORT,
    host: vars.HOST,
    database,
    logLevel: vars.LOG_LEVEL,
    corsOrigins: parseOrigins(vars.CORS_ORIGINS),
    maxUploadBytes: vars.MAX_UPLOAD_BYTES,
  };
}
