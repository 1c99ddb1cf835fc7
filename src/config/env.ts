import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

// Captured before dotenv fills in `.env`, so reloads can tell the two apart.
const launchEnv: NodeJS.ProcessEnv = { ...process.env };

dotenv.config();

const requiredString = (field: string) =>
  z
    .string()
    .trim()
    .min(1, { message: `${field} must not be empty` });

const EnvSchema = z.object({
  SWITCHBOARD_PORT: z.coerce.number().int().min(1).max(65535).default(8065),
  SWITCHBOARD_HOST: requiredString("SWITCHBOARD_HOST").default("127.0.0.1"),
  SWITCHBOARD_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  SWITCHBOARD_BUNDLE_PATH: requiredString("SWITCHBOARD_BUNDLE_PATH").default("."),
  SWITCHBOARD_IDENTITY_HEADER: requiredString("SWITCHBOARD_IDENTITY_HEADER")
    .transform((value) => value.toLowerCase())
    .default("x-user-id"),

  // Plugin settings stay raw here; the configuration gate validates them per request.
  SWITCHBOARD_ENABLE_WEB_UI: z.string().default("false"),
  SWITCHBOARD_PERMITTED_USERS: z.string().default(""),
  SWITCHBOARD_ALLOWED_EMAIL_DOMAINS: z.string().default(""),

  PGHOST: requiredString("PGHOST").default("127.0.0.1"),
  PGPORT: z.coerce.number().int().min(1).max(65535).default(5432),
  PGDATABASE: requiredString("PGDATABASE").default("chat"),
  PGUSER: requiredString("PGUSER").default("postgres"),
  PGPASSWORD: requiredString("PGPASSWORD").default("postgres"),
  PGSSLMODE: z.enum(["disable", "prefer", "require"]).default("disable"),
  SWITCHBOARD_PG_POOL_MAX: z.coerce.number().int().min(1).max(50).default(5),
  SWITCHBOARD_PG_IDLE_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(300_000).default(30_000),
  SWITCHBOARD_PG_CONNECTION_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(120_000).default(10_000),
});

export type SwitchboardEnv = z.infer<typeof EnvSchema>;

export function readEnv(source: NodeJS.ProcessEnv = process.env): SwitchboardEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid switchboard env: ${message}`);
  }
  return parsed.data;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Environment for a settings reload: the launch environment over a fresh
 * parse of `.env`. Launch variables win, as they do at boot, and a key
 * removed from the file is absent from the result.
 */
export function reloadEnvFile(
  envPath: string = path.resolve(process.cwd(), ".env"),
  base: NodeJS.ProcessEnv = launchEnv
): NodeJS.ProcessEnv {
  let fromFile: Record<string, string> = {};
  try {
    fromFile = dotenv.parse(fs.readFileSync(envPath));
  } catch (error) {
    if (!isMissingFile(error)) throw error;
  }
  return { ...fromFile, ...base };
}

export function redactEnvForLogs(env: SwitchboardEnv): Record<string, string | number | boolean | null> {
  return {
    SWITCHBOARD_HOST: env.SWITCHBOARD_HOST,
    SWITCHBOARD_PORT: env.SWITCHBOARD_PORT,
    SWITCHBOARD_LOG_LEVEL: env.SWITCHBOARD_LOG_LEVEL,
    SWITCHBOARD_BUNDLE_PATH: env.SWITCHBOARD_BUNDLE_PATH,
    SWITCHBOARD_IDENTITY_HEADER: env.SWITCHBOARD_IDENTITY_HEADER,
    SWITCHBOARD_ENABLE_WEB_UI: env.SWITCHBOARD_ENABLE_WEB_UI,
    SWITCHBOARD_PERMITTED_USERS: env.SWITCHBOARD_PERMITTED_USERS ? "[set]" : null,
    SWITCHBOARD_ALLOWED_EMAIL_DOMAINS: env.SWITCHBOARD_ALLOWED_EMAIL_DOMAINS || null,
    PGHOST: env.PGHOST,
    PGPORT: env.PGPORT,
    PGDATABASE: env.PGDATABASE,
    PGUSER: env.PGUSER,
    PGPASSWORD: "[redacted]",
    PGSSLMODE: env.PGSSLMODE,
    SWITCHBOARD_PG_POOL_MAX: env.SWITCHBOARD_PG_POOL_MAX,
    SWITCHBOARD_PG_IDLE_TIMEOUT_MS: env.SWITCHBOARD_PG_IDLE_TIMEOUT_MS,
    SWITCHBOARD_PG_CONNECTION_TIMEOUT_MS: env.SWITCHBOARD_PG_CONNECTION_TIMEOUT_MS,
  };
}
