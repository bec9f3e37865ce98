import { z } from "zod";
import { ConfigError, MissingApiKeyError } from "./lib/errors.js";

export const TRANSPORTS = ["stdio", "sse", "streamable-http"] as const;
export type TransportKind = (typeof TRANSPORTS)[number];

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => ["1", "true", "yes", "on"].includes((value ?? "").trim().toLowerCase()));

const EnvSchema = z.object({
  MASSIVE_API_KEY: z
    .string()
    .optional()
    .transform((value) => value?.trim() || undefined),
  MASSIVE_BASE_URL: z.string().url().default("https://api.massive.com"),
  MCP_TRANSPORT: z.enum(TRANSPORTS).default("stdio"),
  MCP_HOST: z.string().min(1).default("127.0.0.1"),
  MCP_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  WEB_ORIGIN: z.string().min(1).default("*"),
  OCC_STRICT_CALENDAR: booleanFlag,
});

export interface AppConfig {
  apiKey: string | undefined;
  baseUrl: string;
  transport: TransportKind;
  host: string;
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
  webOrigin: string;
  strictCalendar: boolean;
}

export type ConfigOverrides = Partial<Pick<AppConfig, "transport" | "host" | "port" | "logLevel">>;

/**
 * Read configuration from the environment. CLI flags win over env values.
 * Empty strings count as unset so a blank `MASSIVE_API_KEY=` in .env does
 * not masquerade as a key.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): AppConfig {
  const withoutBlanks = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = EnvSchema.safeParse(withoutBlanks);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${issues}`);
  }

  const values = parsed.data;
  return {
    apiKey: values.MASSIVE_API_KEY,
    baseUrl: values.MASSIVE_BASE_URL.replace(/\/+$/, ""),
    transport: overrides.transport ?? values.MCP_TRANSPORT,
    host: overrides.host ?? values.MCP_HOST,
    port: overrides.port ?? values.MCP_PORT,
    logLevel: overrides.logLevel ?? values.LOG_LEVEL,
    webOrigin: values.WEB_ORIGIN,
    strictCalendar: values.OCC_STRICT_CALENDAR,
  };
}

export function ensureApiKey(config: Pick<AppConfig, "apiKey">): string {
  if (!config.apiKey) {
    throw new MissingApiKeyError();
  }
  return config.apiKey;
}
