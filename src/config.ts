import { z } from "zod";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

const DEFAULT_SCOPES = [
  "crm.objects.contacts.read",
  "crm.schemas.contacts.read",
  "crm.objects.companies.read",
  "crm.schemas.companies.read",
  "oauth"
].join(" ");

const booleanWithDefault = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (value === undefined) {
      return defaultValue;
    }
    if (typeof value === "boolean") {
      return value;
    }
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) {
        return true;
      }
      if (FALSE_VALUES.has(normalized)) {
        return false;
      }
    }
    return value;
  }, z.boolean());

const intWithDefault = (defaultValue: number) =>
  z.preprocess((value) => {
    if (value === undefined || value === "") {
      return defaultValue;
    }
    if (typeof value === "string") {
      return Number.parseInt(value, 10);
    }
    return value;
  }, z.number().int());

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: intWithDefault(8000).refine((value) => value > 0 && value < 65536, "PORT must be 1-65535"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  TRUST_PROXY: booleanWithDefault(false),
  CLIENT_ID: z.string().trim().min(1),
  CLIENT_SECRET: z.string().trim().min(1),
  REDIRECT_URI: z.string().url(),
  OAUTH_SCOPES: z.string().trim().min(1).default(DEFAULT_SCOPES),
  HUBSPOT_AUTHORIZE_URL: z.string().url().default("https://app.hubspot.com/oauth/authorize"),
  HUBSPOT_TOKEN_URL: z.string().url().default("https://api.hubapi.com/oauth/v1/token"),
  HUBSPOT_API_BASE_URL: z.string().url().default("https://api.hubapi.com"),
  HTTP_TIMEOUT_MS: intWithDefault(10_000).refine((value) => value >= 100, "HTTP_TIMEOUT_MS must be >= 100"),
  CACHE_DRIVER: z.enum(["memory", "redis"]).default("redis"),
  CACHE_HOST: z.string().trim().min(1).default("localhost"),
  CACHE_PORT: intWithDefault(6379).refine((value) => value > 0 && value < 65536, "CACHE_PORT must be 1-65535"),
  CACHE_DB: intWithDefault(0).refine((value) => value >= 0, "CACHE_DB must be >= 0"),
  CACHE_COMMAND_TIMEOUT_MS: intWithDefault(1000).refine(
    (value) => value >= 50,
    "CACHE_COMMAND_TIMEOUT_MS must be >= 50"
  ),
  STATE_TTL_SECONDS: intWithDefault(600).refine((value) => value >= 60, "STATE_TTL_SECONDS must be >= 60"),
  CREDENTIALS_TTL_SECONDS: intWithDefault(600).refine(
    (value) => value >= 60,
    "CREDENTIALS_TTL_SECONDS must be >= 60"
  )
});

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  logLevel: "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
  trustProxy: boolean;
  hubspot: {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    scopes: string[];
    authorizeUrl: string;
    tokenUrl: string;
    apiBaseUrl: string;
    timeoutMs: number;
  };
  cache: {
    driver: "memory" | "redis";
    host: string;
    port: number;
    db: number;
    commandTimeoutMs: number;
  };
  ttl: {
    stateSeconds: number;
    credentialsSeconds: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    trustProxy: parsed.TRUST_PROXY,
    hubspot: {
      clientId: parsed.CLIENT_ID,
      clientSecret: parsed.CLIENT_SECRET,
      redirectUri: parsed.REDIRECT_URI,
      scopes: parsed.OAUTH_SCOPES.split(/\s+/),
      authorizeUrl: parsed.HUBSPOT_AUTHORIZE_URL,
      tokenUrl: parsed.HUBSPOT_TOKEN_URL,
      apiBaseUrl: parsed.HUBSPOT_API_BASE_URL.replace(/\/+$/, ""),
      timeoutMs: parsed.HTTP_TIMEOUT_MS
    },
    cache: {
      driver: parsed.CACHE_DRIVER,
      host: parsed.CACHE_HOST,
      port: parsed.CACHE_PORT,
      db: parsed.CACHE_DB,
      commandTimeoutMs: parsed.CACHE_COMMAND_TIMEOUT_MS
    },
    ttl: {
      stateSeconds: parsed.STATE_TTL_SECONDS,
      credentialsSeconds: parsed.CREDENTIALS_TTL_SECONDS
    }
  };
}
