/**
 * Environment configuration.
 *
 * Every setting comes from an environment variable with a default. Values
 * are defaulted, coerced from strings and checked against a Typebox schema;
 * anything that fails the check is a startup error.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

/** 100 years */
const MAX_LOOKBACK_DAYS = 36_500;

export const EnvSchema = Type.Object({
  MONGO_URI: Type.String({ minLength: 1, default: "mongodb://localhost:27017/" }),
  MONGO_DB: Type.String({ minLength: 1, default: "LibreChat" }),
  MONGO_TIMEOUT_MS: Type.Integer({ minimum: 1, default: 5_000 }),
  PORT: Type.Integer({ minimum: 0, maximum: 65_535, default: 8_000 }),
  HOST: Type.String({ minLength: 1, default: "0.0.0.0" }),
  // setTimeout takes at most 2^31 - 1 ms
  COLLECT_INTERVAL_MS: Type.Integer({ minimum: 1_000, maximum: 2_147_483_647, default: 60_000 }),
  STATS_LOOKBACK_DAYS: Type.Integer({ minimum: 0, maximum: MAX_LOOKBACK_DAYS, default: 0 }),
  STATS_TIMEZONE: Type.String({ minLength: 1, default: "UTC" }),
  STATS_STDDEV: Type.Union([Type.Literal("population"), Type.Literal("sample")], {
    default: "population",
  }),
  LDAP_SERVER: Type.Optional(Type.String({ minLength: 1 })),
  LDAP_PORT: Type.Integer({ minimum: 1, maximum: 65_535, default: 636 }),
  LDAP_BASE_DN: Type.Optional(Type.String({ minLength: 1 })),
  LDAP_SEARCH_FILTER: Type.String({ minLength: 1, default: "(objectClass=person)" }),
  LDAP_CIPHERS: Type.Optional(Type.String({ minLength: 1 })),
  LDAP_FACULTY_ATTRIBUTE: Type.String({ minLength: 1, default: "faculty" }),
  LDAP_TLS_VERIFY: Type.Boolean({ default: true }),
  LDAP_TIMEOUT_MS: Type.Integer({ minimum: 1, default: 10_000 }),
  METRICS_DEFAULT: Type.Boolean({ default: true }),
  LOG_LEVEL: Type.Union(
    [
      Type.Literal("fatal"),
      Type.Literal("error"),
      Type.Literal("warn"),
      Type.Literal("info"),
      Type.Literal("debug"),
      Type.Literal("trace"),
      Type.Literal("silent"),
    ],
    { default: "info" },
  ),
  NODE_ENV: Type.String({ default: "development" }),
});

export type Env = Static<typeof EnvSchema>;

/** Anonymous directory search for the users-per-faculty rollup */
export interface LdapOptions {
  /** Host name, or a full ldap:// / ldaps:// URL */
  server: string;
  port: number;
  baseDn: string;
  searchFilter: string;
  facultyAttribute: string;
  /** OpenSSL cipher list for the TLS handshake */
  ciphers?: string;
  /** Verify the server certificate */
  tlsVerify: boolean;
  timeoutMs: number;
}

/** Resolved runtime configuration */
export interface ExporterConfig {
  mongo: {
    uri: string;
    dbName: string;
    serverSelectionTimeoutMS: number;
  };
  http: {
    port: number;
    host: string;
  };
  collector: {
    intervalMs: number;
    /** 0 disables the lookback window */
    lookbackDays: number;
    timezone: string;
    stdDev: Env["STATS_STDDEV"];
  };
  metrics: {
    defaultMetrics: boolean;
  };
  /** null unless LDAP_SERVER is set */
  ldap: LdapOptions | null;
  logLevel: Env["LOG_LEVEL"];
  isDev: boolean;
}

export class ConfigError extends Error {
  constructor(
    public readonly variable: string,
    message: string,
  ) {
    super(`Invalid ${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

/** UTC offsets (+05:30, -0800, +03) or an IANA zone name known to the runtime */
export function isValidTimezone(timezone: string): boolean {
  if (/^[+-]\d{2}(:?\d{2})?$/.test(timezone)) return true;
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch (err) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}

/**
 * Read configuration from an environment map (defaults to `process.env`).
 * Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExporterConfig {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = env[key];
    if (value !== undefined && value !== "") raw[key] = value;
  }

  const parsed = Value.Convert(EnvSchema, Value.Default(EnvSchema, raw));
  if (!Value.Check(EnvSchema, parsed)) {
    const first = Value.Errors(EnvSchema, parsed).First();
    const variable = first?.path.replace(/^\//, "") || "environment";
    throw new ConfigError(variable, first?.message ?? "does not match schema");
  }

  if (!isValidTimezone(parsed.STATS_TIMEZONE)) {
    throw new ConfigError("STATS_TIMEZONE", `unknown time zone "${parsed.STATS_TIMEZONE}"`);
  }

  if (parsed.LDAP_SERVER && !parsed.LDAP_BASE_DN) {
    throw new ConfigError("LDAP_BASE_DN", "required when LDAP_SERVER is set");
  }
  const ldap: LdapOptions | null =
    parsed.LDAP_SERVER && parsed.LDAP_BASE_DN
      ? {
          server: parsed.LDAP_SERVER,
          port: parsed.LDAP_PORT,
          baseDn: parsed.LDAP_BASE_DN,
          searchFilter: parsed.LDAP_SEARCH_FILTER,
          facultyAttribute: parsed.LDAP_FACULTY_ATTRIBUTE,
          ciphers: parsed.LDAP_CIPHERS,
          tlsVerify: parsed.LDAP_TLS_VERIFY,
          timeoutMs: parsed.LDAP_TIMEOUT_MS,
        }
      : null;

  return {
    mongo: {
      uri: parsed.MONGO_URI,
      dbName: parsed.MONGO_DB,
      serverSelectionTimeoutMS: parsed.MONGO_TIMEOUT_MS,
    },
    http: {
      port: parsed.PORT,
      host: parsed.HOST,
    },
    collector: {
      intervalMs: parsed.COLLECT_INTERVAL_MS,
      lookbackDays: parsed.STATS_LOOKBACK_DAYS,
      timezone: parsed.STATS_TIMEZONE,
      stdDev: parsed.STATS_STDDEV,
    },
    metrics: {
      defaultMetrics: parsed.METRICS_DEFAULT,
    },
    ldap,
    logLevel: parsed.LOG_LEVEL,
    isDev: parsed.NODE_ENV !== "production",
  };
}
