/**
 * Target database credentials.
 *
 * Config files in the wild spell the same field several ways (`user`, `uid`,
 * `server`, `dbname`, `pwd`, or one connection URL). They are folded into a
 * single TargetCredentials record here, once, when the config is loaded.
 */
import { z } from "zod";

export interface TargetCredentials {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
}

const DEFAULT_PORT = 5432;

const FIELD_ALIASES = {
  user: ["user", "username", "uid", "user_id"],
  host: ["host", "server", "hostname"],
  database: ["database", "dbname", "db", "initial_catalog"],
  password: ["password", "pwd", "pass"],
  port: ["port"],
  ssl: ["ssl", "sslmode", "encrypt"],
} as const;

export type NormalizeResult =
  | { ok: true; credentials: TargetCredentials }
  | { ok: false; errors: string[] };

function lookup(raw: Record<string, unknown>, aliases: readonly string[]): unknown {
  const lowered = new Map<string, unknown>();
  for (const [key, value] of Object.entries(raw)) {
    lowered.set(key.toLowerCase(), value);
  }
  for (const alias of aliases) {
    const value = lowered.get(alias);
    if (value !== undefined && value !== null && value !== "") return value;
  }
  return undefined;
}

function asText(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function asFlag(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    return ["true", "yes", "require", "verify-ca", "verify-full", "mandatory"].includes(
      value.toLowerCase()
    );
  }
  return undefined;
}

/** `host:port` and SQL Server style `host,port` both carry the port. */
function splitHost(host: string): { host: string; port?: number } {
  const match = /^([^,:]+)[,:](\d+)$/.exec(host.trim());
  if (match?.[1] && match[2]) {
    return { host: match[1], port: Number(match[2]) };
  }
  return { host: host.trim() };
}

function fromUrl(url: string): Partial<TargetCredentials> | string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return "target url is not a valid URL";
  }
  if (parsed.protocol !== "postgres:" && parsed.protocol !== "postgresql:") {
    return `target url must use postgres:// or postgresql:// (got ${parsed.protocol})`;
  }
  const sslmode = parsed.searchParams.get("sslmode");
  return {
    host: parsed.hostname,
    ...(parsed.port ? { port: Number(parsed.port) } : {}),
    ...(parsed.pathname.length > 1 ? { database: decodeURIComponent(parsed.pathname.slice(1)) } : {}),
    ...(parsed.username ? { user: decodeURIComponent(parsed.username) } : {}),
    ...(parsed.password ? { password: decodeURIComponent(parsed.password) } : {}),
    ...(sslmode ? { ssl: asFlag(sslmode) ?? false } : {}),
  };
}

/**
 * Fold every accepted spelling into one record. Explicit fields win over the
 * parts of a connection URL given alongside them.
 */
export function normalizeCredentials(raw: Record<string, unknown>): NormalizeResult {
  const errors: string[] = [];
  let base: Partial<TargetCredentials> = {};

  const url = asText(lookup(raw, ["url", "connection_string", "dsn"]));
  if (url) {
    const parsed = fromUrl(url);
    if (typeof parsed === "string") {
      errors.push(parsed);
    } else {
      base = parsed;
    }
  }

  const hostText = asText(lookup(raw, FIELD_ALIASES.host));
  const hostParts = hostText ? splitHost(hostText) : undefined;
  const portText = asText(lookup(raw, FIELD_ALIASES.port));

  const host = hostParts?.host ?? base.host;
  const port = portText !== undefined ? Number(portText) : hostParts?.port ?? base.port ?? DEFAULT_PORT;
  const database = asText(lookup(raw, FIELD_ALIASES.database)) ?? base.database;
  const user = asText(lookup(raw, FIELD_ALIASES.user)) ?? base.user;
  const password = asText(lookup(raw, FIELD_ALIASES.password)) ?? base.password ?? "";
  const ssl = asFlag(lookup(raw, FIELD_ALIASES.ssl)) ?? base.ssl ?? false;

  if (!host) errors.push("target host is required (host, server or url)");
  if (!database) errors.push("target database is required (database, dbname, db or url)");
  if (!user) errors.push("target user is required (user, username, uid or url)");
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    errors.push(`target port is invalid: ${portText ?? String(port)}`);
  }

  if (errors.length > 0 || !host || !database || !user) {
    return { ok: false, errors };
  }
  return { ok: true, credentials: { host, port, database, user, password, ssl } };
}

export const TargetCredentialsSchema = z
  .record(z.unknown())
  .transform((raw, ctx): TargetCredentials => {
    const result = normalizeCredentials(raw);
    if (!result.ok) {
      for (const message of result.errors) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      }
      return z.NEVER;
    }
    return result.credentials;
  });

/** Loggable description without the password. */
export function describeTarget(credentials: TargetCredentials): string {
  return `${credentials.user}@${credentials.host}:${credentials.port}/${credentials.database}`;
}
