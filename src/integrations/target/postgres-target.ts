/**
 * PostgreSQL target: deploys converted code and describes deployed objects
 * from information_schema.
 */
import postgres from "postgres";
import type {
  DeployOutcome,
  DeploymentExecutor,
  MetadataRefresher,
} from "../../core/collaborators.js";
import type { TargetCredentials } from "../../core/credentials.js";
import { redactRowValues } from "../../core/conversion/row-data-guard.js";
import { errorMessage } from "../../core/errors.js";
import type { ObjectDescription, ObjectIdentity, ObjectKind } from "../../core/types.js";
import type { Logger } from "../../utils/logger.js";

export function createTargetClient(credentials: TargetCredentials, logger: Logger): postgres.Sql {
  return postgres({
    host: credentials.host,
    port: credentials.port,
    database: credentials.database,
    username: credentials.user,
    password: credentials.password,
    ssl: credentials.ssl ? "require" : false,
    max: 1,
    idle_timeout: 30,
    connect_timeout: 15,
    onnotice: (notice) => logger.debug({ notice: notice.message }, "Target notice"),
  });
}

/** Split on batch separator lines (`GO`) that converted code sometimes carries. */
export function splitBatches(text: string): string[] {
  return text
    .split(/^\s*GO\s*;?\s*$/im)
    .map((b) => b.trim())
    .filter((b) => b.length > 0);
}

/**
 * `[SQLSTATE] message`, plus detail and hint when the server sent them.
 * Row values echoed in the detail are replaced with `(<row>)`.
 */
export function formatTargetError(err: unknown): string {
  if (err instanceof postgres.PostgresError) {
    const parts = [`[${err.code}] ${err.message}`];
    if (err.detail) parts.push(`DETAIL: ${redactRowValues(err.detail)}`);
    if (err.hint) parts.push(`HINT: ${err.hint}`);
    if (err.position) parts.push(`POSITION: ${err.position}`);
    return parts.join(" ");
  }
  return errorMessage(err);
}

interface ColumnRow {
  column_name: string;
  data_type: string;
  is_nullable: string;
  is_identity: string;
  column_default: string | null;
}

interface ConstraintRow {
  constraint_name: string;
  constraint_type: string;
}

interface NameRow {
  name: string;
}

export interface PostgresTargetOptions {
  sql: postgres.Sql;
  database: string;
  targetSchema: string;
  logger: Logger;
}

export class PostgresTarget implements DeploymentExecutor, MetadataRefresher {
  private readonly sql: postgres.Sql;

  constructor(private options: PostgresTargetOptions) {
    this.sql = options.sql;
  }

  async ping(): Promise<void> {
    await this.sql`select 1 as ok`;
  }

  /**
   * All batches run in one transaction, so a failure leaves nothing behind.
   * Aborting `signal` cancels the statement in flight.
   */
  async deploy(text: string, signal?: AbortSignal): Promise<DeployOutcome> {
    const batches = splitBatches(text);
    if (batches.length === 0) {
      return { ok: false, error: "Nothing to deploy: converted text is empty" };
    }

    try {
      await this.sql.begin(async (tx) => {
        for (const batch of batches) {
          if (signal?.aborted) throw new Error("Deployment aborted");
          const query = tx.unsafe(batch).simple();
          // Cancelling the running statement fails the transaction, which rolls back.
          const cancel = () => query.cancel();
          signal?.addEventListener("abort", cancel, { once: true });
          try {
            await query;
          } finally {
            signal?.removeEventListener("abort", cancel);
          }
        }
      });
      return { ok: true };
    } catch (err) {
      return { ok: false, error: formatTargetError(err) };
    }
  }

  async describe(identity: ObjectIdentity, kind: ObjectKind): Promise<ObjectDescription | null> {
    const schema = this.options.targetSchema;
    const name = identity.name.toLowerCase();

    switch (kind) {
      case "Table":
        return this.describeTable(schema, name);
      case "Trigger":
        return this.describeNamed(
          schema,
          await this.sql<NameRow[]>`
            select trigger_name as name from information_schema.triggers
            where trigger_schema = ${schema} and trigger_name = ${name}
            limit 1`
        );
      case "Procedure":
      case "Function":
      case "PackageMember":
        return this.describeNamed(
          schema,
          await this.sql<NameRow[]>`
            select routine_name as name from information_schema.routines
            where routine_schema = ${schema} and routine_name = ${name}
            limit 1`
        );
    }
  }

  async close(): Promise<void> {
    await this.sql.end({ timeout: 5 });
  }

  private async describeTable(schema: string, name: string): Promise<ObjectDescription | null> {
    const columns = await this.sql<ColumnRow[]>`
      select column_name, data_type, is_nullable, is_identity, column_default
      from information_schema.columns
      where table_schema = ${schema} and table_name = ${name}
      order by ordinal_position`;
    if (columns.length === 0) return null;

    const constraints = await this.sql<ConstraintRow[]>`
      select constraint_name, constraint_type
      from information_schema.table_constraints
      where table_schema = ${schema} and table_name = ${name}
      order by constraint_name`;

    return {
      database: this.options.database,
      schema,
      name,
      columns: columns.map((c) => ({
        name: c.column_name,
        dataType: c.data_type,
        nullable: c.is_nullable === "YES",
        isIdentity: c.is_identity === "YES" || (c.column_default ?? "").startsWith("nextval("),
      })),
      constraints: constraints.map((c) => `${c.constraint_type} ${c.constraint_name}`),
    };
  }

  private describeNamed(schema: string, rows: readonly NameRow[]): ObjectDescription | null {
    const row = rows[0];
    if (!row) return null;
    return {
      database: this.options.database,
      schema,
      name: row.name,
      columns: [],
      constraints: [],
    };
  }
}
