import { Pool, QueryResult, QueryResultRow } from "pg";
import { MemoryNamespace } from "../contracts";
import { InternalRuntimeError } from "../errors";
import { assertNamespace, namespaceKey } from "../preferences/namespace";
import { PreferencePersistencePort, PreferenceRecord, PreferenceWrite } from "./preferences";

/** The slice of `pg.Pool` this store needs; tests pass an in-process fake. */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>>;
}

export const PREFERENCE_PROFILES_DDL = `
CREATE TABLE IF NOT EXISTS preference_profiles (
  namespace_key TEXT PRIMARY KEY,
  namespace TEXT[] NOT NULL,
  profile TEXT NOT NULL,
  version INTEGER NOT NULL,
  updated_at TIMESTAMPTZ NOT NULL
)`;

export class PostgresPreferencePersistence implements PreferencePersistencePort {
  private readonly db: PgQueryable;
  private readonly ownedPool?: Pool;

  constructor(connection: string | PgQueryable) {
    if (typeof connection === "string") {
      this.ownedPool = new Pool({ connectionString: connection });
      this.db = this.ownedPool;
    } else {
      this.db = connection;
    }
  }

  /** Ends the pool this store created; an injected client is left to its owner. */
  async close(): Promise<void> {
    await this.ownedPool?.end();
  }

  async ensureSchema(): Promise<void> {
    await this.db.query(PREFERENCE_PROFILES_DDL);
  }

  async read(namespace: MemoryNamespace): Promise<PreferenceRecord | undefined> {
    const result = await this.db.query(
      `SELECT namespace, profile, version, updated_at
       FROM preference_profiles
       WHERE namespace_key = $1`,
      [namespaceKey(namespace)]
    );
    const row = result.rows[0];
    return row ? toRecord(row) : undefined;
  }

  async write(input: PreferenceWrite): Promise<boolean> {
    const key = namespaceKey(input.namespace);
    if (input.expectedVersion === undefined) {
      const inserted = await this.db.query(
        `INSERT INTO preference_profiles (namespace_key, namespace, profile, version, updated_at)
         VALUES ($1, $2, $3, 1, $4)
         ON CONFLICT (namespace_key) DO NOTHING`,
        [key, [...input.namespace], input.profile, input.updatedAt]
      );
      return (inserted.rowCount ?? 0) === 1;
    }

    const updated = await this.db.query(
      `UPDATE preference_profiles
       SET profile = $2, version = version + 1, updated_at = $3
       WHERE namespace_key = $1 AND version = $4`,
      [key, input.profile, input.updatedAt, input.expectedVersion]
    );
    return (updated.rowCount ?? 0) === 1;
  }

  async listNamespaces(): Promise<MemoryNamespace[]> {
    const result = await this.db.query(
      `SELECT namespace, profile, version, updated_at
       FROM preference_profiles
       ORDER BY namespace_key ASC`
    );
    return result.rows.map((row) => toRecord(row).namespace);
  }
}

function toRecord(row: QueryResultRow): PreferenceRecord {
  const namespace: unknown = row.namespace;
  const profile: unknown = row.profile;
  const updatedAt: unknown = row.updated_at;
  if (!Array.isArray(namespace) || !namespace.every((segment) => typeof segment === "string")) {
    throw new InternalRuntimeError("preference_profiles.namespace is not a text array");
  }
  const segments: string[] = namespace.map(String);
  assertNamespace(segments);
  if (typeof profile !== "string") {
    throw new InternalRuntimeError("preference_profiles.profile is not text");
  }

  return {
    namespace: segments,
    profile,
    version: Number(row.version),
    updatedAt: updatedAt instanceof Date ? updatedAt.toISOString() : String(updatedAt)
  };
}
