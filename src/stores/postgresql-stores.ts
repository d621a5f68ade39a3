/**
 * PostgreSQL Stores
 *
 * GenerationIndexStore and LoginEventStore backed by PostgreSQL through `pg`.
 * Counter increments are single upsert statements, so concurrent bumps never
 * lose an update. All queries are parameterized.
 *
 * Usage:
 * ```typescript
 * const pool = createPostgreSQLPool(configManager.getPostgreSQLConfig());
 * await verifyConnection(pool);
 * await applySchema(pool);
 *
 * const security = createSecurityContext(config.auth, {
 *   generationStore: new PostgreSQLGenerationIndexStore(pool),
 *   loginEventStore: new PostgreSQLLoginEventStore(pool),
 *   ...
 * });
 * ```
 */

import { readFile } from 'fs/promises';
import pg from 'pg';
import type { z } from 'zod';
import { PostgreSQLConfigSchema } from '../config/schemas/storage.js';
import type { GenerationIndexStore, LoginEventStore } from '../core/types.js';
import { AuthErrors, createAuthError } from '../utils/errors.js';

const { Pool } = pg;

/** Anything that runs a parameterized query: a Pool, a PoolClient or a Client. */
export interface Queryable {
  query<R extends pg.QueryResultRow>(text: string, values?: unknown[]): Promise<pg.QueryResult<R>>;
}

interface GenerationRow {
  generation: number;
}

interface LoginEventRow {
  id: number;
}

const SCHEMA_FILE = new URL('../../sql/schema.sql', import.meta.url);

// ============================================================================
// Pool helpers
// ============================================================================

/**
 * Build a pool from (unparsed or parsed) storage configuration.
 *
 * @throws ZodError on invalid configuration
 */
export function createPostgreSQLPool(
  config: z.input<typeof PostgreSQLConfigSchema>
): pg.Pool {
  const parsed = PostgreSQLConfigSchema.parse(config);

  return new Pool({
    host: parsed.host,
    port: parsed.port,
    database: parsed.database,
    user: parsed.user,
    password: parsed.password,
    ssl: parsed.options?.ssl ?? false,
    max: parsed.pool?.max ?? 10,
    min: parsed.pool?.min ?? 0,
    idleTimeoutMillis: parsed.pool?.idleTimeoutMillis ?? 30000,
    connectionTimeoutMillis: parsed.pool?.connectionTimeoutMillis ?? 5000,
  });
}

/**
 * @throws AuthError POSTGRESQL_CONNECTION_FAILED
 */
export async function verifyConnection(pool: pg.Pool): Promise<void> {
  try {
    const client = await pool.connect();
    try {
      await client.query('SELECT 1');
    } finally {
      client.release();
    }
  } catch (error) {
    throw createAuthError(
      'POSTGRESQL_CONNECTION_FAILED',
      `Failed to initialize PostgreSQL connection: ${error instanceof Error ? error.message : String(error)}`,
      500
    );
  }
}

/** Create the store tables if they do not exist. */
export async function applySchema(db: Queryable): Promise<void> {
  const ddl = await readFile(SCHEMA_FILE, 'utf-8');
  await db.query(ddl);
  console.log('[PostgreSQLStores] Schema applied');
}

async function run<R extends pg.QueryResultRow>(
  db: Queryable,
  store: string,
  text: string,
  values: unknown[]
): Promise<R[]> {
  try {
    const result = await db.query<R>(text, values);
    return result.rows;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[PostgreSQLStores] ${store} query failed:`, { reason });
    throw AuthErrors.STORE_FAILURE(store, reason);
  }
}

// ============================================================================
// Generation index
// ============================================================================

export class PostgreSQLGenerationIndexStore implements GenerationIndexStore {
  private static readonly NAME = 'PostgreSQLGenerationIndexStore';

  constructor(private readonly db: Queryable) {}

  async getTenantGeneration(tenantId: number): Promise<number> {
    const rows = await run<GenerationRow>(
      this.db,
      PostgreSQLGenerationIndexStore.NAME,
      'SELECT generation FROM tenant_generations WHERE tenant_id = $1',
      [tenantId]
    );
    return rows[0]?.generation ?? 0;
  }

  async getUserGeneration(userId: string): Promise<number> {
    const rows = await run<GenerationRow>(
      this.db,
      PostgreSQLGenerationIndexStore.NAME,
      'SELECT generation FROM user_generations WHERE user_id = $1',
      [userId]
    );
    return rows[0]?.generation ?? 0;
  }

  async incrementTenantGeneration(tenantId: number): Promise<number> {
    const rows = await run<GenerationRow>(
      this.db,
      PostgreSQLGenerationIndexStore.NAME,
      `INSERT INTO tenant_generations (tenant_id, generation) VALUES ($1, 1)
       ON CONFLICT (tenant_id) DO UPDATE SET generation = tenant_generations.generation + 1
       RETURNING generation`,
      [tenantId]
    );
    return this.single(rows, 'incrementTenantGeneration');
  }

  async incrementUserGeneration(userId: string): Promise<number> {
    const rows = await run<GenerationRow>(
      this.db,
      PostgreSQLGenerationIndexStore.NAME,
      `INSERT INTO user_generations (user_id, generation) VALUES ($1, 1)
       ON CONFLICT (user_id) DO UPDATE SET generation = user_generations.generation + 1
       RETURNING generation`,
      [userId]
    );
    return this.single(rows, 'incrementUserGeneration');
  }

  private single(rows: GenerationRow[], operation: string): number {
    const row = rows[0];
    if (!row) {
      throw AuthErrors.STORE_FAILURE(PostgreSQLGenerationIndexStore.NAME, `${operation} returned no row`);
    }
    return row.generation;
  }
}

// ============================================================================
// Login events
// ============================================================================

export class PostgreSQLLoginEventStore implements LoginEventStore {
  private static readonly NAME = 'PostgreSQLLoginEventStore';

  constructor(private readonly db: Queryable) {}

  async getValidEventIds(tenantId: number, userId: string): Promise<ReadonlySet<number>> {
    const rows = await run<LoginEventRow>(
      this.db,
      PostgreSQLLoginEventStore.NAME,
      'SELECT id FROM login_events WHERE tenant_id = $1 AND user_id = $2',
      [tenantId, userId]
    );
    return new Set(rows.map((row) => row.id));
  }

  async addEvent(tenantId: number, userId: string): Promise<number> {
    const rows = await run<LoginEventRow>(
      this.db,
      PostgreSQLLoginEventStore.NAME,
      'INSERT INTO login_events (tenant_id, user_id) VALUES ($1, $2) RETURNING id',
      [tenantId, userId]
    );
    const row = rows[0];
    if (!row) {
      throw AuthErrors.STORE_FAILURE(PostgreSQLLoginEventStore.NAME, 'addEvent returned no row');
    }
    return row.id;
  }

  async removeEvent(tenantId: number, userId: string, eventId: number): Promise<void> {
    await run(
      this.db,
      PostgreSQLLoginEventStore.NAME,
      'DELETE FROM login_events WHERE tenant_id = $1 AND user_id = $2 AND id = $3',
      [tenantId, userId, eventId]
    );
  }

  async removeAllEvents(tenantId: number, userId: string): Promise<void> {
    await run(
      this.db,
      PostgreSQLLoginEventStore.NAME,
      'DELETE FROM login_events WHERE tenant_id = $1 AND user_id = $2',
      [tenantId, userId]
    );
  }
}
