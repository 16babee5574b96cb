// =============================================================================
// Calmpoint — PostgreSQL client (postgres.js)
// =============================================================================

import postgres from 'postgres';

export interface SqlOptions {
  /** Pool size. Defaults to DB_POOL_MAX or 10. */
  max?: number;
}

/**
 * Create a postgres.js connection pool.
 *
 * Connections are opened lazily on the first query, so creating the pool
 * never blocks startup.
 *
 * Usage:
 *   const sql = createSql(config.databaseUrl);
 *   const rows = await sql`SELECT * FROM daily_mood_logs WHERE user_id = ${id}`;
 */
export function createSql(databaseUrl: string, options: SqlOptions = {}) {
  return postgres(databaseUrl, {
    max: options.max ?? Number(process.env['DB_POOL_MAX'] ?? 10),
    idle_timeout: 30,
    connect_timeout: 10,
    // Prepared statements are disabled for PgBouncer transaction mode compatibility
    prepare: false,
    // Parse PostgreSQL dates as plain YYYY-MM-DD strings to avoid timezone shifts
    types: {
      date: {
        to: 1082,
        from: [1082],
        serialize: (x: string) => x,
        parse: (x: string) => x,
      },
    },
    onnotice: () => {
      // Suppress NOTICE messages
    },
  });
}

export type Sql = ReturnType<typeof createSql>;

/**
 * Gracefully close all pool connections. Call during process shutdown.
 */
export async function closeDb(sql: Sql): Promise<void> {
  await sql.end({ timeout: 5 });
}
