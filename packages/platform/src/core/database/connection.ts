/**
 * Database Connection
 *
 * Establishes and manages the PostgreSQL connection via postgres.js.
 * Only the audit trail is persisted; workflow instances live in the
 * engine's instance store.
 */

import postgres from "postgres";

/** The raw postgres.js client instance */
let sqlClient: ReturnType<typeof postgres> | null = null;

/**
 * Initializes the database connection.
 * Call once at application startup, only when DATABASE_URL is configured.
 */
export function initDatabase(url: string) {
  sqlClient = postgres(url);
  return { sql: sqlClient };
}

/**
 * Returns the active connection.
 * Throws if initDatabase() hasn't been called.
 */
export function getDatabase() {
  if (!sqlClient) {
    throw new Error(
      "Database not initialized. Call initDatabase() at startup."
    );
  }
  return { sql: sqlClient };
}

/** Whether initDatabase() has been called */
export function isDatabaseInitialized(): boolean {
  return sqlClient !== null;
}

/**
 * Closes the database connection gracefully.
 * Call on application shutdown.
 */
export async function closeDatabase() {
  if (sqlClient) {
    await sqlClient.end();
    sqlClient = null;
  }
}
