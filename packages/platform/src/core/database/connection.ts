/**
 * Database Connection
 *
 * Establishes and manages the PostgreSQL connection via Drizzle ORM.
 * Provides the raw postgres.js client for migrations and the typed
 * Drizzle instance the PostgresDataStore queries through.
 */

import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import { schema } from "./schema.js";

export type Database = PostgresJsDatabase<typeof schema>;

export type SqlClient = ReturnType<typeof postgres>;

/** The raw postgres.js client instance */
let sqlClient: SqlClient | null = null;

/** The Drizzle ORM instance */
let drizzleInstance: Database | null = null;

/**
 * Initializes the database connection.
 * Call once at application startup.
 */
export function initDatabase(url: string) {
  sqlClient = postgres(url, { onnotice: () => {} });
  drizzleInstance = drizzle(sqlClient, { schema });

  return { sql: sqlClient, db: drizzleInstance };
}

/**
 * Returns the active connection.
 * Throws if initDatabase() hasn't been called.
 */
export function getDatabase() {
  if (!drizzleInstance || !sqlClient) {
    throw new Error(
      "Database not initialized. Call initDatabase() at startup."
    );
  }
  return { sql: sqlClient, db: drizzleInstance };
}

/**
 * Closes the database connection gracefully.
 * Call on application shutdown.
 */
export async function closeDatabase() {
  if (sqlClient) {
    await sqlClient.end();
    sqlClient = null;
    drizzleInstance = null;
  }
}
