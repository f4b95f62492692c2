import { Pool } from "pg";
import { getDatabaseUrl } from "./env.js";

let pool: Pool | null = null;

export interface PoolStatus {
  totalConnections: number;
  idleConnections: number;
  waitingRequests: number;
}

/**
 * Returns a singleton database pool instance.
 *
 * Every `pool.query` checks out its own client and returns it afterwards, so
 * concurrent workers never share a connection. `max` is sized to the largest
 * worker pool the analyzer accepts.
 */
export function getPool(): Pool {
  if (!pool) {
    const connectionString = getDatabaseUrl();
    const needsSsl = connectionString.includes("sslmode=require");
    pool = new Pool({
      connectionString,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      ...(needsSsl ? { ssl: true } : {}),
    });
  }
  return pool;
}

/**
 * Returns pool connection metrics, or null if the pool has not been created yet.
 */
export function getPoolStatus(): PoolStatus | null {
  if (!pool) return null;
  return {
    totalConnections: pool.totalCount,
    idleConnections: pool.idleCount,
    waitingRequests: pool.waitingCount,
  };
}

/**
 * Closes the database pool. Useful for testing and cleanup.
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
