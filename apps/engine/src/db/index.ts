/**
 * Connection management for Postgres and Redis.
 */
import fs from 'fs';
import path from 'path';
import Redis from 'ioredis';
import { Pool } from 'pg';

const SCHEMA_PATH = path.join(__dirname, 'schema.sql');

/**
 * Postgres connection pool:
 * - max: 20 connections
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(connectionString: string | undefined): Pool {
    return new Pool({
        connectionString,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });
}

export function createRedis(url: string): Redis {
    return new Redis(url, { maxRetriesPerRequest: 3 });
}

/** Creates the tables when missing; safe to run on every start. */
export async function applySchema(pool: Pool, workItemsTable: string): Promise<void> {
    const sql = fs.readFileSync(SCHEMA_PATH, 'utf-8').replace(/\$\{work_items\}/g, workItemsTable);
    await pool.query(sql);
}
