/**
 * Narrow database handles.
 *
 * Pipeline components take these interfaces rather than pg classes so a
 * pg Pool/PoolClient can be passed in production and a scripted fake in
 * tests. Every acquisition goes through withClient().
 */

import pg from "pg"
import type { Pool, PoolConfig, QueryResult, QueryResultRow } from "pg"
import type { ScopedSQLConfig } from "./config/loadConfig.js"
import { redactConnectionString } from "./logger.js"
import { quoteIdent, type NamespaceId } from "./namespace.js"

export interface SqlClient {
	query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>>
}

export interface PooledSqlClient extends SqlClient {
	/** Passing an error (or true) tells the pool to discard the connection */
	release(err?: Error | boolean): void
}

export interface SqlPool {
	connect(): Promise<PooledSqlClient>
}

/**
 * Client handed out by withClient(). discard() marks the connection as
 * unusable (e.g. a failed ROLLBACK) so it is destroyed on release.
 */
export interface ScopedClient extends SqlClient {
	discard(err: Error): void
}

/**
 * Scoped acquisition: the client is released on every exit path, including
 * errors and cancellation.
 */
export async function withClient<T>(pool: SqlPool, fn: (client: ScopedClient) => Promise<T>): Promise<T> {
	const client = await pool.connect()
	let broken: Error | undefined
	try {
		return await fn({
			query: (text, values) => client.query(text, values),
			discard: (err) => {
				broken = err
			},
		})
	} finally {
		client.release(broken)
	}
}

export interface ReadOnlyOptions {
	/** statement_timeout for every statement in the transaction */
	timeoutMs: number
	/** Sole schema on the search_path, when set */
	searchPath?: NamespaceId
}

/**
 * Run `fn` inside BEGIN READ ONLY with a local statement_timeout. Rolls back
 * and rethrows on error; a failed ROLLBACK discards the connection.
 */
export async function readOnlyTransaction<T>(
	client: ScopedClient,
	options: ReadOnlyOptions,
	fn: (client: SqlClient) => Promise<T>,
): Promise<T> {
	try {
		await client.query("BEGIN READ ONLY")
		await client.query(`SET LOCAL statement_timeout = ${Math.max(1, Math.floor(options.timeoutMs))}`)
		if (options.searchPath) await client.query(`SET LOCAL search_path TO ${quoteIdent(options.searchPath)}`)
		const result = await fn(client)
		await client.query("COMMIT")
		return result
	} catch (error) {
		try {
			await client.query("ROLLBACK")
		} catch (rollbackError) {
			client.discard(rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError)))
		}
		throw error
	}
}

/** connect() gives up after connect_timeout_ms instead of waiting on an exhausted pool */
export function poolConfig(config: ScopedSQLConfig): PoolConfig {
	const db = config.database
	const base = { max: db.pool_max, connectionTimeoutMillis: db.connect_timeout_ms, application_name: "scopedsql" }
	return db.url
		? { ...base, connectionString: db.url }
		: { ...base, host: db.host, port: db.port, database: db.name, user: db.user, password: db.password }
}

export function createPool(config: ScopedSQLConfig): Pool {
	return new pg.Pool(poolConfig(config))
}

/** Connection target for log lines, password hidden */
export function describeDatabase(config: ScopedSQLConfig): string {
	const db = config.database
	return db.url ? redactConnectionString(db.url) : `${db.user}@${db.host}:${db.port}/${db.name}`
}
