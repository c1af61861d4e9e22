/**
 * Query Executor
 *
 * Runs a validated statement, exactly as given, inside a read-only
 * transaction scoped to the caller's namespace. Refuses to run when any
 * schema the statement names is not the caller's namespace or a table is
 * left unqualified.
 *
 * Outcomes are values: rows, empty (the correction trigger) or
 * execution_error carrying a sanitized message. Driver error text never
 * leaves this module.
 */

import {
	classifyExecutionError,
	parsePostgresError,
	sanitizeExecutionError,
	throwIfCancelled,
	type ExecutionErrorClass,
} from "./config.js"
import { readOnlyTransaction, type ScopedClient } from "./db.js"
import type { Logger } from "./logger.js"
import type { NamespaceId } from "./namespace.js"
import { extractSchemaQualifiers, extractTableReferences } from "./sql_tokenizer.js"

export type ResultRow = Record<string, unknown>

export type ExecutionOutcome =
	| { kind: "rows"; sql: string; rows: ResultRow[]; row_count: number; columns: string[]; latency_ms: number }
	| { kind: "empty"; sql: string; columns: string[]; latency_ms: number }
	| {
			kind: "execution_error"
			sql: string
			/** SQLSTATE, or NAMESPACE_MISMATCH when the executor refused */
			code: string
			error_class: ExecutionErrorClass | "namespace_mismatch"
			message: string
			latency_ms: number
	  }

export interface ExecuteOptions {
	timeoutMs: number
	logger: Logger
	signal?: AbortSignal
}

/**
 * Why the statement may not run in this namespace, or null when it may.
 */
export function checkNamespaceScope(sql: string, namespace: NamespaceId): string | null {
	const unqualified = extractTableReferences(sql).filter((ref) => ref.schema === null)
	if (unqualified.length > 0) {
		return `unqualified table reference: ${unqualified.map((r) => r.table).join(", ")}`
	}
	const foreign = extractSchemaQualifiers(sql).filter((schema) => schema !== namespace)
	if (foreign.length > 0) {
		return `references schema ${foreign.join(", ")}`
	}
	return null
}

export async function executeQuery(
	client: ScopedClient,
	namespace: NamespaceId,
	sql: string,
	options: ExecuteOptions,
): Promise<ExecutionOutcome> {
	const { timeoutMs, logger, signal } = options
	const startTime = Date.now()

	const mismatch = checkNamespaceScope(sql, namespace)
	if (mismatch) {
		logger.error("Executor refused statement outside namespace", { namespace, reason: mismatch })
		return {
			kind: "execution_error",
			sql,
			code: "NAMESPACE_MISMATCH",
			error_class: "namespace_mismatch",
			message: "The query was not run because it reached outside this project's data.",
			latency_ms: 0,
		}
	}

	throwIfCancelled(signal, "execution")

	try {
		const result = await readOnlyTransaction(client, { timeoutMs, searchPath: namespace }, (tx) => tx.query(sql))

		const latency = Date.now() - startTime
		const columns = result.fields.map((f) => f.name)
		const rows: ResultRow[] = result.rows

		logger.debug("Query executed", { namespace, rows: rows.length, latency_ms: latency })

		if (rows.length === 0) {
			return { kind: "empty", sql, columns, latency_ms: latency }
		}
		return { kind: "rows", sql, rows, row_count: rows.length, columns, latency_ms: latency }
	} catch (error) {
		const { sqlstate } = parsePostgresError(error)
		const errorClass = classifyExecutionError(sqlstate)
		logger.warn("Query execution failed", { namespace, sqlstate, error_class: errorClass })

		return {
			kind: "execution_error",
			sql,
			code: sqlstate,
			error_class: errorClass,
			message: sanitizeExecutionError(sqlstate),
			latency_ms: Date.now() - startTime,
		}
	}
}
