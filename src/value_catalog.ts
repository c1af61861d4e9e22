/**
 * Value Catalog Builder
 *
 * Enumerates the distinct non-null values of a low-cardinality text column.
 * These values ground generation ("only use listed values") and are the
 * evidence for the zero-result correction retry.
 */

import { z } from "zod"
import { parsePostgresError } from "./config.js"
import type { SqlClient } from "./db.js"
import type { Logger } from "./logger.js"
import { quoteIdent, type NamespaceId } from "./namespace.js"

/** information_schema data_type values treated as enumerable text */
const TEXTUAL_TYPES = new Set(["text", "character varying", "varchar", "character", "char", "citext", "name"])

const valueRowSchema = z.object({ value: z.string() })

const SAVEPOINT = "value_catalog"

export function isTextualType(declaredType: string): boolean {
	return TEXTUAL_TYPES.has(declaredType.trim().toLowerCase())
}

/**
 * Distinct non-null values of one column, deduplicated and sorted by code
 * unit. Returns [] when the column is not textual, has more than `cap`
 * distinct values, or the query fails (statement timeout included).
 *
 * Runs inside the caller's transaction; a savepoint keeps a failed query
 * from aborting it.
 */
export async function buildValueCatalog(
	client: SqlClient,
	namespace: NamespaceId,
	table: string,
	column: string,
	declaredType: string,
	cap: number,
	logger: Logger,
): Promise<string[]> {
	if (!isTextualType(declaredType)) return []

	const col = quoteIdent(column)
	// One extra row tells "exactly cap" apart from "more than cap"
	const sql = `SELECT DISTINCT ${col}::text AS value FROM ${quoteIdent(namespace)}.${quoteIdent(table)} WHERE ${col} IS NOT NULL LIMIT ${cap + 1}`

	let rows: unknown[]
	await client.query(`SAVEPOINT ${SAVEPOINT}`)
	try {
		const result = await client.query(sql)
		rows = result.rows
	} catch (error) {
		logger.warn("Value catalog query failed, column left unconstrained", {
			namespace,
			table,
			column,
			sqlstate: parsePostgresError(error).sqlstate,
		})
		await client.query(`ROLLBACK TO SAVEPOINT ${SAVEPOINT}`)
		return []
	}
	await client.query(`RELEASE SAVEPOINT ${SAVEPOINT}`)

	if (rows.length > cap) {
		logger.debug("High-cardinality column skipped", { namespace, table, column, cap })
		return []
	}

	const values = new Set<string>()
	for (const row of rows) {
		const parsed = valueRowSchema.safeParse(row)
		if (parsed.success) values.add(parsed.data.value)
	}
	return Array.from(values).sort()
}
