/**
 * Schema Introspector
 *
 * Reads the tables and columns of one namespace from information_schema.
 * Base tables only; the namespace's own bookkeeping tables are excluded.
 */

import type { SqlClient } from "./db.js"
import type { Logger } from "./logger.js"
import type { NamespaceId } from "./namespace.js"
import { columnRowSchema, tableRowSchema, type ColumnRow, type IntrospectedTable } from "./schema_types.js"

export class SchemaIntrospector {
	constructor(private logger: Logger) {}

	/**
	 * Tables ordered by name, columns by ordinal position
	 *
	 * @param excludeTables Tables to leave out (e.g. chat_history)
	 */
	async introspect(
		client: SqlClient,
		namespace: NamespaceId,
		excludeTables: readonly string[] = [],
	): Promise<IntrospectedTable[]> {
		const startTime = Date.now()

		const tableNames = await this.getTables(client, namespace, excludeTables)
		const columns = await this.getColumns(client, namespace, tableNames)

		const byTable = new Map<string, ColumnRow[]>()
		for (const name of tableNames) byTable.set(name, [])
		for (const col of columns) byTable.get(col.table_name)?.push(col)

		const tables = tableNames.map((name) => ({
			table_name: name,
			columns: (byTable.get(name) ?? []).sort((a, b) => a.ordinal_position - b.ordinal_position),
		}))

		this.logger.debug("Schema introspection complete", {
			namespace,
			tables: tables.length,
			total_columns: columns.length,
			latency_ms: Date.now() - startTime,
		})

		return tables
	}

	private async getTables(
		client: SqlClient,
		namespace: NamespaceId,
		excludeTables: readonly string[],
	): Promise<string[]> {
		const query = `
			SELECT t.table_name
			FROM information_schema.tables t
			WHERE t.table_schema = $1
				AND t.table_type = 'BASE TABLE'
				AND t.table_name != ALL($2)
			ORDER BY t.table_name
		`

		const result = await client.query(query, [namespace, [...excludeTables]])
		// Code-unit order, independent of the server collation
		return result.rows.map((row) => tableRowSchema.parse(row).table_name).sort()
	}

	private async getColumns(client: SqlClient, namespace: NamespaceId, tableNames: string[]): Promise<ColumnRow[]> {
		if (tableNames.length === 0) return []

		const query = `
			SELECT
				c.table_name,
				c.column_name,
				CASE WHEN c.data_type = 'USER-DEFINED' THEN c.udt_name ELSE c.data_type END AS data_type,
				(c.is_nullable = 'YES') AS is_nullable,
				c.ordinal_position
			FROM information_schema.columns c
			WHERE c.table_schema = $1
				AND c.table_name = ANY($2)
			ORDER BY c.table_name, c.ordinal_position
		`

		const result = await client.query(query, [namespace, tableNames])
		return result.rows.map((row) => columnRowSchema.parse(row))
	}
}
