/**
 * Schema Descriptor
 *
 * Assembles table/column metadata and value catalogs into the snapshot the
 * generator embeds verbatim. Rendering is a pure function of the
 * descriptor, so unchanged data always renders byte-identical text.
 */

import { throwIfCancelled } from "./config.js"
import { readOnlyTransaction, type ScopedClient, type SqlClient } from "./db.js"
import type { Logger } from "./logger.js"
import type { NamespaceId } from "./namespace.js"
import { SchemaIntrospector } from "./schema_introspector.js"
import type {
	ColumnDescriptor,
	ConstrainedColumn,
	IntrospectedTable,
	SchemaDescriptor,
	SchemaSummary,
	TableDescriptor,
} from "./schema_types.js"
import { buildValueCatalog } from "./value_catalog.js"

export interface SchemaBuildOptions {
	maxUniqueValues: number
	excludedTables: readonly string[]
	/** statement_timeout for each introspection and catalog query */
	timeoutMs: number
	logger: Logger
	signal?: AbortSignal
}

/**
 * Reads the namespace inside one read-only transaction. A failed catalog
 * query (a timeout included) leaves its column unconstrained; any other
 * failure rolls back and propagates.
 */
export async function buildSchemaDescriptor(
	client: ScopedClient,
	namespace: NamespaceId,
	options: SchemaBuildOptions,
): Promise<SchemaDescriptor> {
	const { maxUniqueValues, excludedTables, timeoutMs, logger, signal } = options
	const tables = await readOnlyTransaction(client, { timeoutMs }, async (tx) => {
		const introspected = await new SchemaIntrospector(logger).introspect(tx, namespace, excludedTables)
		return readTables(tx, namespace, introspected, maxUniqueValues, logger, signal)
	})

	logger.info("Schema descriptor built", { namespace, ...summarizeSchema({ namespace, tables }) })
	return { namespace, tables }
}

async function readTables(
	client: SqlClient,
	namespace: NamespaceId,
	introspected: IntrospectedTable[],
	maxUniqueValues: number,
	logger: Logger,
	signal: AbortSignal | undefined,
): Promise<TableDescriptor[]> {
	const tables: TableDescriptor[] = []
	for (const table of introspected) {
		throwIfCancelled(signal, "value catalog")

		const columns: ColumnDescriptor[] = []
		for (const col of table.columns) {
			const values = await buildValueCatalog(
				client,
				namespace,
				table.table_name,
				col.column_name,
				col.data_type,
				maxUniqueValues,
				logger,
			)
			const descriptor: ColumnDescriptor = {
				name: col.column_name,
				declared_type: col.data_type,
				nullable: col.is_nullable,
			}
			if (values.length > 0) descriptor.possible_values = values
			columns.push(descriptor)
		}
		tables.push({ name: table.table_name, columns })
	}
	return tables
}

/** Single-quoted SQL-style literal, ' doubled */
function quoteValue(value: string): string {
	return `'${value.replace(/'/g, "''")}'`
}

export function renderColumn(column: ColumnDescriptor): string {
	let line = `  - ${column.name} (${column.declared_type}, ${column.nullable ? "NULL" : "NOT NULL"})`
	if (column.possible_values && column.possible_values.length > 0) {
		line += ` possible values: [${column.possible_values.map(quoteValue).join(", ")}]`
	}
	return line
}

/**
 * Compact text block: one line per table, one indented line per column.
 */
export function renderSchemaDescriptor(descriptor: SchemaDescriptor): string {
	const lines = [`DATABASE SCHEMA (namespace: ${descriptor.namespace})`]
	for (const table of descriptor.tables) {
		lines.push(`Table: ${descriptor.namespace}.${table.name}`)
		for (const column of table.columns) lines.push(renderColumn(column))
	}
	return lines.join("\n")
}

export function findColumn(descriptor: SchemaDescriptor, table: string, column: string): ColumnDescriptor | undefined {
	return descriptor.tables.find((t) => t.name === table)?.columns.find((c) => c.name === column)
}

/** Columns with a value catalog, in descriptor order */
export function constrainedColumns(descriptor: SchemaDescriptor): ConstrainedColumn[] {
	const result: ConstrainedColumn[] = []
	for (const table of descriptor.tables) {
		for (const column of table.columns) {
			if (column.possible_values && column.possible_values.length > 0) {
				result.push({ table: table.name, column: column.name, possible_values: column.possible_values })
			}
		}
	}
	return result
}

export function summarizeSchema(descriptor: SchemaDescriptor): SchemaSummary {
	return {
		total_tables: descriptor.tables.length,
		total_columns: descriptor.tables.reduce((n, t) => n + t.columns.length, 0),
		constrained_columns: constrainedColumns(descriptor).length,
	}
}
