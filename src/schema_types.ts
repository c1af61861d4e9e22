/**
 * Schema Types
 *
 * Defines types for:
 * - Catalog rows read from information_schema
 * - SchemaDescriptor, the per-request snapshot handed to the generator
 * - Schema summary exposed by describe_schema
 */

import { z } from "zod"
import type { NamespaceId } from "./namespace.js"

// ============================================================================
// Catalog rows
// ============================================================================

export const tableRowSchema = z.object({
	table_name: z.string(),
})

export const columnRowSchema = z.object({
	table_name: z.string(),
	column_name: z.string(),
	data_type: z.string(),
	is_nullable: z.boolean(),
	ordinal_position: z.coerce.number().int(),
})

export type ColumnRow = z.infer<typeof columnRowSchema>

export interface IntrospectedTable {
	table_name: string
	columns: ColumnRow[]
}

// ============================================================================
// Descriptor
// ============================================================================

export interface ColumnDescriptor {
	name: string
	declared_type: string
	nullable: boolean
	/** Sorted distinct values; only set for enumerable text columns */
	possible_values?: readonly string[]
}

export interface TableDescriptor {
	name: string
	columns: readonly ColumnDescriptor[]
}

/**
 * Immutable per-request snapshot of one namespace
 */
export interface SchemaDescriptor {
	namespace: NamespaceId
	tables: readonly TableDescriptor[]
}

export interface ConstrainedColumn {
	table: string
	column: string
	possible_values: readonly string[]
}

export interface SchemaSummary {
	total_tables: number
	total_columns: number
	constrained_columns: number
}
