/**
 * Namespace resolution
 *
 * A namespace is the PostgreSQL schema holding one project's tables and
 * its conversation log. Identity is (owner_id, project_name), mapped to
 * "<prefix><owner>_<project>". Every pipeline operation takes a
 * NamespaceId explicitly; there is no default.
 */

import type { SqlClient } from "./db.js"
import { PipelineError } from "./config.js"

declare const namespaceBrand: unique symbol

/** A schema name produced by resolveNamespace() */
export type NamespaceId = string & { readonly [namespaceBrand]: true }

export interface NamespaceOptions {
	prefix: string
	max_length: number
}

const PART_MAX_LENGTH = 50
const NAMESPACE_PATTERN = /^[a-z][a-z0-9_]*$/

/**
 * Sanitize one half of the identity for use in an identifier:
 * trim, spaces to underscores, drop non-word characters, lowercase.
 */
export function sanitizeNamePart(name: string, label: string): string {
	if (!name || !name.trim()) {
		throw new PipelineError("validation", `${label} cannot be empty`)
	}

	const cleaned = name.trim().replace(/ /g, "_").replace(/[^\w]/g, "").toLowerCase()

	if (!/^[a-z]/.test(cleaned)) {
		throw new PipelineError("validation", `${label} must start with a letter`, false, { provided: cleaned })
	}
	if (!NAMESPACE_PATTERN.test(cleaned)) {
		throw new PipelineError("validation", `${label} must contain only letters, numbers, and underscores`)
	}
	if (cleaned.length > PART_MAX_LENGTH) {
		throw new PipelineError("validation", `${label} too long (max ${PART_MAX_LENGTH} characters)`)
	}
	return cleaned
}

export function resolveNamespace(ownerId: string, projectName: string, options: NamespaceOptions): NamespaceId {
	const owner = sanitizeNamePart(ownerId, "owner_id")
	const project = sanitizeNamePart(projectName, "project_name")
	return toNamespaceId(`${options.prefix}${owner}_${project}`, options)
}

/**
 * Accept an already-resolved schema name (scripts, tests).
 */
export function toNamespaceId(name: string, options: NamespaceOptions): NamespaceId {
	if (!isNamespaceId(name) || !name.startsWith(options.prefix)) {
		throw new PipelineError("validation", `Invalid namespace: ${name}`)
	}
	if (name.length > options.max_length) {
		throw new PipelineError(
			"validation",
			`Namespace too long (${name.length} > ${options.max_length}). Use a shorter owner_id or project_name.`,
		)
	}
	return name
}

function isNamespaceId(name: string): name is NamespaceId {
	return NAMESPACE_PATTERN.test(name)
}

/**
 * Quote an identifier for metadata SQL built from catalog names.
 */
export function quoteIdent(name: string): string {
	return `"${name.replace(/"/g, '""')}"`
}

export async function namespaceExists(client: SqlClient, namespace: NamespaceId): Promise<boolean> {
	const result = await client.query("SELECT 1 FROM information_schema.schemata WHERE schema_name = $1", [namespace])
	return result.rows.length > 0
}
