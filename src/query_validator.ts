/**
 * Query Validator
 *
 * Static gate in front of the executor. Accepts exactly one read-only
 * SELECT statement scoped to the caller's namespace and returns it
 * normalized; anything else is rejected with the rule that fired.
 * No execution, no side effects.
 *
 * Keyword and boundary checks run over the token stream, so text inside
 * string literals, quoted identifiers and comments is never matched.
 */

import type { NamespaceId } from "./namespace.js"
import {
	TokenType,
	extractSchemaQualifiers,
	extractTableReferences,
	isPunct,
	significantTokens,
	tokenizeSQL,
	type Token,
} from "./sql_tokenizer.js"

export type ValidationRule =
	| "EMPTY_QUERY"
	| "MULTIPLE_STATEMENTS"
	| "NO_SELECT"
	| "DANGEROUS_KEYWORD"
	| "FOREIGN_NAMESPACE"
	| "DANGEROUS_FUNCTION"

export type ValidationResult =
	| { valid: true; sql: string }
	| { valid: false; rule: ValidationRule; message: string; sql: string }

/**
 * Mutating and DDL keywords that must never appear outside literals
 */
export const DANGEROUS_KEYWORDS = [
	"INSERT",
	"UPDATE",
	"DELETE",
	"DROP",
	"ALTER",
	"TRUNCATE",
	"CREATE",
	"GRANT",
	"REVOKE",
	"EXECUTE",
	"CALL",
]

/**
 * Functions that reach outside the query: file I/O, sleeping, backend
 * control, external connections
 */
export const DANGEROUS_FUNCTIONS = [
	// File I/O
	"pg_read_file",
	"pg_read_binary_file",
	"pg_ls_dir",
	"pg_stat_file",
	"lo_export",
	"lo_import",
	// System functions
	"pg_sleep",
	"pg_sleep_for",
	"pg_sleep_until",
	"pg_terminate_backend",
	"pg_cancel_backend",
	"set_config",
	// External connections
	"dblink",
	"dblink_connect",
	"dblink_exec",
	// Admin functions
	"pg_reload_conf",
	"pg_rotate_logfile",
	"pg_stat_reset",
]

function reject(rule: ValidationRule, message: string, sql: string): ValidationResult {
	return { valid: false, rule, message, sql }
}

/**
 * Semicolons that are followed by more code (a trailing one is allowed)
 */
function hasMultipleStatements(tokens: Token[]): boolean {
	return tokens.some((t, i) => isPunct(t, ";") && i < tokens.length - 1)
}

function findDangerousKeywords(tokens: Token[]): string[] {
	const found = new Set<string>()
	for (const t of tokens) {
		if (t.type !== TokenType.WORD) continue
		const upper = t.value.toUpperCase()
		if (DANGEROUS_KEYWORDS.includes(upper)) found.add(upper)
	}
	return Array.from(found)
}

function findDangerousFunctions(tokens: Token[]): string[] {
	const found = new Set<string>()
	tokens.forEach((t, i) => {
		if (t.type !== TokenType.WORD) return
		const lower = t.value.toLowerCase()
		if (DANGEROUS_FUNCTIONS.includes(lower) && isPunct(tokens[i + 1], "(")) found.add(lower)
	})
	return Array.from(found)
}

/**
 * Trim, drop a trailing semicolon and qualify every unqualified FROM/JOIN
 * table with the namespace.
 */
export function normalizeQuery(sql: string, namespace: NamespaceId): string {
	const tokens = significantTokens(tokenizeSQL(sql))
	let last = tokens[tokens.length - 1]
	if (last && isPunct(last, ";")) last = tokens[tokens.length - 2]
	const end = last ? last.end : 0

	const unqualified = extractTableReferences(sql).filter((ref) => ref.schema === null && ref.start < end)

	let out = ""
	let cursor = 0
	for (const ref of unqualified) {
		out += sql.substring(cursor, ref.start) + namespace + "."
		cursor = ref.start
	}
	out += sql.substring(cursor, end)
	return out.trim()
}

/**
 * Validate a generated statement for the caller's namespace. Rules are
 * checked in order and the first one that fires is reported.
 */
export function validateQuery(sql: string, namespace: NamespaceId): ValidationResult {
	const trimmed = sql.trim()
	const tokens = significantTokens(tokenizeSQL(trimmed))

	if (tokens.length === 0) {
		return reject("EMPTY_QUERY", "Query is empty", trimmed)
	}

	if (hasMultipleStatements(tokens)) {
		return reject("MULTIPLE_STATEMENTS", "Multiple statements detected (separated by semicolons)", trimmed)
	}

	const first = tokens[0]
	if (first.type !== TokenType.WORD || first.value.toUpperCase() !== "SELECT") {
		return reject("NO_SELECT", "Query must start with SELECT", trimmed)
	}

	const keywords = findDangerousKeywords(tokens)
	if (keywords.length > 0) {
		return reject("DANGEROUS_KEYWORD", `Dangerous keywords detected: ${keywords.join(", ")}`, trimmed)
	}

	const foreign = extractSchemaQualifiers(trimmed).filter((schema) => schema !== namespace)
	if (foreign.length > 0) {
		return reject(
			"FOREIGN_NAMESPACE",
			`Query references a namespace other than ${namespace}: ${foreign.join(", ")}`,
			trimmed,
		)
	}

	const functions = findDangerousFunctions(tokens)
	if (functions.length > 0) {
		return reject("DANGEROUS_FUNCTION", `Dangerous functions detected: ${functions.join(", ")}`, trimmed)
	}

	return { valid: true, sql: normalizeQuery(trimmed, namespace) }
}
