/**
 * Correction hint
 *
 * Built after a zero-row result: the constrained columns the failed SQL
 * referenced, with their enumerated values and the literals it compared
 * them against that are not among those values. Matching is exact.
 */

import { constrainedColumns } from "./schema_descriptor.js"
import type { SchemaDescriptor } from "./schema_types.js"
import {
	TokenType,
	extractTableReferences,
	identifierName,
	isIdentifier,
	isPunct,
	isWord,
	significantTokens,
	stringLiteralValue,
	tokenizeSQL,
	type Token,
} from "./sql_tokenizer.js"

export interface HintColumn {
	table: string
	column: string
	possible_values: readonly string[]
	rejected_literals: string[]
}

export interface CorrectionHint {
	failed_sql: string
	columns: HintColumn[]
}

export interface LiteralComparison {
	/** Table name or alias the column was qualified with, if any */
	qualifier: string | null
	column: string
	operator: string
	literal: string
}

const COMPARISON_OPERATORS = new Set(["=", "<>", "!="])

function isStringLiteral(token: Token | undefined): token is Token {
	return token !== undefined && (token.type === TokenType.STRING || token.type === TokenType.DOLLAR_STRING)
}

/** Column reference ending at index `i`: name or qualifier.name */
function columnEndingAt(tokens: Token[], i: number): { qualifier: string | null; column: string } | null {
	const last = tokens[i]
	if (!isIdentifier(last)) return null
	const qualifierToken = tokens[i - 2]
	if (isPunct(tokens[i - 1], ".") && isIdentifier(qualifierToken)) {
		return { qualifier: identifierName(qualifierToken), column: identifierName(last) }
	}
	return { qualifier: null, column: identifierName(last) }
}

/**
 * Operator before a literal at index `i`; returns the operator text and the
 * index of the token preceding it.
 */
function operatorBefore(tokens: Token[], i: number): { operator: string; before: number } | null {
	const prev = tokens[i - 1]
	if (!prev) return null
	if (prev.type === TokenType.OPERATOR && COMPARISON_OPERATORS.has(prev.value)) {
		return { operator: prev.value, before: i - 2 }
	}
	if (isWord(prev, "like") || isWord(prev, "ilike")) {
		const negated = isWord(tokens[i - 2], "not")
		return {
			operator: (negated ? "NOT " : "") + prev.value.toUpperCase(),
			before: negated ? i - 3 : i - 2,
		}
	}
	return null
}

/**
 * Walk back over "IN ( 'a', 'b'," to find the column of an IN list
 * containing the literal at index `i`.
 */
function inListColumn(tokens: Token[], i: number): { operator: string; before: number } | null {
	let j = i - 1
	while (isPunct(tokens[j], ",") && isStringLiteral(tokens[j - 1])) j -= 2
	if (!isPunct(tokens[j], "(") || !isWord(tokens[j - 1], "in")) return null
	const negated = isWord(tokens[j - 2], "not")
	return { operator: negated ? "NOT IN" : "IN", before: negated ? j - 3 : j - 2 }
}

/**
 * (column, literal) pairs for =, <>, !=, LIKE, ILIKE and IN (...)
 * comparisons against string literals.
 */
export function extractLiteralComparisons(sql: string): LiteralComparison[] {
	const tokens = significantTokens(tokenizeSQL(sql))
	const comparisons: LiteralComparison[] = []

	tokens.forEach((token, i) => {
		if (!isStringLiteral(token)) return
		const op = operatorBefore(tokens, i) ?? inListColumn(tokens, i)
		if (!op) return
		const ref = columnEndingAt(tokens, op.before)
		if (!ref) return
		comparisons.push({ ...ref, operator: op.operator, literal: stringLiteralValue(token) })
	})

	return comparisons
}

/** Identifier names used anywhere outside literals and comments */
function referencedIdentifiers(sql: string): Set<string> {
	const names = new Set<string>()
	for (const token of significantTokens(tokenizeSQL(sql))) {
		if (isIdentifier(token)) names.add(identifierName(token))
	}
	return names
}

/**
 * Constrained columns referenced by the failed SQL, columns with an
 * unmatched literal first, then in descriptor order.
 */
export function buildCorrectionHint(failedSql: string, descriptor: SchemaDescriptor): CorrectionHint {
	const identifiers = referencedIdentifiers(failedSql)
	const tables = new Set(extractTableReferences(failedSql).map((ref) => ref.table))
	const comparisons = extractLiteralComparisons(failedSql)

	const columns: HintColumn[] = []
	for (const candidate of constrainedColumns(descriptor)) {
		if (!identifiers.has(candidate.column)) continue
		// Only columns of tables the query reads (when it names any)
		if (tables.size > 0 && !tables.has(candidate.table)) continue

		const rejected: string[] = []
		for (const cmp of comparisons) {
			if (cmp.column !== candidate.column) continue
			if (cmp.qualifier !== null && tables.has(cmp.qualifier) && cmp.qualifier !== candidate.table) continue
			if (!candidate.possible_values.includes(cmp.literal) && !rejected.includes(cmp.literal)) {
				rejected.push(cmp.literal)
			}
		}

		columns.push({ ...candidate, rejected_literals: rejected })
	}

	const ranked = [
		...columns.filter((c) => c.rejected_literals.length > 0),
		...columns.filter((c) => c.rejected_literals.length === 0),
	]
	return { failed_sql: failedSql, columns: ranked }
}
