/**
 * Query Generator
 *
 * Frames the generation request (schema, recent turns, optional correction
 * hint), calls the completion service and extracts exactly one SQL
 * statement from the reply. Anything it cannot extract fails closed with
 * PipelineError("generation"); there is no best-effort salvage.
 */

import { PipelineError } from "./config.js"
import type { CompletionClient } from "./completion_client.js"
import { formatHistoryForPrompt, type ConversationTurn } from "./conversation_context.js"
import type { CorrectionHint } from "./correction_hint.js"
import type { Logger } from "./logger.js"
import { renderSchemaDescriptor } from "./schema_descriptor.js"
import type { SchemaDescriptor } from "./schema_types.js"
import { isPunct, significantTokens, tokenizeSQL } from "./sql_tokenizer.js"

export interface GeneratedQuery {
	sql_text: string
	source_question: string
	attempt_number: 1 | 2
}

export interface GenerationPrompt {
	system: string
	user: string
}

export interface GeneratorOptions {
	temperature: number
	max_tokens: number
}

function quoteValue(value: string): string {
	return `'${value.replace(/'/g, "''")}'`
}

export function buildSystemPrompt(namespace: string): string {
	return [
		"You are a PostgreSQL expert. Generate exactly one read-only SELECT statement that answers the user's question.",
		"Rules:",
		"1. Return ONLY the SQL statement, no explanations or markdown",
		"2. Produce exactly one statement and start it with SELECT",
		"3. NO INSERT, UPDATE, DELETE, DROP, ALTER, CREATE, TRUNCATE, GRANT, REVOKE, EXECUTE or CALL",
		`4. Qualify every table with the namespace ${namespace} (e.g. ${namespace}.table_name) and never reference another schema`,
		"5. Use the schema exactly as enumerated: no tables or columns that are not listed",
		"6. When filtering a column that lists possible values, use ONLY those values, spelled exactly as listed",
	].join("\n")
}

export function renderCorrectionHint(hint: CorrectionHint): string {
	const lines = [
		"CORRECTION: The previous SQL query returned zero rows.",
		"Failed SQL:",
		hint.failed_sql,
	]
	if (hint.columns.length > 0) {
		lines.push("Its filter values probably do not match the data. Possible values for the columns it referenced:")
		for (const col of hint.columns) {
			let line = `- ${col.table}.${col.column}: [${col.possible_values.map(quoteValue).join(", ")}]`
			if (col.rejected_literals.length > 0) {
				line += ` (not found: ${col.rejected_literals.map(quoteValue).join(", ")})`
			}
			lines.push(line)
		}
		lines.push("Rewrite the query using only these values.")
	} else {
		lines.push("Rewrite the query so that it matches the data described in the schema.")
	}
	return lines.join("\n")
}

export function buildGenerationPrompt(
	question: string,
	descriptor: SchemaDescriptor,
	turns: readonly ConversationTurn[],
	hint?: CorrectionHint,
): GenerationPrompt {
	const parts = [formatHistoryForPrompt(turns), "", renderSchemaDescriptor(descriptor), "", `USER QUESTION: ${question}`, ""]
	if (hint) parts.push(renderCorrectionHint(hint), "")
	parts.push("Generate a SQL query to answer this question.")

	return { system: buildSystemPrompt(descriptor.namespace), user: parts.join("\n") }
}

// A language tag counts only when a newline follows it
const FENCE = /```(?:[A-Za-z0-9_+-]*[ \t]*\n)?([\s\S]*?)```/g

/** Statement separators followed by more code; a trailing one is allowed */
function extraStatements(sql: string): number {
	const tokens = significantTokens(tokenizeSQL(sql))
	return tokens.filter((t, i) => isPunct(t, ";") && i < tokens.length - 1).length
}

/**
 * Pull the SQL statement out of a completion. Accepts bare SQL starting with
 * SELECT or WITH, or exactly one fenced code block, holding one statement.
 */
export function extractSqlStatement(text: string): string {
	const trimmed = text.trim()
	if (!trimmed) {
		throw new PipelineError("generation", "Completion service returned no SQL")
	}

	const fences = Array.from(trimmed.matchAll(FENCE))
	if (fences.length > 1) {
		throw new PipelineError("generation", "Completion contained more than one code block", false, {
			blocks: fences.length,
		})
	}

	let sql: string
	if (fences.length === 1) {
		sql = fences[0][1].trim()
		if (!sql) throw new PipelineError("generation", "Completion contained an empty code block")
	} else {
		if (trimmed.includes("```")) {
			throw new PipelineError("generation", "Completion contained an unterminated code block")
		}
		if (!/^(select|with)\b/i.test(trimmed)) {
			throw new PipelineError("generation", "Completion was not a SQL statement", false, {
				preview: trimmed.slice(0, 80),
			})
		}
		sql = trimmed
	}

	const extra = extraStatements(sql)
	if (extra > 0) {
		throw new PipelineError("generation", "Completion contained more than one SQL statement", false, {
			statements: extra + 1,
		})
	}
	return sql
}

export class QueryGenerator {
	constructor(
		private client: CompletionClient,
		private options: GeneratorOptions,
		private logger: Logger,
	) {}

	async generate(
		question: string,
		descriptor: SchemaDescriptor,
		turns: readonly ConversationTurn[],
		hint?: CorrectionHint,
		signal?: AbortSignal,
	): Promise<GeneratedQuery> {
		const prompt = buildGenerationPrompt(question, descriptor, turns, hint)
		const attempt: 1 | 2 = hint ? 2 : 1

		const reply = await this.client.complete(
			{
				system: prompt.system,
				user: prompt.user,
				temperature: this.options.temperature,
				max_tokens: this.options.max_tokens,
			},
			signal,
		)
		const sql = extractSqlStatement(reply)

		this.logger.debug("SQL generated", {
			namespace: descriptor.namespace,
			attempt,
			sql: sql.slice(0, 200),
		})
		return { sql_text: sql, source_question: question, attempt_number: attempt }
	}
}
