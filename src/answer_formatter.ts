/**
 * Answer Formatter
 *
 * Turns a question's final outcome into the text the user sees. Rows are
 * summarized by the completion service with identifier-like columns left
 * out; every failure kind maps to a fixed plain-language message. Raw
 * driver errors and SQL never appear in the answer.
 */

import { PipelineError } from "./config.js"
import type { CompletionClient } from "./completion_client.js"
import type { FinalOutcome, QuestionOutcome } from "./correction_controller.js"
import type { Logger } from "./logger.js"
import type { ResultRow } from "./query_executor.js"

export interface AnswerOptions {
	max_rows_in_prompt: number
	large_result_threshold: number
	max_value_length: number
	temperature: number
	max_tokens: number
}

export const CORRECTION_NOTE =
	"(Note: the first query returned no results, so it was corrected using the values that exist in your data.)"

const ANSWER_SYSTEM_PROMPT = [
	"You are a helpful assistant that explains database query results.",
	"Provide concise, natural language answers based on the data.",
	"IMPORTANT:",
	"- Do NOT include SQL in your response.",
	"- Provide clear, informative summaries of the data.",
	"- List specific details for the top items found as a bulleted list.",
	"- When the result set is large, state the total count and describe representative values instead of listing everything.",
].join("\n")

const SURROGATE_NAMES = new Set(["id", "uuid", "guid", "pk"])

/**
 * Column names that look like surrogate keys or vectors rather than
 * something a person asked about.
 */
export function isIdentifierColumn(name: string): boolean {
	const lower = name.toLowerCase()
	if (SURROGATE_NAMES.has(lower)) return true
	if (/_(id|uuid|key|pk)$/.test(lower)) return true
	if (/[a-z0-9]Id$/.test(name)) return true
	return lower.includes("embedding")
}

/**
 * Columns shown to the user. When every column looks like an identifier
 * they were asked for explicitly, so all are kept.
 */
export function visibleColumns(columns: readonly string[]): string[] {
	const visible = columns.filter((c) => !isIdentifierColumn(c))
	return visible.length > 0 ? visible : [...columns]
}

export function formatValue(value: unknown, maxLength: number): string {
	let text: string
	if (value === null || value === undefined) text = "NULL"
	else if (value instanceof Date) text = value.toISOString()
	else if (typeof value === "object") text = JSON.stringify(value)
	else text = String(value)
	return text.length > maxLength ? text.slice(0, maxLength) + "…" : text
}

function renderRow(row: ResultRow, columns: readonly string[], maxLength: number): string {
	return columns.map((c) => `${c}: ${formatValue(row[c], maxLength)}`).join(", ")
}

export function buildAnswerPrompt(
	question: string,
	rows: readonly ResultRow[],
	columns: readonly string[],
	options: AnswerOptions,
): string {
	const shown = rows.slice(0, options.max_rows_in_prompt)
	const parts = [
		`User asked: ${question}`,
		"",
		"Query Results:",
		`Columns: ${columns.join(", ")}`,
		`Number of rows: ${rows.length}`,
		"",
	]
	shown.forEach((row, i) => parts.push(`Row ${i + 1}: ${renderRow(row, columns, options.max_value_length)}`))
	if (rows.length > shown.length) {
		parts.push(`... and ${rows.length - shown.length} more rows`)
	}
	parts.push("")
	if (rows.length > options.large_result_threshold) {
		parts.push(`The result set is large (${rows.length} rows): give the total and representative values, not every row.`)
	}
	parts.push("Provide a clear, concise answer to the user's question based on these results.")
	return parts.join("\n")
}

/**
 * Row summary used when the completion service cannot be reached
 */
export function fallbackSummary(rows: readonly ResultRow[], columns: readonly string[], options: AnswerOptions): string {
	const shown = rows.slice(0, options.max_rows_in_prompt)
	const lines = [`Found ${rows.length} ${rows.length === 1 ? "row" : "rows"}.`]
	shown.forEach((row, i) => lines.push(`${i + 1}. ${renderRow(row, columns, options.max_value_length)}`))
	if (rows.length > shown.length) {
		lines.push(`(and ${rows.length - shown.length} more rows)`)
	}
	return lines.join("\n")
}

/**
 * Fixed texts for outcomes without rows
 */
export function failureMessage(final: Exclude<FinalOutcome, { kind: "rows" }>, correctionUsed: boolean): string {
	switch (final.kind) {
		case "empty":
			return correctionUsed
				? "I couldn't find any data matching your question, even after retrying with the values that exist in your data. Try rephrasing the question or using different filters."
				: "I couldn't find any data matching your question. Try rephrasing the question or using different filters."
		case "execution_error":
			return `I wasn't able to answer that because the query failed. ${final.message} Please try rephrasing your question.`
		case "validation_rejected":
			return "I can only answer questions by reading your data, and the query produced for this question was not a safe read-only query. Please try rephrasing your question."
		case "generation_unavailable":
			return final.error_type === "timeout"
				? "The language service took too long to respond. Please try again in a moment."
				: "I couldn't turn your question into a query right now. Please try again in a moment."
	}
}

export class AnswerFormatter {
	constructor(
		private client: CompletionClient,
		private options: AnswerOptions,
		private logger: Logger,
	) {}

	async format(outcome: QuestionOutcome, signal?: AbortSignal): Promise<string> {
		const { final, correction_used: correctionUsed } = outcome
		if (final.kind !== "rows") return failureMessage(final, correctionUsed)

		const columns = visibleColumns(final.columns)
		let answer: string
		try {
			const reply = await this.client.complete(
				{
					system: ANSWER_SYSTEM_PROMPT,
					user: buildAnswerPrompt(outcome.question, final.rows, columns, this.options),
					temperature: this.options.temperature,
					max_tokens: this.options.max_tokens,
				},
				signal,
			)
			answer = reply.trim() || fallbackSummary(final.rows, columns, this.options)
		} catch (error) {
			if (error instanceof PipelineError && (error.type === "generation" || error.type === "timeout")) {
				this.logger.warn("Answer generation failed, using row summary", { type: error.type })
				answer = fallbackSummary(final.rows, columns, this.options)
			} else {
				throw error
			}
		}

		return correctionUsed ? `${answer}\n\n${CORRECTION_NOTE}` : answer
	}
}
