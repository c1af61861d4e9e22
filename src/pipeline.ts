/**
 * Question pipeline
 *
 * Main orchestration layer:
 * 1. Splits the input into questions
 * 2. Builds the schema descriptor once for the batch
 * 3. Per question, sequentially: recent context → generation, validation,
 *    execution with one correction retry → answer → append exchange
 *
 * A failing question never aborts its siblings. Cancellation stops the
 * batch before the next stage and leaves no partial exchange behind.
 * Later questions see the exchanges appended by earlier ones.
 */

import { v4 as uuidv4 } from "uuid"
import { DEFAULTS, PipelineError, isCancellation, throwIfCancelled, type AuditLogEntry } from "./config.js"
import type { ScopedSQLConfig } from "./config/loadConfig.js"
import { ConversationContext, type ConversationStore } from "./conversation_context.js"
import { answerWithCorrection, type FinalOutcome, type QuestionOutcome, type SqlGenerator } from "./correction_controller.js"
import { withClient, type SqlPool } from "./db.js"
import type { Logger } from "./logger.js"
import type { NamespaceId } from "./namespace.js"
import { executeQuery } from "./query_executor.js"
import { splitQuestions } from "./question_splitter.js"
import { buildSchemaDescriptor, renderSchemaDescriptor, summarizeSchema } from "./schema_descriptor.js"
import type { SchemaDescriptor, SchemaSummary } from "./schema_types.js"

export interface AnswerProducer {
	format(outcome: QuestionOutcome, signal?: AbortSignal): Promise<string>
}

export interface PipelineContext {
	pool: SqlPool
	store: ConversationStore
	generator: SqlGenerator
	formatter: AnswerProducer
	config: ScopedSQLConfig
	logger: Logger
	signal?: AbortSignal
}

export interface AskInput {
	namespace: NamespaceId
	text: string
	session_id?: string
	show_sql?: boolean
}

export type AnswerOutcomeKind = FinalOutcome["kind"] | "failed"

export interface QuestionAnswer {
	question: string
	answer: string
	outcome: AnswerOutcomeKind
	/** Only when SQL display was requested */
	sql?: string
	correction_used: boolean
	attempts: number
	row_count: number
}

export interface BatchResponse {
	query_id: string
	namespace: NamespaceId
	session_id: string
	answers: QuestionAnswer[]
	cancelled: boolean
}

export const FAILED_ANSWER = "Something went wrong while answering this question. Please try again."

function finalSql(final: FinalOutcome): string | undefined {
	return "sql" in final ? final.sql : undefined
}

function logAudit(entry: AuditLogEntry, logger: Logger): void {
	logger.info("AUDIT_LOG", { ...entry, timestamp: entry.timestamp.toISOString() })
}

async function loadDescriptor(namespace: NamespaceId, ctx: PipelineContext): Promise<SchemaDescriptor> {
	try {
		return await withClient(ctx.pool, (client) =>
			buildSchemaDescriptor(client, namespace, {
				maxUniqueValues: ctx.config.schema.max_unique_values,
				excludedTables: ctx.config.schema.excluded_tables,
				timeoutMs: ctx.config.schema.query_timeout_ms,
				logger: ctx.logger,
				signal: ctx.signal,
			}),
		)
	} catch (error) {
		if (error instanceof PipelineError) throw error
		ctx.logger.error("Schema descriptor build failed", { namespace })
		throw new PipelineError("execution", "Could not read the project's tables", true, { namespace })
	}
}

async function answerOne(
	queryId: string,
	question: string,
	input: AskInput,
	descriptor: SchemaDescriptor,
	context: ConversationContext,
	ctx: PipelineContext,
): Promise<QuestionAnswer> {
	const startTime = Date.now()
	const { namespace } = input
	const showSql = input.show_sql ?? ctx.config.answer.show_sql

	const turns = await context.recent()
	throwIfCancelled(ctx.signal, "generation")

	const outcome = await answerWithCorrection(question, turns, {
		namespace,
		descriptor,
		generator: ctx.generator,
		execute: (sql) =>
			withClient(ctx.pool, (client) =>
				executeQuery(client, namespace, sql, {
					timeoutMs: ctx.config.database.statement_timeout_ms,
					logger: ctx.logger,
					signal: ctx.signal,
				}),
			),
		correctionEnabled: ctx.config.correction.enabled,
		logger: ctx.logger,
		signal: ctx.signal,
	})

	throwIfCancelled(ctx.signal, "answer formatting")
	const answer = await ctx.formatter.format(outcome, ctx.signal)

	// Nothing is appended once the caller has gone
	throwIfCancelled(ctx.signal, "history append")
	try {
		await context.appendExchange(question, answer)
	} catch (error) {
		if (isCancellation(error)) throw error
		ctx.logger.error("Conversation append failed, answer still returned", { query_id: queryId, namespace })
	}

	const { final } = outcome
	const sql = finalSql(final)
	const rowCount = final.kind === "rows" ? final.row_count : 0

	logAudit(
		{
			query_id: queryId,
			timestamp: new Date(),
			namespace,
			session_id: context.sessionId,
			question,
			sql_generated: sql,
			outcome: final.kind,
			attempts: outcome.attempts.length,
			correction_used: outcome.correction_used,
			rows_returned: rowCount,
			generation_latency_ms: outcome.generation_latency_ms,
			postgres_latency_ms: outcome.postgres_latency_ms,
			total_latency_ms: Date.now() - startTime,
		},
		ctx.logger,
	)

	const result: QuestionAnswer = {
		question,
		answer,
		outcome: final.kind,
		correction_used: outcome.correction_used,
		attempts: outcome.attempts.length,
		row_count: rowCount,
	}
	if (showSql && sql !== undefined) result.sql = sql
	return result
}

/**
 * Answer every question in the input, in order.
 */
export async function askQuestions(input: AskInput, ctx: PipelineContext): Promise<BatchResponse> {
	const queryId = uuidv4()
	const sessionId = input.session_id ?? DEFAULTS.sessionId
	const response: BatchResponse = {
		query_id: queryId,
		namespace: input.namespace,
		session_id: sessionId,
		answers: [],
		cancelled: false,
	}

	const questions = splitQuestions(input.text)
	const first = questions.next()
	if (first.done) return response

	ctx.logger.info("Answering questions", { query_id: queryId, namespace: input.namespace, session_id: sessionId })

	let descriptor: SchemaDescriptor
	try {
		throwIfCancelled(ctx.signal, "schema build")
		descriptor = await loadDescriptor(input.namespace, ctx)
	} catch (error) {
		if (isCancellation(error)) {
			response.cancelled = true
			return response
		}
		throw error
	}

	const context = new ConversationContext(input.namespace, sessionId, ctx.store, ctx.config.context)

	const run = async (question: string): Promise<boolean> => {
		try {
			throwIfCancelled(ctx.signal, "question")
			response.answers.push(await answerOne(queryId, question, input, descriptor, context, ctx))
			return true
		} catch (error) {
			if (isCancellation(error)) {
				ctx.logger.info("Batch cancelled", { query_id: queryId, answered: response.answers.length })
				response.cancelled = true
				return false
			}
			ctx.logger.error("Question failed", {
				query_id: queryId,
				error_type: error instanceof PipelineError ? error.type : "unknown",
			})
			response.answers.push({
				question,
				answer: FAILED_ANSWER,
				outcome: "failed",
				correction_used: false,
				attempts: 0,
				row_count: 0,
			})
			return true
		}
	}

	if (!(await run(first.value))) return response
	for (const question of questions) {
		if (!(await run(question))) break
	}
	return response
}

export interface SchemaDescription {
	namespace: NamespaceId
	text: string
	summary: SchemaSummary
}

export async function describeSchema(namespace: NamespaceId, ctx: PipelineContext): Promise<SchemaDescription> {
	const descriptor = await loadDescriptor(namespace, ctx)
	return { namespace, text: renderSchemaDescriptor(descriptor), summary: summarizeSchema(descriptor) }
}

export async function clearHistory(namespace: NamespaceId, sessionId: string | undefined, ctx: PipelineContext): Promise<number> {
	const context = new ConversationContext(namespace, sessionId ?? DEFAULTS.sessionId, ctx.store, ctx.config.context)
	return context.clear()
}
