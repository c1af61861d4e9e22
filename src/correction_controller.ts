/**
 * Correction Controller
 *
 * Drives one question through generate → validate → execute and, when the
 * result is empty, exactly one regeneration with a correction hint:
 *
 *   init → generated → executed → done
 *                         └─ needs_correction → regenerated → reexecuted → done
 *
 * Validation rejections and execution errors end the question immediately.
 * At most two executions per question.
 */

import { PipelineError } from "./config.js"
import type { ConversationTurn } from "./conversation_context.js"
import { buildCorrectionHint, type CorrectionHint } from "./correction_hint.js"
import type { Logger } from "./logger.js"
import type { NamespaceId } from "./namespace.js"
import type { ExecutionOutcome } from "./query_executor.js"
import type { GeneratedQuery } from "./query_generator.js"
import { validateQuery, type ValidationRule } from "./query_validator.js"
import type { SchemaDescriptor } from "./schema_types.js"

export type ControllerState =
	| "init"
	| "generated"
	| "executed"
	| "needs_correction"
	| "regenerated"
	| "reexecuted"
	| "done"

export type FinalOutcome =
	| ExecutionOutcome
	| { kind: "validation_rejected"; sql: string; rule: ValidationRule; message: string }
	| { kind: "generation_unavailable"; error_type: "generation" | "timeout"; message: string }

export interface QuestionOutcome {
	question: string
	final: FinalOutcome
	attempts: GeneratedQuery[]
	/** A corrected second attempt produced the final outcome */
	correction_used: boolean
	states: ControllerState[]
	executions: number
	generation_latency_ms: number
	postgres_latency_ms: number
}

export interface SqlGenerator {
	generate(
		question: string,
		descriptor: SchemaDescriptor,
		turns: readonly ConversationTurn[],
		hint?: CorrectionHint,
		signal?: AbortSignal,
	): Promise<GeneratedQuery>
}

export interface CorrectionDeps {
	namespace: NamespaceId
	descriptor: SchemaDescriptor
	generator: SqlGenerator
	/** Runs a validated statement through a scoped connection */
	execute: (sql: string) => Promise<ExecutionOutcome>
	correctionEnabled: boolean
	logger: Logger
	signal?: AbortSignal
}

class CorrectionRun {
	readonly states: ControllerState[] = ["init"]
	readonly attempts: GeneratedQuery[] = []
	executions = 0
	generationMs = 0
	postgresMs = 0

	constructor(
		private question: string,
		private turns: readonly ConversationTurn[],
		private deps: CorrectionDeps,
	) {}

	transition(state: ControllerState): void {
		this.states.push(state)
		this.deps.logger.debug("Correction state", { state, question: this.question.slice(0, 80) })
	}

	/** Generation failure as a value; cancellation and unexpected errors propagate */
	async generate(hint?: CorrectionHint): Promise<GeneratedQuery | FinalOutcome> {
		const start = Date.now()
		try {
			const query = await this.deps.generator.generate(
				this.question,
				this.deps.descriptor,
				this.turns,
				hint,
				this.deps.signal,
			)
			this.attempts.push(query)
			return query
		} catch (error) {
			if (error instanceof PipelineError && (error.type === "generation" || error.type === "timeout")) {
				this.deps.logger.warn("SQL generation failed", { type: error.type, attempt: hint ? 2 : 1 })
				return { kind: "generation_unavailable", error_type: error.type, message: error.message }
			}
			throw error
		} finally {
			this.generationMs += Date.now() - start
		}
	}

	async validateAndExecute(query: GeneratedQuery): Promise<FinalOutcome> {
		const validation = validateQuery(query.sql_text, this.deps.namespace)
		if (!validation.valid) {
			this.deps.logger.warn("Generated SQL rejected", { rule: validation.rule, attempt: query.attempt_number })
			return { kind: "validation_rejected", sql: validation.sql, rule: validation.rule, message: validation.message }
		}
		const outcome = await this.deps.execute(validation.sql)
		this.executions++
		this.postgresMs += outcome.latency_ms
		return outcome
	}

	finish(final: FinalOutcome, correctionUsed: boolean): QuestionOutcome {
		this.transition("done")
		return {
			question: this.question,
			final,
			attempts: this.attempts,
			correction_used: correctionUsed,
			states: this.states,
			executions: this.executions,
			generation_latency_ms: this.generationMs,
			postgres_latency_ms: this.postgresMs,
		}
	}
}

function isGenerated(value: GeneratedQuery | FinalOutcome): value is GeneratedQuery {
	return "sql_text" in value
}

export async function answerWithCorrection(
	question: string,
	turns: readonly ConversationTurn[],
	deps: CorrectionDeps,
): Promise<QuestionOutcome> {
	const run = new CorrectionRun(question, turns, deps)

	const first = await run.generate()
	if (!isGenerated(first)) return run.finish(first, false)
	run.transition("generated")

	const firstOutcome = await run.validateAndExecute(first)
	if (firstOutcome.kind === "validation_rejected") return run.finish(firstOutcome, false)
	run.transition("executed")

	if (firstOutcome.kind !== "empty" || !deps.correctionEnabled) {
		return run.finish(firstOutcome, false)
	}

	run.transition("needs_correction")
	const hint = buildCorrectionHint(firstOutcome.sql, deps.descriptor)
	deps.logger.info("Empty result, retrying with correction hint", {
		namespace: deps.namespace,
		hinted_columns: hint.columns.map((c) => `${c.table}.${c.column}`),
	})

	const second = await run.generate(hint)
	// The retry produced nothing to run: the empty result stands
	if (!isGenerated(second)) return run.finish(firstOutcome, false)
	run.transition("regenerated")

	const secondOutcome = await run.validateAndExecute(second)
	if (secondOutcome.kind !== "validation_rejected") run.transition("reexecuted")
	return run.finish(secondOutcome, true)
}
