/**
 * Shared types, error class and database error classification.
 *
 * Includes:
 * - PipelineError, the exception raised at network boundaries
 * - SQLSTATE classification used to sanitize execution failures
 * - Response and audit interfaces returned by the pipeline
 */

/**
 * Error types for structured error handling
 *
 * - generation: completion service failed or returned unusable text
 * - validation: caller input (namespace names) rejected
 * - execution: database failure outside a query (pool, connection)
 * - timeout: completion call exceeded its time bound
 * - cancelled: the caller aborted the request
 */
export type PipelineErrorType = "generation" | "validation" | "execution" | "timeout" | "cancelled"

export class PipelineError extends Error {
	constructor(
		public type: PipelineErrorType,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "PipelineError"
	}
}

export function isCancellation(error: unknown): boolean {
	return error instanceof PipelineError && error.type === "cancelled"
}

/** Stop before the next stage when the caller has cancelled. */
export function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
	if (signal?.aborted) {
		throw new PipelineError("cancelled", `Request cancelled before ${stage}`, false, { stage })
	}
}

/**
 * Execution error classification type
 *
 * - infra_failure: Connection, pool, resource errors
 * - query_timeout: Query canceled due to statement_timeout
 * - validation_block: Permission or unsupported-feature failure
 * - sql_error: SQL syntax/semantic error
 * - unknown: Unclassified error
 */
export type ExecutionErrorClass =
	| "infra_failure"
	| "query_timeout"
	| "validation_block"
	| "sql_error"
	| "unknown"

/**
 * SQLSTATE classification for error handling
 */
export const SQLSTATE_CLASSIFICATION = {
	infrastructure: [
		"08", // Connection exception
		"53", // Insufficient resources
		"54", // Program limit exceeded
		"58", // System error
		"F0", // Config file error
		"XX", // Internal error
	],

	failFast: [
		"0A", // Feature not supported
		"25006", // Read-only transaction
		"42501", // Insufficient privilege
	],

	timeout: [
		"57014", // Query canceled (statement_timeout)
		"57P01", // Admin shutdown
		"57P02", // Crash shutdown
		"57P03", // Cannot connect now
	],

	sqlError: [
		"42601", // Syntax error
		"42P01", // Undefined table
		"42703", // Undefined column
		"42702", // Ambiguous column
		"42P09", // Ambiguous alias
		"42P10", // Invalid column reference
		"42804", // Datatype mismatch
		"42883", // Undefined function
		"42803", // Grouping error
		"22", // Data exception (e.g., division by zero)
	],
}

function matchesCode(codes: string[], sqlstate: string): boolean {
	if (codes.includes(sqlstate)) return true
	return codes.some((prefix) => prefix.length === 2 && sqlstate.startsWith(prefix))
}

export function isInfrastructureError(sqlstate: string): boolean {
	return matchesCode(SQLSTATE_CLASSIFICATION.infrastructure, sqlstate)
}

export function isTimeoutError(sqlstate: string): boolean {
	return SQLSTATE_CLASSIFICATION.timeout.includes(sqlstate)
}

export function isFailFastError(sqlstate: string): boolean {
	return matchesCode(SQLSTATE_CLASSIFICATION.failFast, sqlstate)
}

export function isSqlError(sqlstate: string): boolean {
	return matchesCode(SQLSTATE_CLASSIFICATION.sqlError, sqlstate)
}

/**
 * Classify a database failure by SQLSTATE.
 */
export function classifyExecutionError(sqlstate: string): ExecutionErrorClass {
	if (isInfrastructureError(sqlstate)) return "infra_failure"
	if (isTimeoutError(sqlstate)) return "query_timeout"
	if (isFailFastError(sqlstate)) return "validation_block"
	if (isSqlError(sqlstate)) return "sql_error"
	return "unknown"
}

/**
 * Plain-language message for a SQLSTATE. Never includes the driver's own text,
 * which may carry connection or server details.
 */
export function sanitizeExecutionError(sqlstate: string): string {
	const specific: Record<string, string> = {
		"42601": "The generated query had a syntax error.",
		"42P01": "The generated query referenced a table that does not exist.",
		"42703": "The generated query referenced a column that does not exist.",
		"42702": "The generated query used an ambiguous column name.",
		"42804": "The generated query compared values of incompatible types.",
		"42883": "The generated query used a function that is not available.",
		"42803": "The generated query grouped its results incorrectly.",
		"22012": "The query attempted to divide by zero.",
		"57014": "The query took too long and was stopped.",
		"25006": "The query tried to modify data, which is not allowed.",
		"42501": "The query needed permissions that are not granted.",
	}
	if (specific[sqlstate]) return specific[sqlstate]

	switch (classifyExecutionError(sqlstate)) {
		case "infra_failure":
			return "The database is temporarily unavailable."
		case "query_timeout":
			return "The query was interrupted before it finished."
		case "validation_block":
			return "The query used a feature that is not allowed."
		case "sql_error":
			return "The generated query could not be run against this data."
		default:
			return "The query failed for an unexpected reason."
	}
}

/**
 * PostgreSQL error fields the executor reads from a driver error.
 */
export interface PostgresErrorContext {
	sqlstate: string
	message: string
}

/**
 * Parse a thrown driver error into structured form.
 */
export function parsePostgresError(error: unknown): PostgresErrorContext {
	if (error && typeof error === "object") {
		const code = "code" in error && typeof error.code === "string" ? error.code : "UNKNOWN"
		const message = "message" in error && typeof error.message === "string" ? error.message : String(error)
		return { sqlstate: code, message }
	}

	return {
		sqlstate: "UNKNOWN",
		message: String(error),
	}
}

/**
 * Audit log entry, one per answered question
 */
export interface AuditLogEntry {
	query_id: string
	timestamp: Date
	namespace: string
	session_id: string
	question: string
	sql_generated?: string
	outcome: string
	attempts: number
	correction_used: boolean
	rows_returned?: number
	generation_latency_ms: number
	postgres_latency_ms: number
	total_latency_ms: number
}

/**
 * Default request values
 */
export const DEFAULTS = {
	sessionId: "default",
}
