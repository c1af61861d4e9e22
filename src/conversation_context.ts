/**
 * Conversation Context
 *
 * Namespace-scoped, append-only log of question/answer turns keyed by
 * session. recent() returns a bounded view for the generator: latest turns
 * oldest-first, long assistant turns replaced by a truncated stand-in, and
 * the oldest turns dropped until the rendered history fits the token
 * budget. Stored turns are never modified.
 */

import { z } from "zod"
import { PipelineError, parsePostgresError } from "./config.js"
import { withClient, type SqlClient, type SqlPool } from "./db.js"
import type { Logger } from "./logger.js"
import { quoteIdent, type NamespaceId } from "./namespace.js"

export type TurnRole = "user" | "assistant"

export interface ConversationTurn {
	role: TurnRole
	content: string
	timestamp: Date
}

export interface ConversationStore {
	/** Appends all turns or none */
	append(namespace: NamespaceId, sessionId: string, turns: ConversationTurn[]): Promise<void>
	/** The `limit` latest turns, oldest first */
	list(namespace: NamespaceId, sessionId: string, limit: number): Promise<ConversationTurn[]>
	/** Returns the number of turns removed */
	clear(namespace: NamespaceId, sessionId: string): Promise<number>
	count(namespace: NamespaceId, sessionId: string): Promise<number>
}

export interface ContextOptions {
	history_limit: number
	summary_threshold: number
	summary_length: number
	token_budget: number
}

const CHARS_PER_TOKEN = 4

const turnRowSchema = z.object({
	role: z.enum(["user", "assistant"]),
	content: z.string(),
	timestamp: z.coerce.date(),
})

const countRowSchema = z.object({ count: z.coerce.number().int() })

// ============================================================================
// Stores
// ============================================================================

/**
 * Turns kept in "<namespace>".chat_history, created on first use.
 */
export class PgConversationStore implements ConversationStore {
	private ensured = new Set<string>()

	constructor(
		private pool: SqlPool,
		private logger: Logger,
	) {}

	private table(namespace: NamespaceId): string {
		return `${quoteIdent(namespace)}.chat_history`
	}

	private async ensureTable(client: SqlClient, namespace: NamespaceId): Promise<void> {
		if (this.ensured.has(namespace)) return
		await client.query(`
			CREATE TABLE IF NOT EXISTS ${this.table(namespace)} (
				id SERIAL PRIMARY KEY,
				session_id VARCHAR(255) NOT NULL,
				role VARCHAR(50) NOT NULL CHECK (role IN ('user', 'assistant')),
				content TEXT NOT NULL,
				timestamp TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
			)
		`)
		await client.query(
			`CREATE INDEX IF NOT EXISTS chat_history_session_idx ON ${this.table(namespace)} (session_id, timestamp)`,
		)
		this.ensured.add(namespace)
	}

	async append(namespace: NamespaceId, sessionId: string, turns: ConversationTurn[]): Promise<void> {
		if (turns.length === 0) return
		await withClient(this.pool, async (client) => {
			await this.ensureTable(client, namespace)
			try {
				await client.query("BEGIN")
				for (const turn of turns) {
					await client.query(
						`INSERT INTO ${this.table(namespace)} (session_id, role, content, timestamp) VALUES ($1, $2, $3, $4)`,
						[sessionId, turn.role, turn.content, turn.timestamp],
					)
				}
				await client.query("COMMIT")
			} catch (error) {
				try {
					await client.query("ROLLBACK")
				} catch (rollbackError) {
					client.discard(rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError)))
				}
				const { sqlstate } = parsePostgresError(error)
				this.logger.error("Failed to append conversation turns", { namespace, session_id: sessionId, sqlstate })
				throw new PipelineError("execution", "Failed to save conversation turns", false, { sqlstate })
			}
		})
		this.logger.debug("Appended conversation turns", { namespace, session_id: sessionId, count: turns.length })
	}

	async list(namespace: NamespaceId, sessionId: string, limit: number): Promise<ConversationTurn[]> {
		if (limit <= 0) return []
		return withClient(this.pool, async (client) => {
			await this.ensureTable(client, namespace)
			const result = await client.query(
				`SELECT role, content, timestamp FROM ${this.table(namespace)}
				WHERE session_id = $1
				ORDER BY timestamp DESC, id DESC
				LIMIT $2`,
				[sessionId, limit],
			)
			// Reverse to get chronological order
			return result.rows.map((row) => turnRowSchema.parse(row)).reverse()
		})
	}

	async clear(namespace: NamespaceId, sessionId: string): Promise<number> {
		return withClient(this.pool, async (client) => {
			await this.ensureTable(client, namespace)
			const result = await client.query(`DELETE FROM ${this.table(namespace)} WHERE session_id = $1`, [sessionId])
			this.logger.info("Cleared conversation history", { namespace, session_id: sessionId })
			return result.rowCount ?? 0
		})
	}

	async count(namespace: NamespaceId, sessionId: string): Promise<number> {
		return withClient(this.pool, async (client) => {
			await this.ensureTable(client, namespace)
			const result = await client.query(
				`SELECT COUNT(*) AS count FROM ${this.table(namespace)} WHERE session_id = $1`,
				[sessionId],
			)
			const row = result.rows[0]
			return row ? countRowSchema.parse(row).count : 0
		})
	}
}

/**
 * Process-local store for tests and the memory config option.
 */
export class InMemoryConversationStore implements ConversationStore {
	private turns = new Map<string, ConversationTurn[]>()

	private key(namespace: NamespaceId, sessionId: string): string {
		return `${namespace}\u0000${sessionId}`
	}

	async append(namespace: NamespaceId, sessionId: string, turns: ConversationTurn[]): Promise<void> {
		const key = this.key(namespace, sessionId)
		this.turns.set(key, [...(this.turns.get(key) ?? []), ...turns.map((t) => ({ ...t }))])
	}

	async list(namespace: NamespaceId, sessionId: string, limit: number): Promise<ConversationTurn[]> {
		if (limit <= 0) return []
		const all = this.turns.get(this.key(namespace, sessionId)) ?? []
		return all.slice(-limit).map((t) => ({ ...t }))
	}

	async clear(namespace: NamespaceId, sessionId: string): Promise<number> {
		const key = this.key(namespace, sessionId)
		const removed = this.turns.get(key)?.length ?? 0
		this.turns.delete(key)
		return removed
	}

	async count(namespace: NamespaceId, sessionId: string): Promise<number> {
		return this.turns.get(this.key(namespace, sessionId))?.length ?? 0
	}
}

// ============================================================================
// Context
// ============================================================================

export function estimateTokens(text: string): number {
	return Math.ceil(text.length / CHARS_PER_TOKEN)
}

/**
 * Truncated stand-in for a long assistant turn
 */
export function summarizeTurn(turn: ConversationTurn, threshold: number, keep: number): ConversationTurn {
	if (turn.role !== "assistant" || turn.content.length <= threshold) return turn
	const kept = Math.min(keep, threshold)
	const omitted = turn.content.length - kept
	return { ...turn, content: `${turn.content.slice(0, kept)} … [summarized: ${omitted} chars omitted]` }
}

export function formatHistoryForPrompt(turns: readonly ConversationTurn[]): string {
	if (turns.length === 0) return "No previous conversation history."
	const parts = ["PREVIOUS CONVERSATION:"]
	for (const turn of turns) parts.push(`${turn.role.toUpperCase()}: ${turn.content}`)
	return parts.join("\n")
}

export class ConversationContext {
	constructor(
		readonly namespace: NamespaceId,
		readonly sessionId: string,
		private store: ConversationStore,
		private options: ContextOptions,
	) {}

	async append(turn: ConversationTurn): Promise<void> {
		await this.store.append(this.namespace, this.sessionId, [turn])
	}

	/** Question and answer are stored together or not at all */
	async appendExchange(question: string, answer: string, at: Date = new Date()): Promise<void> {
		await this.store.append(this.namespace, this.sessionId, [
			{ role: "user", content: question, timestamp: at },
			{ role: "assistant", content: answer, timestamp: at },
		])
	}

	async recent(limit: number = this.options.history_limit): Promise<ConversationTurn[]> {
		if (limit <= 0) return []
		const stored = await this.store.list(this.namespace, this.sessionId, limit)
		const turns = stored.map((t) => summarizeTurn(t, this.options.summary_threshold, this.options.summary_length))

		while (turns.length > 0 && estimateTokens(formatHistoryForPrompt(turns)) > this.options.token_budget) {
			turns.shift()
		}
		return turns
	}

	async clear(): Promise<number> {
		return this.store.clear(this.namespace, this.sessionId)
	}

	async count(): Promise<number> {
		return this.store.count(this.namespace, this.sessionId)
	}
}
