import { describe, it, expect, vi } from "vitest"
import {
	ConversationContext,
	InMemoryConversationStore,
	PgConversationStore,
	formatHistoryForPrompt,
	summarizeTurn,
	type ConversationTurn,
} from "./conversation_context.js"
import { toNamespaceId } from "./namespace.js"
import { FakePool, pgError, queryResult, silentLogger, type QueryHandler } from "./test_support.js"

const nsOptions = { prefix: "proj_", max_length: 63 }
const sales = toNamespaceId("proj_alice_sales", nsOptions)
const hr = toNamespaceId("proj_alice_hr", nsOptions)

const options = { history_limit: 10, summary_threshold: 100, summary_length: 20, token_budget: 1000 }
const at = new Date("2024-03-01T12:00:00Z")

function turn(role: ConversationTurn["role"], content: string): ConversationTurn {
	return { role, content, timestamp: at }
}

describe("ConversationContext", () => {
	it("should return the latest turns oldest first", async () => {
		const context = new ConversationContext(sales, "s1", new InMemoryConversationStore(), options)
		for (const n of [1, 2, 3, 4]) await context.appendExchange(`q${n}`, `a${n}`, at)

		const turns = await context.recent(5)
		expect(turns.map((t) => t.content)).toEqual(["a2", "q3", "a3", "q4", "a4"])
		expect(turns.map((t) => t.role)).toEqual(["assistant", "user", "assistant", "user", "assistant"])
	})

	it("should leave the limit to the store", async () => {
		const store = new InMemoryConversationStore()
		const list = vi.spyOn(store, "list")
		const context = new ConversationContext(sales, "s1", store, options)
		await context.appendExchange("q1", "a1", at)
		await context.appendExchange("q2", "a2", at)

		expect((await context.recent(3)).map((t) => t.content)).toEqual(["a1", "q2", "a2"])
		expect(list).toHaveBeenCalledTimes(1)
		expect(list).toHaveBeenCalledWith(sales, "s1", 3)
	})

	it("should default to the configured history limit", async () => {
		const context = new ConversationContext(sales, "s1", new InMemoryConversationStore(), {
			...options,
			history_limit: 2,
		})
		await context.appendExchange("q1", "a1", at)
		await context.appendExchange("q2", "a2", at)
		expect((await context.recent()).map((t) => t.content)).toEqual(["q2", "a2"])
	})

	it("should return nothing for a zero limit", async () => {
		const context = new ConversationContext(sales, "s1", new InMemoryConversationStore(), options)
		await context.appendExchange("q1", "a1", at)
		expect(await context.recent(0)).toEqual([])
	})

	it("should summarize long assistant turns without changing the stored turn", async () => {
		const store = new InMemoryConversationStore()
		const context = new ConversationContext(sales, "s1", store, options)
		const long = "x".repeat(150)
		await context.appendExchange("y".repeat(150), long, at)

		const [question, answer] = await context.recent()
		expect(question.content).toBe("y".repeat(150))
		expect(answer.content).toBe(`${"x".repeat(20)} … [summarized: 130 chars omitted]`)
		expect((await store.list(sales, "s1", 10))[1].content).toBe(long)
	})

	it("should drop the oldest turns until the history fits the token budget", async () => {
		const context = new ConversationContext(sales, "s1", new InMemoryConversationStore(), {
			...options,
			token_budget: 15,
		})
		await context.appendExchange("first question", "first answer", at)
		await context.appendExchange("second", "ok", at)

		expect((await context.recent()).map((t) => t.content)).toEqual(["second", "ok"])
	})

	it("should keep namespaces and sessions apart", async () => {
		const store = new InMemoryConversationStore()
		await new ConversationContext(sales, "s1", store, options).appendExchange("q", "a", at)

		expect(await new ConversationContext(hr, "s1", store, options).recent()).toEqual([])
		expect(await new ConversationContext(sales, "s2", store, options).recent()).toEqual([])
	})

	it("should clear a session and report how many turns were removed", async () => {
		const context = new ConversationContext(sales, "s1", new InMemoryConversationStore(), options)
		await context.appendExchange("q", "a", at)
		expect(await context.clear()).toBe(2)
		expect(await context.count()).toBe(0)
	})
})

describe("summarizeTurn", () => {
	it("should leave user turns and short answers alone", () => {
		const user = turn("user", "z".repeat(200))
		const short = turn("assistant", "fine")
		expect(summarizeTurn(user, 100, 20)).toBe(user)
		expect(summarizeTurn(short, 100, 20)).toBe(short)
	})
})

describe("formatHistoryForPrompt", () => {
	it("should render roles in upper case", () => {
		expect(formatHistoryForPrompt([turn("user", "hi"), turn("assistant", "hello")])).toBe(
			"PREVIOUS CONVERSATION:\nUSER: hi\nASSISTANT: hello",
		)
	})

	it("should say when there is no history", () => {
		expect(formatHistoryForPrompt([])).toBe("No previous conversation history.")
	})
})

describe("PgConversationStore", () => {
	const createTable: QueryHandler = (text) => (text.trim().startsWith("CREATE") ? queryResult([]) : undefined)

	it("should insert an exchange inside one transaction", async () => {
		const pool = new FakePool([createTable, (text) => (text.startsWith("INSERT") ? queryResult([]) : undefined)])
		const store = new PgConversationStore(pool, silentLogger)

		await store.append(sales, "s1", [turn("user", "q"), turn("assistant", "a")])

		expect(pool.queries.slice(2)).toEqual([
			"BEGIN",
			'INSERT INTO "proj_alice_sales".chat_history (session_id, role, content, timestamp) VALUES ($1, $2, $3, $4)',
			'INSERT INTO "proj_alice_sales".chat_history (session_id, role, content, timestamp) VALUES ($1, $2, $3, $4)',
			"COMMIT",
		])
		expect(pool.released).toBe(1)
	})

	it("should create the table once per namespace", async () => {
		const pool = new FakePool([createTable, () => queryResult([{ count: "0" }])])
		const store = new PgConversationStore(pool, silentLogger)

		await store.count(sales, "s1")
		await store.count(sales, "s1")

		expect(pool.queries.filter((q) => q.startsWith("CREATE TABLE")).length).toBe(1)
	})

	it("should roll back and raise when an insert fails", async () => {
		const pool = new FakePool([
			createTable,
			(text) => {
				if (text.startsWith("INSERT")) throw pgError("23514")
				return undefined
			},
		])
		const store = new PgConversationStore(pool, silentLogger)

		await expect(store.append(sales, "s1", [turn("user", "q")])).rejects.toMatchObject({
			type: "execution",
			message: "Failed to save conversation turns",
		})
		expect(pool.queries[pool.queries.length - 1]).toBe("ROLLBACK")
		expect(pool.releasedWithError).toEqual([])
		expect(pool.released).toBe(1)
	})

	it("should discard the connection when the rollback fails too", async () => {
		const pool = new FakePool([
			createTable,
			(text) => {
				if (text.startsWith("INSERT") || text === "ROLLBACK") throw pgError("08006")
				return undefined
			},
		])
		const store = new PgConversationStore(pool, silentLogger)

		await expect(store.append(sales, "s1", [turn("user", "q")])).rejects.toMatchObject({ type: "execution" })
		expect(pool.releasedWithError.length).toBe(1)
	})

	it("should list turns oldest first", async () => {
		const pool = new FakePool([
			createTable,
			(text) =>
				text.trim().startsWith("SELECT role")
					? queryResult([
							{ role: "assistant", content: "a1", timestamp: "2024-03-01T12:00:01Z" },
							{ role: "user", content: "q1", timestamp: "2024-03-01T12:00:00Z" },
						])
					: undefined,
		])
		const store = new PgConversationStore(pool, silentLogger)

		const turns = await store.list(sales, "s1", 2)
		expect(turns.map((t) => t.content)).toEqual(["q1", "a1"])
		expect(turns[0].timestamp).toEqual(new Date("2024-03-01T12:00:00Z"))
	})

	it("should report the number of cleared turns", async () => {
		const pool = new FakePool([
			createTable,
			(text) => (text.startsWith("DELETE") ? { ...queryResult([]), command: "DELETE", rowCount: 4 } : undefined),
		])
		expect(await new PgConversationStore(pool, silentLogger).clear(sales, "s1")).toBe(4)
	})
})
