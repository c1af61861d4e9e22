import { describe, it, expect } from "vitest"
import { Client } from "@modelcontextprotocol/sdk/client/index.js"
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js"
import { z } from "zod"
import { AnswerFormatter } from "./answer_formatter.js"
import { PipelineError } from "./config.js"
import { configSchema } from "./config/loadConfig.js"
import { InMemoryConversationStore } from "./conversation_context.js"
import { toNamespaceId } from "./namespace.js"
import type { BatchResponse, QuestionAnswer } from "./pipeline.js"
import { QueryGenerator } from "./query_generator.js"
import { createServer, renderBatch, toolErrorMessage } from "./server.js"
import { FakePool, ScriptedCompletion, catalogHandler, queryResult, silentLogger } from "./test_support.js"

const ns = toNamespaceId("proj_alice_sales", { prefix: "proj_", max_length: 63 })

function answer(question: string, text: string, sql?: string): QuestionAnswer {
	const a: QuestionAnswer = { question, answer: text, outcome: "rows", correction_used: false, attempts: 1, row_count: 1 }
	if (sql) a.sql = sql
	return a
}

function batch(answers: QuestionAnswer[], cancelled = false): BatchResponse {
	return { query_id: "q-1", namespace: ns, session_id: "default", answers, cancelled }
}

describe("renderBatch", () => {
	it("should ask for a question when there is none", () => {
		expect(renderBatch(batch([]))).toBe("Please enter a question.")
		expect(renderBatch(batch([], true))).toBe("Request cancelled.")
	})

	it("should render a single answer with its SQL", () => {
		expect(renderBatch(batch([answer("Total?", "42", "SELECT 1")]))).toBe("42\n\nSQL:\n```sql\nSELECT 1\n```")
	})

	it("should number several answers and note cancellation", () => {
		expect(renderBatch(batch([answer("a?", "x"), answer("b?", "y")], true))).toBe(
			"Q1: a?\n\nx\n\n---\n\nQ2: b?\n\ny\n\n---\n\n(Request cancelled; remaining questions were not answered.)",
		)
	})
})

describe("toolErrorMessage", () => {
	it("should pass pipeline messages through and hide anything else", () => {
		expect(toolErrorMessage(new PipelineError("cancelled", "Request cancelled before generation"))).toBe(
			"Request cancelled.",
		)
		expect(toolErrorMessage(new PipelineError("validation", "owner_id cannot be empty"))).toBe(
			"owner_id cannot be empty",
		)
		expect(toolErrorMessage(new Error("password authentication failed for user app"))).toBe(
			"The request failed unexpectedly. Please try again.",
		)
	})
})

const toolResultSchema = z.object({
	content: z.array(z.object({ type: z.literal("text"), text: z.string() })),
	isError: z.boolean().optional(),
})

describe("createServer", () => {
	async function connect() {
		const config = configSchema.parse({ context: { store: "memory" } })
		const pool = new FakePool([
			(text, values) =>
				text.includes("information_schema.schemata")
					? queryResult(values?.[0] === "proj_alice_sales" ? [{ exists: 1 }] : [])
					: undefined,
			catalogHandler(ns, [
				{ name: "sales", columns: [{ name: "brand", type: "text", nullable: false }], rows: [{ brand: "Nike" }] },
			]),
			(text) => (text.includes("COUNT(*)") ? queryResult([{ n: "3" }]) : undefined),
		])
		const server = createServer({
			pool,
			store: new InMemoryConversationStore(),
			generator: new QueryGenerator(
				new ScriptedCompletion(["SELECT COUNT(*) AS n FROM sales"]),
				{ temperature: 0.1, max_tokens: 500 },
				silentLogger,
			),
			formatter: new AnswerFormatter(
				new ScriptedCompletion(["There are 3 sales."]),
				{ ...config.answer, temperature: 0.3, max_tokens: 400 },
				silentLogger,
			),
			config,
			logger: silentLogger,
		})
		const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair()
		const client = new Client({ name: "test-client", version: "1.0.0" })
		await server.connect(serverTransport)
		await client.connect(clientTransport)
		return { client, server }
	}

	it("should answer through the ask tool", async () => {
		const { client, server } = await connect()
		try {
			const result = toolResultSchema.parse(
				await client.callTool({
					name: "ask",
					arguments: { owner_id: "alice", project_name: "sales", question: "How many sales?" },
				}),
			)
			expect(result.isError ?? false).toBe(false)
			expect(result.content[0].text).toBe("There are 3 sales.")
		} finally {
			await client.close()
			await server.close()
		}
	})

	it("should report an unknown project as a tool error", async () => {
		const { client, server } = await connect()
		try {
			const result = toolResultSchema.parse(
				await client.callTool({
					name: "ask",
					arguments: { owner_id: "bob", project_name: "sales", question: "How many sales?" },
				}),
			)
			expect(result.isError).toBe(true)
			expect(result.content[0].text).toBe('Project "sales" was not found for this owner.')
		} finally {
			await client.close()
			await server.close()
		}
	})
})
