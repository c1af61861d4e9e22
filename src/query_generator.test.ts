import { describe, it, expect } from "vitest"
import { toNamespaceId } from "./namespace.js"
import {
	QueryGenerator,
	buildGenerationPrompt,
	buildSystemPrompt,
	extractSqlStatement,
	renderCorrectionHint,
} from "./query_generator.js"
import type { SchemaDescriptor } from "./schema_types.js"
import { ScriptedCompletion, silentLogger } from "./test_support.js"

const ns = toNamespaceId("proj_alice_sales", { prefix: "proj_", max_length: 63 })

const descriptor: SchemaDescriptor = {
	namespace: ns,
	tables: [{ name: "t", columns: [{ name: "c", declared_type: "text", nullable: false, possible_values: ["x"] }] }],
}

const hint = {
	failed_sql: "SELECT SUM(price) FROM proj_alice_sales.products WHERE brand = 'Nikee'",
	columns: [{ table: "products", column: "brand", possible_values: ["Adidas", "Nike"], rejected_literals: ["Nikee"] }],
}

describe("buildGenerationPrompt", () => {
	it("should frame history, schema and question", () => {
		const prompt = buildGenerationPrompt("how many?", descriptor, [])
		expect(prompt.system).toBe(buildSystemPrompt(ns))
		expect(prompt.user).toBe(
			[
				"No previous conversation history.",
				"",
				"DATABASE SCHEMA (namespace: proj_alice_sales)",
				"Table: proj_alice_sales.t",
				"  - c (text, NOT NULL) possible values: ['x']",
				"",
				"USER QUESTION: how many?",
				"",
				"Generate a SQL query to answer this question.",
			].join("\n"),
		)
	})

	it("should include previous turns", () => {
		const turns = [{ role: "user" as const, content: "list brands", timestamp: new Date(0) }]
		expect(buildGenerationPrompt("and Nike?", descriptor, turns).user.split("\n").slice(0, 2)).toEqual([
			"PREVIOUS CONVERSATION:",
			"USER: list brands",
		])
	})

	it("should name the namespace in the system prompt", () => {
		expect(buildSystemPrompt(ns)).toContain(
			"4. Qualify every table with the namespace proj_alice_sales (e.g. proj_alice_sales.table_name) and never reference another schema",
		)
	})
})

describe("renderCorrectionHint", () => {
	it("should list the possible values and the literal that was not found", () => {
		expect(renderCorrectionHint(hint)).toBe(
			[
				"CORRECTION: The previous SQL query returned zero rows.",
				"Failed SQL:",
				"SELECT SUM(price) FROM proj_alice_sales.products WHERE brand = 'Nikee'",
				"Its filter values probably do not match the data. Possible values for the columns it referenced:",
				"- products.brand: ['Adidas', 'Nike'] (not found: 'Nikee')",
				"Rewrite the query using only these values.",
			].join("\n"),
		)
	})

	it("should fall back to a general instruction without columns", () => {
		expect(renderCorrectionHint({ failed_sql: "SELECT 1", columns: [] }).split("\n").slice(-1)).toEqual([
			"Rewrite the query so that it matches the data described in the schema.",
		])
	})
})

describe("extractSqlStatement", () => {
	it("should accept bare SQL", () => {
		expect(extractSqlStatement("  SELECT 1  ")).toBe("SELECT 1")
	})

	it("should unwrap one fenced block", () => {
		expect(extractSqlStatement("```sql\nSELECT 1;\n```")).toBe("SELECT 1;")
		expect(extractSqlStatement("Here you go:\n```sql\nSELECT 1\n```\nThis counts rows.")).toBe("SELECT 1")
	})

	it("should unwrap a single-line block without a language tag", () => {
		expect(extractSqlStatement("```SELECT brand FROM proj_a_b.products```")).toBe("SELECT brand FROM proj_a_b.products")
		expect(extractSqlStatement("```\nSELECT 1\n```")).toBe("SELECT 1")
	})

	it("should reject more than one block", () => {
		expect(() => extractSqlStatement("```sql\nSELECT 1\n```\n```sql\nSELECT 2\n```")).toThrow(
			"Completion contained more than one code block",
		)
	})

	it("should reject a reply with a second statement", () => {
		expect(() => extractSqlStatement("SELECT 1; DELETE FROM t")).toThrow("Completion contained more than one SQL statement")
		expect(() => extractSqlStatement("```sql\nSELECT 1;\nSELECT 2;\n```")).toThrow(
			"Completion contained more than one SQL statement",
		)
	})

	it("should not count semicolons inside literals", () => {
		expect(extractSqlStatement("SELECT * FROM t WHERE note = 'a;b'")).toBe("SELECT * FROM t WHERE note = 'a;b'")
	})

	it("should reject an unterminated block", () => {
		expect(() => extractSqlStatement("```sql\nSELECT 1")).toThrow("Completion contained an unterminated code block")
	})

	it("should reject prose", () => {
		expect(() => extractSqlStatement("I cannot answer that.")).toThrow("Completion was not a SQL statement")
	})

	it("should reject an empty reply", () => {
		expect(() => extractSqlStatement("   ")).toThrow("Completion service returned no SQL")
	})
})

describe("QueryGenerator", () => {
	const options = { temperature: 0.1, max_tokens: 500 }

	it("should return the first attempt", async () => {
		const completion = new ScriptedCompletion(["SELECT c FROM proj_alice_sales.t"])
		const generated = await new QueryGenerator(completion, options, silentLogger).generate("q?", descriptor, [])

		expect(generated).toEqual({ sql_text: "SELECT c FROM proj_alice_sales.t", source_question: "q?", attempt_number: 1 })
		expect(completion.requests[0]).toMatchObject({ temperature: 0.1, max_tokens: 500 })
	})

	it("should mark a hinted generation as the second attempt", async () => {
		const completion = new ScriptedCompletion(["SELECT 1"])
		const generated = await new QueryGenerator(completion, options, silentLogger).generate("q?", descriptor, [], hint)

		expect(generated.attempt_number).toBe(2)
		expect(completion.requests[0].user).toContain("- products.brand: ['Adidas', 'Nike'] (not found: 'Nikee')")
	})

	it("should fail closed when the reply is not SQL", async () => {
		const completion = new ScriptedCompletion(["Sorry, I don't know."])
		await expect(
			new QueryGenerator(completion, options, silentLogger).generate("q?", descriptor, []),
		).rejects.toMatchObject({ type: "generation" })
	})
})
