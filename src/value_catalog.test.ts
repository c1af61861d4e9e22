import { describe, it, expect } from "vitest"
import { toNamespaceId } from "./namespace.js"
import { FakePool, catalogHandler, pgError, queryResult, silentLogger } from "./test_support.js"
import { buildValueCatalog, isTextualType } from "./value_catalog.js"

const ns = toNamespaceId("proj_alice_sales", { prefix: "proj_", max_length: 63 })

const products = {
	name: "products",
	columns: [
		{ name: "brand", type: "text", nullable: true },
		{ name: "price", type: "numeric", nullable: false },
	],
	rows: [
		{ brand: "Nike", price: 10 },
		{ brand: "Adidas", price: 12 },
		{ brand: null, price: 9 },
		{ brand: "Nike", price: 11 },
		{ brand: "asics", price: 8 },
	],
}

describe("isTextualType", () => {
	it("should accept character types regardless of case", () => {
		expect(isTextualType("Character Varying")).toBe(true)
		expect(isTextualType("integer")).toBe(false)
	})
})

describe("buildValueCatalog", () => {
	it("should return distinct non-null values in code-unit order", async () => {
		const client = await new FakePool([catalogHandler(ns, [products])]).connect()
		const values = await buildValueCatalog(client, ns, "products", "brand", "text", 50, silentLogger)
		expect(values).toEqual(["Adidas", "Nike", "asics"])
	})

	it("should query with quoted identifiers and a cap-plus-one limit", async () => {
		const pool = new FakePool([catalogHandler(ns, [products])])
		const client = await pool.connect()
		await buildValueCatalog(client, ns, "products", "brand", "text", 50, silentLogger)
		expect(pool.queries).toEqual([
			"SAVEPOINT value_catalog",
			'SELECT DISTINCT "brand"::text AS value FROM "proj_alice_sales"."products" WHERE "brand" IS NOT NULL LIMIT 51',
			"RELEASE SAVEPOINT value_catalog",
		])
	})

	it("should skip non-text columns without querying", async () => {
		const pool = new FakePool([catalogHandler(ns, [products])])
		const client = await pool.connect()
		expect(await buildValueCatalog(client, ns, "products", "price", "numeric", 50, silentLogger)).toEqual([])
		expect(pool.queries).toEqual([])
	})

	it("should keep a column with exactly cap values", async () => {
		const client = await new FakePool([catalogHandler(ns, [products])]).connect()
		expect(await buildValueCatalog(client, ns, "products", "brand", "text", 3, silentLogger)).toEqual([
			"Adidas",
			"Nike",
			"asics",
		])
	})

	it("should leave a column over the cap unconstrained", async () => {
		const client = await new FakePool([catalogHandler(ns, [products])]).connect()
		expect(await buildValueCatalog(client, ns, "products", "brand", "text", 2, silentLogger)).toEqual([])
	})

	it("should return [] and roll back to the savepoint when the query times out", async () => {
		const pool = new FakePool([
			(text) => {
				if (text.startsWith("SELECT DISTINCT")) throw pgError("57014")
				return undefined
			},
		])
		const client = await pool.connect()
		expect(await buildValueCatalog(client, ns, "products", "brand", "text", 50, silentLogger)).toEqual([])
		expect(pool.queries[pool.queries.length - 1]).toBe("ROLLBACK TO SAVEPOINT value_catalog")
	})

	it("should ignore rows without a string value", async () => {
		const client = await new FakePool([() => queryResult([{ value: "b" }, { value: null }, { value: "a" }])]).connect()
		expect(await buildValueCatalog(client, ns, "t", "c", "varchar", 50, silentLogger)).toEqual(["a", "b"])
	})
})
