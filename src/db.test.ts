import { describe, it, expect } from "vitest"
import { configSchema } from "./config/loadConfig.js"
import { describeDatabase, poolConfig, readOnlyTransaction, withClient } from "./db.js"
import { toNamespaceId } from "./namespace.js"
import { FakePool, pgError, queryResult } from "./test_support.js"

describe("withClient", () => {
	it("should release the client after success", async () => {
		const pool = new FakePool([() => queryResult([{ n: 1 }])])
		const rows = await withClient(pool, async (client) => (await client.query("SELECT 1 AS n")).rows)
		expect(rows).toEqual([{ n: 1 }])
		expect(pool.released).toBe(1)
	})

	it("should release the client when the callback throws", async () => {
		const pool = new FakePool([])
		await expect(
			withClient(pool, async () => {
				throw new Error("boom")
			}),
		).rejects.toThrow("boom")
		expect(pool.released).toBe(1)
		expect(pool.releasedWithError).toEqual([])
	})

	it("should pass the discard reason to release", async () => {
		const pool = new FakePool([])
		const broken = new Error("connection lost")
		await withClient(pool, async (client) => client.discard(broken))
		expect(pool.releasedWithError).toEqual([broken])
	})
})

describe("readOnlyTransaction", () => {
	const ns = toNamespaceId("proj_alice_sales", { prefix: "proj_", max_length: 63 })

	it("should bound every statement and commit", async () => {
		const pool = new FakePool([(text) => (text === "SELECT 1" ? queryResult([{ n: 1 }]) : undefined)])
		await withClient(pool, (client) =>
			readOnlyTransaction(client, { timeoutMs: 2000.7, searchPath: ns }, (tx) => tx.query("SELECT 1")),
		)
		expect(pool.queries).toEqual([
			"BEGIN READ ONLY",
			"SET LOCAL statement_timeout = 2000",
			'SET LOCAL search_path TO "proj_alice_sales"',
			"SELECT 1",
			"COMMIT",
		])
	})

	it("should roll back and rethrow", async () => {
		const pool = new FakePool([])
		await expect(
			withClient(pool, (client) => readOnlyTransaction(client, { timeoutMs: 100 }, (tx) => tx.query("SELECT 1"))),
		).rejects.toThrow("unexpected query: SELECT 1")
		expect(pool.queries).toEqual(["BEGIN READ ONLY", "SET LOCAL statement_timeout = 100", "SELECT 1", "ROLLBACK"])
		expect(pool.releasedWithError).toEqual([])
	})

	it("should discard the connection when the rollback fails", async () => {
		const rollbackError = pgError("08006")
		const pool = new FakePool([
			(text) => {
				if (text === "ROLLBACK") throw rollbackError
				return undefined
			},
		])
		await expect(
			withClient(pool, (client) => readOnlyTransaction(client, { timeoutMs: 100 }, (tx) => tx.query("SELECT 1"))),
		).rejects.toThrow("unexpected query: SELECT 1")
		expect(pool.releasedWithError).toEqual([rollbackError])
	})
})

describe("poolConfig", () => {
	it("should bound how long connect() waits", () => {
		const config = configSchema.parse({
			database: { url: "postgresql://app:test-secret@db:5432/sales", pool_max: 4, connect_timeout_ms: 2500 },
		})
		expect(poolConfig(config)).toEqual({
			max: 4,
			connectionTimeoutMillis: 2500,
			application_name: "scopedsql",
			connectionString: "postgresql://app:test-secret@db:5432/sales",
		})
	})

	it("should default the connect timeout", () => {
		expect(poolConfig(configSchema.parse({})).connectionTimeoutMillis).toBe(10000)
	})
})

describe("describeDatabase", () => {
	it("should redact the password of a connection URL", () => {
		const config = configSchema.parse({ database: { url: "postgresql://app:test-secret@db:5432/sales" } })
		expect(describeDatabase(config)).toBe("postgresql://app:***@db:5432/sales")
	})

	it("should describe discrete settings without the password", () => {
		const config = configSchema.parse({ database: { host: "db", port: 5433, name: "sales", user: "app", password: "test-secret" } })
		expect(describeDatabase(config)).toBe("app@db:5433/sales")
	})
})
