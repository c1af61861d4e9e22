#!/usr/bin/env node
/**
 * Stdio entry point for the MCP server
 *
 * Config comes from config/config.yaml, config/config.local.yaml and
 * environment variables (see src/config/loadConfig.ts).
 *
 * Usage:
 *   DATABASE_URL=postgresql://... COMPLETION_API_KEY=... node dist/src/stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import type { Pool } from "pg"
import { HttpCompletionClient } from "./completion_client.js"
import { loadConfig, type ScopedSQLConfig } from "./config/loadConfig.js"
import { AnswerFormatter } from "./answer_formatter.js"
import { InMemoryConversationStore, PgConversationStore, type ConversationStore } from "./conversation_context.js"
import { createPool, describeDatabase } from "./db.js"
import { createLogger, type Logger } from "./logger.js"
import { QueryGenerator } from "./query_generator.js"
import { createServer } from "./server.js"

function createStore(config: ScopedSQLConfig, pool: Pool, logger: Logger): ConversationStore {
	return config.context.store === "memory" ? new InMemoryConversationStore() : new PgConversationStore(pool, logger)
}

async function main() {
	const config = loadConfig()
	const logger = createLogger(config.logging.level)

	if (!config.completion.api_key) {
		logger.warn("No completion API key configured (COMPLETION_API_KEY); requests may be rejected")
	}

	logger.info("Starting MCP server with stdio transport")
	logger.info(`Database: ${describeDatabase(config)}`)

	const pool = createPool(config)
	pool.on("error", (err) => {
		logger.error("Idle database client error", { error: err.message })
	})

	const completion = new HttpCompletionClient(config.completion, logger)
	const server = createServer({
		pool,
		store: createStore(config, pool, logger),
		generator: new QueryGenerator(
			completion,
			{ temperature: config.completion.temperature, max_tokens: config.completion.max_tokens },
			logger,
		),
		formatter: new AnswerFormatter(
			completion,
			{
				...config.answer,
				temperature: config.completion.answer_temperature,
				max_tokens: config.completion.answer_max_tokens,
			},
			logger,
		),
		config,
		logger,
	})

	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("MCP server running via stdio")

	const shutdown = async () => {
		logger.info("Shutting down...")
		await server.close()
		await pool.end()
		process.exit(0)
	}
	process.on("SIGINT", () => {
		shutdown().catch((error) => {
			logger.error("Shutdown failed", { error: String(error) })
			process.exit(1)
		})
	})
	process.on("SIGTERM", () => {
		shutdown().catch((error) => {
			logger.error("Shutdown failed", { error: String(error) })
			process.exit(1)
		})
	})
}

main().catch((error) => {
	process.stderr.write(`[ERROR] Fatal error: ${error instanceof Error ? error.message : String(error)}\n`)
	process.exit(1)
})
