/**
 * Ask one question against a live database and print the batch response.
 *
 * Usage:
 *   npx tsx scripts/ask_once.ts <owner_id> <project_name> "<question>" [--sql]
 */

import { AnswerFormatter } from "../src/answer_formatter.js"
import { HttpCompletionClient } from "../src/completion_client.js"
import { loadConfig } from "../src/config/loadConfig.js"
import { InMemoryConversationStore } from "../src/conversation_context.js"
import { createPool, describeDatabase } from "../src/db.js"
import { createLogger } from "../src/logger.js"
import { resolveNamespace } from "../src/namespace.js"
import { askQuestions } from "../src/pipeline.js"
import { QueryGenerator } from "../src/query_generator.js"

async function main() {
	const args = process.argv.slice(2)
	const showSql = args.includes("--sql")
	const [ownerId, projectName, question] = args.filter((a) => a !== "--sql")
	if (!ownerId || !projectName || !question) {
		console.error('Usage: scripts/ask_once.ts <owner_id> <project_name> "<question>" [--sql]')
		process.exit(1)
	}

	const config = loadConfig()
	const logger = createLogger(config.logging.level === "info" ? "debug" : config.logging.level)
	const pool = createPool(config)
	const completion = new HttpCompletionClient(config.completion, logger)

	console.log("Database:", describeDatabase(config))

	try {
		const namespace = resolveNamespace(ownerId, projectName, config.namespace)
		const result = await askQuestions(
			{ namespace, text: question, session_id: "ask-once", show_sql: showSql },
			{
				pool,
				// Keep one-off questions out of the project's stored history
				store: new InMemoryConversationStore(),
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
			},
		)

		console.log("\n=== RESULT ===")
		for (const answer of result.answers) {
			console.log(`Q: ${answer.question}`)
			console.log(`Outcome: ${answer.outcome} (attempts: ${answer.attempts}, correction: ${answer.correction_used})`)
			if (answer.sql) console.log("SQL:", answer.sql)
			console.log(answer.answer)
			console.log("")
		}
	} finally {
		await pool.end()
	}
}

main().catch((error) => {
	console.error(error)
	process.exit(1)
})
