/**
 * MCP server
 *
 * Tools:
 * - ask: answer one or more natural-language questions about a project
 * - describe_schema: the schema text the generator sees, with a summary
 * - clear_history: drop a session's conversation log
 *
 * Tool cancellation (extra.signal) is passed through to the pipeline.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { z } from "zod"
import { PipelineError } from "./config.js"
import { withClient } from "./db.js"
import { namespaceExists, resolveNamespace, type NamespaceId } from "./namespace.js"
import { askQuestions, clearHistory, describeSchema, type BatchResponse, type PipelineContext } from "./pipeline.js"

export const SERVER_NAME = "scopedsql"
export const SERVER_VERSION = "0.1.0"

export type ServerContext = Omit<PipelineContext, "signal">

interface ToolResult {
	[key: string]: unknown
	content: Array<{ type: "text"; text: string }>
	isError?: boolean
}

function textResult(text: string, isError = false): ToolResult {
	return isError ? { content: [{ type: "text", text }], isError } : { content: [{ type: "text", text }] }
}

/**
 * Caller-facing message for an error raised outside the pipeline's own
 * outcome handling. PipelineError messages are written for users; anything
 * else is hidden.
 */
export function toolErrorMessage(error: unknown): string {
	if (error instanceof PipelineError) {
		if (error.type === "cancelled") return "Request cancelled."
		return error.message
	}
	return "The request failed unexpectedly. Please try again."
}

export function renderBatch(batch: BatchResponse): string {
	if (batch.answers.length === 0) {
		return batch.cancelled ? "Request cancelled." : "Please enter a question."
	}

	const multiple = batch.answers.length > 1
	const sections = batch.answers.map((a, i) => {
		const parts: string[] = []
		if (multiple) parts.push(`Q${i + 1}: ${a.question}`)
		parts.push(a.answer)
		if (a.sql) parts.push("SQL:\n```sql\n" + a.sql + "\n```")
		return parts.join("\n\n")
	})
	if (batch.cancelled) sections.push("(Request cancelled; remaining questions were not answered.)")
	return sections.join("\n\n---\n\n")
}

const projectShape = {
	owner_id: z.string().min(1).describe("Owner of the project"),
	project_name: z.string().min(1).describe("Project whose tables are queried"),
}

export function createServer(ctx: ServerContext): McpServer {
	const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })

	const resolve = async (ownerId: string, projectName: string): Promise<NamespaceId> => {
		const namespace = resolveNamespace(ownerId, projectName, ctx.config.namespace)
		const exists = await withClient(ctx.pool, (client) => namespaceExists(client, namespace))
		if (!exists) {
			throw new PipelineError("validation", `Project "${projectName}" was not found for this owner.`, false, {
				namespace,
			})
		}
		return namespace
	}

	server.tool(
		"ask",
		"Answer natural-language questions about a project's data. Several questions can be asked at once, separated by question marks or new lines.",
		{
			...projectShape,
			question: z.string().describe("One or more questions"),
			session_id: z.string().optional().describe("Conversation session (default: \"default\")"),
			show_sql: z.boolean().optional().describe("Include the SQL that produced each answer"),
		},
		async (args, extra) => {
			try {
				const namespace = await resolve(args.owner_id, args.project_name)
				const batch = await askQuestions(
					{ namespace, text: args.question, session_id: args.session_id, show_sql: args.show_sql },
					{ ...ctx, signal: extra.signal },
				)
				return textResult(renderBatch(batch))
			} catch (error) {
				ctx.logger.warn("ask failed", { error_type: error instanceof PipelineError ? error.type : "unknown" })
				return textResult(toolErrorMessage(error), true)
			}
		},
	)

	server.tool(
		"describe_schema",
		"Show the tables, columns and enumerated column values of a project.",
		projectShape,
		async (args, extra) => {
			try {
				const namespace = await resolve(args.owner_id, args.project_name)
				const description = await describeSchema(namespace, { ...ctx, signal: extra.signal })
				const { summary } = description
				return textResult(
					`${description.text}\n\nTables: ${summary.total_tables}, columns: ${summary.total_columns}, columns with enumerated values: ${summary.constrained_columns}`,
				)
			} catch (error) {
				ctx.logger.warn("describe_schema failed", { error_type: error instanceof PipelineError ? error.type : "unknown" })
				return textResult(toolErrorMessage(error), true)
			}
		},
	)

	server.tool(
		"clear_history",
		"Clear the conversation history of a project session.",
		{
			...projectShape,
			session_id: z.string().optional().describe("Conversation session (default: \"default\")"),
		},
		async (args) => {
			try {
				const namespace = await resolve(args.owner_id, args.project_name)
				const removed = await clearHistory(namespace, args.session_id, ctx)
				return textResult(`Cleared ${removed} ${removed === 1 ? "message" : "messages"}.`)
			} catch (error) {
				ctx.logger.warn("clear_history failed", { error_type: error instanceof PipelineError ? error.type : "unknown" })
				return textResult(toolErrorMessage(error), true)
			}
		},
	)

	return server
}
