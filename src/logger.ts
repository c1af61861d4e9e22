/**
 * Structured logger passed to every pipeline component through its context.
 *
 * Writes to stderr: stdout is reserved for the MCP protocol.
 */

import type { LogLevel } from "./config/loadConfig.js"

export type LogData = Record<string, unknown>

export interface Logger {
	debug(message: string, data?: LogData): void
	info(message: string, data?: LogData): void
	warn(message: string, data?: LogData): void
	error(message: string, data?: LogData): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
}

type Sink = (line: string) => void

const stderrSink: Sink = (line) => {
	process.stderr.write(line + "\n")
}

function serialize(data: LogData | undefined): string {
	if (!data) return ""
	try {
		return " " + JSON.stringify(data)
	} catch {
		return " [unserializable log data]"
	}
}

export function createLogger(level: LogLevel = "info", sink: Sink = stderrSink): Logger {
	const threshold = LEVEL_ORDER[level]

	const write = (lvl: Exclude<LogLevel, "silent">, message: string, data?: LogData) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		sink(`[${lvl.toUpperCase()}] ${message}${serialize(data)}`)
	}

	return {
		debug: (message, data) => write("debug", message, data),
		info: (message, data) => write("info", message, data),
		warn: (message, data) => write("warn", message, data),
		error: (message, data) => write("error", message, data),
	}
}

/** Hide the password part of a connection string before it reaches a log line. */
export function redactConnectionString(connectionString: string): string {
	return connectionString.replace(/:[^:@/]+@/, ":***@")
}
