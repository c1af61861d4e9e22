/**
 * Unified config loader.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml > schema defaults
 *
 * The merged tree is validated with zod so every consumer gets a fully
 * populated, typed config even when no YAML file is found.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"

// ── Schema ───────────────────────────────────────────────────────────

const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const

export const configSchema = z.object({
	database: z
		.object({
			url: z.string().optional(),
			host: z.string().default("localhost"),
			port: z.number().int().positive().default(5432),
			name: z.string().default("postgres"),
			user: z.string().default("postgres"),
			password: z.string().default(""),
			pool_max: z.number().int().positive().default(10),
			statement_timeout_ms: z.number().int().positive().default(15000),
			connect_timeout_ms: z.number().int().positive().default(10000),
		})
		.default({}),
	completion: z
		.object({
			base_url: z.string().default("https://api.groq.com/openai/v1"),
			api_key: z.string().default(""),
			model: z.string().default("llama-3.3-70b-versatile"),
			timeout_ms: z.number().int().positive().default(30000),
			temperature: z.number().min(0).max(2).default(0.1),
			max_tokens: z.number().int().positive().default(500),
			answer_temperature: z.number().min(0).max(2).default(0.3),
			answer_max_tokens: z.number().int().positive().default(400),
		})
		.default({}),
	schema: z
		.object({
			max_unique_values: z.number().int().positive().default(20),
			excluded_tables: z.array(z.string()).default(["chat_history"]),
			query_timeout_ms: z.number().int().positive().default(5000),
		})
		.default({}),
	context: z
		.object({
			store: z.enum(["postgres", "memory"]).default("postgres"),
			history_limit: z.number().int().positive().default(5),
			summary_threshold: z.number().int().positive().default(400),
			summary_length: z.number().int().positive().default(200),
			token_budget: z.number().int().positive().default(1200),
		})
		.default({}),
	correction: z
		.object({
			enabled: z.boolean().default(true),
		})
		.default({}),
	answer: z
		.object({
			max_rows_in_prompt: z.number().int().positive().default(10),
			large_result_threshold: z.number().int().positive().default(20),
			max_value_length: z.number().int().positive().default(100),
			show_sql: z.boolean().default(false),
		})
		.default({}),
	namespace: z
		.object({
			prefix: z.string().regex(/^[a-z][a-z0-9_]*$/).default("proj_"),
			max_length: z.number().int().positive().default(63),
		})
		.default({}),
	logging: z
		.object({
			level: z.enum(LOG_LEVELS).default("info"),
		})
		.default({}),
})

export type ScopedSQLConfig = z.infer<typeof configSchema>
export type LogLevel = ScopedSQLConfig["logging"]["level"]

type ConfigTree = { [key: string]: unknown }

// ── YAML Loading ─────────────────────────────────────────────────────

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function isTree(value: unknown): value is ConfigTree {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function loadYaml(filePath: string): ConfigTree {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed: unknown = yaml.load(raw)
	return isTree(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: ConfigTree, b: ConfigTree): ConfigTree {
	const result: ConfigTree = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isTree(right) && isTree(left)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set. */
function env(name: string): string | undefined {
	return process.env[name]
}
function envBool(name: string): boolean | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v === "true" || v === "1"
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}

function section(cfg: ConfigTree, key: string): ConfigTree {
	const existing = cfg[key]
	if (isTree(existing)) return existing
	const created: ConfigTree = {}
	cfg[key] = created
	return created
}

/** Apply env-var overrides on top of merged YAML. Unset variables leave the YAML value alone. */
function applyEnvOverrides(cfg: ConfigTree): void {
	const db = section(cfg, "database")
	db.url = env("DATABASE_URL") ?? db.url
	db.host = env("DB_HOST") ?? db.host
	db.port = envInt("DB_PORT") ?? db.port
	db.name = env("DB_NAME") ?? db.name
	db.user = env("DB_USER") ?? db.user
	db.password = env("DB_PASSWORD") ?? db.password
	db.pool_max = envInt("DB_POOL_MAX") ?? db.pool_max
	db.statement_timeout_ms = envInt("DB_STATEMENT_TIMEOUT_MS") ?? db.statement_timeout_ms
	db.connect_timeout_ms = envInt("DB_CONNECT_TIMEOUT_MS") ?? db.connect_timeout_ms

	const c = section(cfg, "completion")
	c.base_url = env("COMPLETION_BASE_URL") ?? c.base_url
	c.api_key = env("COMPLETION_API_KEY") ?? c.api_key
	c.model = env("COMPLETION_MODEL") ?? c.model
	c.timeout_ms = envInt("COMPLETION_TIMEOUT_MS") ?? c.timeout_ms
	c.temperature = envFloat("TEMPERATURE") ?? c.temperature

	const s = section(cfg, "schema")
	s.max_unique_values = envInt("SCHEMA_MAX_UNIQUE_VALUES") ?? s.max_unique_values
	s.query_timeout_ms = envInt("SCHEMA_QUERY_TIMEOUT_MS") ?? s.query_timeout_ms

	const ctx = section(cfg, "context")
	ctx.store = env("CHAT_HISTORY_STORE") ?? ctx.store
	ctx.history_limit = envInt("CHAT_HISTORY_LIMIT") ?? ctx.history_limit

	const corr = section(cfg, "correction")
	corr.enabled = envBool("CORRECTION_ENABLED") ?? corr.enabled

	const a = section(cfg, "answer")
	a.show_sql = envBool("SHOW_SQL") ?? a.show_sql

	const l = section(cfg, "logging")
	const level = env("LOG_LEVEL")
	l.level = level !== undefined ? level.toLowerCase() : l.level
}

/** Drop keys whose value is undefined so zod defaults apply to them. */
function pruneUndefined(tree: ConfigTree): ConfigTree {
	const result: ConfigTree = {}
	for (const [key, value] of Object.entries(tree)) {
		if (value === undefined) continue
		result[key] = isTree(value) ? pruneUndefined(value) : value
	}
	return result
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: ScopedSQLConfig | null = null

export function loadConfig(): ScopedSQLConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: ConfigTree = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)
	_config = configSchema.parse(pruneUndefined(merged))
	return _config
}

export function getConfig(): ScopedSQLConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
