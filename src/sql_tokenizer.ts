/**
 * SQL Tokenizer
 *
 * State-machine lexer for PostgreSQL text. Handles:
 * - Strings ('...' with '' escaping, E'...' with backslash escaping)
 * - Dollar-quoted strings ($tag$...$tag$)
 * - Quoted identifiers ("..." with "" escaping)
 * - Line comments and nested block comments
 *
 * Tokens keep their offsets into the original text so callers can rewrite
 * the statement in place. Not a parser: table references are found by
 * pattern over the token stream.
 */

export enum TokenType {
	WORD = "WORD",
	QUOTED_IDENT = "QUOTED_IDENT",
	STRING = "STRING",
	DOLLAR_STRING = "DOLLAR_STRING",
	NUMBER = "NUMBER",
	PARAM = "PARAM",
	PUNCT = "PUNCT",
	OPERATOR = "OPERATOR",
	LINE_COMMENT = "LINE_COMMENT",
	BLOCK_COMMENT = "BLOCK_COMMENT",
	OTHER = "OTHER",
}

export interface Token {
	type: TokenType
	value: string
	start: number
	end: number
}

const WORD_START = /[A-Za-z_\u0080-\uffff]/
const WORD_RE = /[A-Za-z_\u0080-\uffff][A-Za-z0-9_$\u0080-\uffff]*/y
const NUMBER_RE = /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y
const DOLLAR_TAG_RE = /\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/y
const PARAM_RE = /\$\d+/y
const OPERATOR_CHARS = "+-*/<>=~!@#%^&|`?:"
const PUNCT_CHARS = "(),;.[]"

function matchAt(re: RegExp, sql: string, i: number): string | null {
	re.lastIndex = i
	const m = re.exec(sql)
	return m ? m[0] : null
}

/** Scan a quoted run starting at `i` (the opening quote). Returns the end offset. */
function scanQuoted(sql: string, i: number, quote: string, backslashEscapes: boolean): number {
	const len = sql.length
	i++
	while (i < len) {
		const char = sql[i]
		if (backslashEscapes && char === "\\") {
			i += 2
			continue
		}
		if (char === quote) {
			// Doubled quote is an escaped quote
			if (i + 1 < len && sql[i + 1] === quote) {
				i += 2
				continue
			}
			return i + 1
		}
		i++
	}
	return len
}

/**
 * Tokenize SQL. Whitespace produces no token; unterminated strings and
 * comments run to the end of the text.
 */
export function tokenizeSQL(sql: string): Token[] {
	const tokens: Token[] = []
	const len = sql.length
	let i = 0

	const push = (type: TokenType, start: number, end: number) => {
		tokens.push({ type, value: sql.substring(start, end), start, end })
	}

	while (i < len) {
		const char = sql[i]
		const next = i + 1 < len ? sql[i + 1] : ""

		if (/\s/.test(char)) {
			i++
			continue
		}

		// Line comment: -- ...
		if (char === "-" && next === "-") {
			const start = i
			while (i < len && sql[i] !== "\n") i++
			push(TokenType.LINE_COMMENT, start, i)
			continue
		}

		// Block comment: /* ... */ (nests in PostgreSQL)
		if (char === "/" && next === "*") {
			const start = i
			let depth = 0
			while (i < len) {
				if (sql[i] === "/" && sql[i + 1] === "*") {
					depth++
					i += 2
				} else if (sql[i] === "*" && sql[i + 1] === "/") {
					depth--
					i += 2
					if (depth === 0) break
				} else {
					i++
				}
			}
			push(TokenType.BLOCK_COMMENT, start, i)
			continue
		}

		if (char === "'") {
			const start = i
			i = scanQuoted(sql, i, "'", false)
			push(TokenType.STRING, start, i)
			continue
		}

		if (char === '"') {
			const start = i
			i = scanQuoted(sql, i, '"', false)
			push(TokenType.QUOTED_IDENT, start, i)
			continue
		}

		if (char === "$") {
			const param = matchAt(PARAM_RE, sql, i)
			if (param) {
				push(TokenType.PARAM, i, i + param.length)
				i += param.length
				continue
			}
			const tag = matchAt(DOLLAR_TAG_RE, sql, i)
			if (tag) {
				const start = i
				const close = sql.indexOf(tag, i + tag.length)
				i = close === -1 ? len : close + tag.length
				push(TokenType.DOLLAR_STRING, start, i)
				continue
			}
		}

		if (WORD_START.test(char)) {
			// E'...' escape string
			if ((char === "E" || char === "e") && next === "'") {
				const start = i
				i = scanQuoted(sql, i + 1, "'", true)
				push(TokenType.STRING, start, i)
				continue
			}
			const word = matchAt(WORD_RE, sql, i)
			if (word) {
				push(TokenType.WORD, i, i + word.length)
				i += word.length
				continue
			}
		}

		const number = matchAt(NUMBER_RE, sql, i)
		if (number) {
			push(TokenType.NUMBER, i, i + number.length)
			i += number.length
			continue
		}

		if (PUNCT_CHARS.includes(char)) {
			push(TokenType.PUNCT, i, i + 1)
			i++
			continue
		}

		if (OPERATOR_CHARS.includes(char)) {
			const start = i
			while (i < len && OPERATOR_CHARS.includes(sql[i])) {
				// An operator never swallows the start of a comment
				if (i > start && ((sql[i] === "-" && sql[i + 1] === "-") || (sql[i] === "/" && sql[i + 1] === "*"))) {
					break
				}
				i++
			}
			push(TokenType.OPERATOR, start, i)
			continue
		}

		push(TokenType.OTHER, i, i + 1)
		i++
	}

	return tokens
}

/**
 * Tokens outside comments
 */
export function significantTokens(tokens: Token[]): Token[] {
	return tokens.filter((t) => t.type !== TokenType.LINE_COMMENT && t.type !== TokenType.BLOCK_COMMENT)
}

export function isWord(token: Token | undefined, word?: string): boolean {
	if (!token || token.type !== TokenType.WORD) return false
	return word === undefined || token.value.toLowerCase() === word
}

export function isPunct(token: Token | undefined, char: string): boolean {
	return token !== undefined && token.type === TokenType.PUNCT && token.value === char
}

export function isIdentifier(token: Token | undefined): token is Token {
	return token !== undefined && (token.type === TokenType.WORD || token.type === TokenType.QUOTED_IDENT)
}

/**
 * Resolved identifier name: unquoted names fold to lower case, quoted names
 * keep their case with "" unescaped.
 */
export function identifierName(token: Token): string {
	if (token.type === TokenType.QUOTED_IDENT) {
		return token.value.slice(1, -1).replace(/""/g, '"')
	}
	return token.value.toLowerCase()
}

/**
 * Content of a string literal token ('' and \' unescaped for E'' strings).
 */
export function stringLiteralValue(token: Token): string {
	if (token.type === TokenType.DOLLAR_STRING) {
		const tag = token.value.slice(0, token.value.indexOf("$", 1) + 1)
		return token.value.slice(tag.length, token.value.length - tag.length)
	}
	if (token.value.startsWith("E") || token.value.startsWith("e")) {
		return token.value.slice(2, -1).replace(/''/g, "'").replace(/\\(.)/g, "$1")
	}
	return token.value.slice(1, -1).replace(/''/g, "'")
}

// ============================================================================
// Table references
// ============================================================================

export interface TableReference {
	schema: string | null
	table: string
	/** Offset of the first character of the reference in the original text */
	start: number
	end: number
}

/** Words that end a FROM item instead of naming its alias */
const CLAUSE_WORDS = new Set([
	"where", "join", "inner", "left", "right", "full", "cross", "natural", "on", "using",
	"group", "order", "limit", "offset", "fetch", "having", "window", "union", "except",
	"intersect", "for", "lateral", "tablesample",
])

/** Functions whose argument syntax contains FROM, e.g. EXTRACT(YEAR FROM x) */
const FROM_SYNTAX_FUNCTIONS = new Set(["extract", "substring", "trim", "overlay"])

/** Words that open a query, not a parenthesized join, after "(" */
const QUERY_WORDS = new Set(["select", "values", "table", "with"])

interface Group {
	/** Word immediately before the "(", lower-cased */
	opener: string | null
}

interface RelationScan {
	refs: TableReference[]
	/** Aliases given to FROM items (tables, subqueries, function calls) */
	aliases: Set<string>
}

/**
 * Parse one (possibly schema-qualified) name starting at index `i`.
 * Returns the reference and the index after it, or null.
 */
function readQualifiedName(
	tokens: Token[],
	i: number,
): { ref: TableReference; next: number } | null {
	const first = tokens[i]
	if (!isIdentifier(first)) return null
	if (isPunct(tokens[i + 1], ".") && isIdentifier(tokens[i + 2])) {
		const second = tokens[i + 2]
		return {
			ref: { schema: identifierName(first), table: identifierName(second), start: first.start, end: second.end },
			next: i + 3,
		}
	}
	return {
		ref: { schema: null, table: identifierName(first), start: first.start, end: first.end },
		next: i + 1,
	}
}

/** Index after the ")" matching the "(" at `i` */
function skipParens(tokens: Token[], i: number): number {
	let depth = 0
	for (let j = i; j < tokens.length; j++) {
		if (isPunct(tokens[j], "(")) depth++
		else if (isPunct(tokens[j], ")")) {
			depth--
			if (depth === 0) return j + 1
		}
	}
	return tokens.length
}

/**
 * Read one FROM item at `j`: a table, a function call, a subquery or a
 * parenthesized join, then its alias and column alias list. Returns the
 * index after the item.
 */
function readFromItem(tokens: Token[], j: number, scan: RelationScan): number {
	if (isWord(tokens[j], "only")) j++
	if (isWord(tokens[j], "lateral")) j++

	if (isPunct(tokens[j], "(")) {
		const inner = tokens[j + 1]
		// (a JOIN b): the first member has no FROM or JOIN in front of it
		if (!(inner && inner.type === TokenType.WORD && QUERY_WORDS.has(inner.value.toLowerCase()))) {
			readFromItem(tokens, j + 1, scan)
		}
		j = skipParens(tokens, j)
	} else {
		const parsed = readQualifiedName(tokens, j)
		if (!parsed) return j
		j = parsed.next
		// name( is a set-returning function call, not a table
		if (isPunct(tokens[j], "(")) j = skipParens(tokens, j)
		else scan.refs.push(parsed.ref)
	}

	if (isWord(tokens[j], "as")) j++
	const alias = tokens[j]
	if (isIdentifier(alias) && !(alias.type === TokenType.WORD && CLAUSE_WORDS.has(alias.value.toLowerCase()))) {
		scan.aliases.add(identifierName(alias))
		j++
		// p(a, b)
		if (isPunct(tokens[j], "(")) j = skipParens(tokens, j)
	}
	return j
}

function scanRelations(tokens: Token[]): RelationScan {
	const scan: RelationScan = { refs: [], aliases: new Set() }
	const stack: Group[] = []

	for (let i = 0; i < tokens.length; i++) {
		const token = tokens[i]

		if (isPunct(token, "(")) {
			const prev = tokens[i - 1]
			stack.push({ opener: prev && prev.type === TokenType.WORD ? prev.value.toLowerCase() : null })
			continue
		}
		if (isPunct(token, ")")) {
			stack.pop()
			continue
		}

		// TABLE name, short for SELECT * FROM name (t.table is a column)
		if (isWord(token, "table") && !isPunct(tokens[i - 1], ".")) {
			const parsed = readQualifiedName(tokens, i + 1)
			if (parsed && !isPunct(tokens[parsed.next], "(")) scan.refs.push(parsed.ref)
			continue
		}

		if (isWord(token, "join")) {
			readFromItem(tokens, i + 1, scan)
			continue
		}
		if (!isWord(token, "from")) continue

		const group = stack[stack.length - 1]
		if (group && group.opener !== null && FROM_SYNTAX_FUNCTIONS.has(group.opener)) continue
		if (isWord(tokens[i - 1], "distinct") && (isWord(tokens[i - 2], "is") || isWord(tokens[i - 2], "not"))) {
			continue
		}

		let j = readFromItem(tokens, i + 1, scan)
		while (isPunct(tokens[j], ",")) {
			j = readFromItem(tokens, j + 1, scan)
		}
	}

	// Items after a subquery are read before the subquery's own FROM
	scan.refs.sort((a, b) => a.start - b.start)
	return scan
}

/**
 * Extract table references from FROM, JOIN and TABLE clauses (best-effort,
 * not a full parser), in text order. FROM inside function syntax such as
 * EXTRACT(YEAR FROM x) and IS DISTINCT FROM is ignored; comma lists,
 * column alias lists, subqueries and parenthesized joins are followed;
 * function calls in FROM position are skipped.
 */
export function extractTableReferences(sql: string): TableReference[] {
	return scanRelations(significantTokens(tokenizeSQL(sql))).refs
}

/**
 * Every schema named anywhere in the statement: qualified table references,
 * three-part column references (schema.table.column), qualified function
 * calls (schema.fn(...)) and any other two-part name whose head is not a
 * table or alias of this statement.
 */
export function extractSchemaQualifiers(sql: string): string[] {
	const tokens = significantTokens(tokenizeSQL(sql))
	const { refs, aliases } = scanRelations(tokens)

	const schemas = new Set<string>()
	const relations = new Set(aliases)
	for (const ref of refs) {
		if (ref.schema !== null) schemas.add(ref.schema)
		relations.add(ref.table)
	}

	for (let i = 0; i + 2 < tokens.length; i++) {
		const first = tokens[i]
		if (!isIdentifier(first) || !isPunct(tokens[i + 1], ".") || !isIdentifier(tokens[i + 2])) continue
		// Skip the tail of a longer chain already seen from its head
		if (isPunct(tokens[i - 1], ".")) continue

		const head = identifierName(first)
		const threePart = isPunct(tokens[i + 3], ".") && isIdentifier(tokens[i + 4])
		const qualifiedCall = isPunct(tokens[i + 3], "(")
		if (threePart || qualifiedCall || !relations.has(head)) schemas.add(head)
	}

	return Array.from(schemas)
}
