/**
 * Question Splitter
 *
 * Segments raw user input into discrete questions. A fragment is a run of
 * text up to a question mark or newline; its trailing question marks are
 * kept so splitting an already-split question returns it unchanged.
 */

const FRAGMENT = /[^?\n]+\?*/g

export function* splitQuestions(text: string): Generator<string> {
	for (const match of text.matchAll(FRAGMENT)) {
		const question = match[0].trim()
		// A fragment of only whitespace before its "?" is not a question
		if (question.replace(/\?+$/, "").trim() === "") continue
		yield question
	}
}
