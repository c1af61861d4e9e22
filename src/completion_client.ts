/**
 * Completion Service HTTP Client
 *
 * Talks to an OpenAI-compatible chat-completions endpoint. Used for SQL
 * generation and answer formatting.
 *
 * Every call is bounded by a timeout and follows the caller's AbortSignal.
 * Failures surface as PipelineError:
 * - timeout: the call ran past timeout_ms
 * - cancelled: the caller aborted
 * - generation: network, HTTP or response-shape failure
 */

import { z } from "zod"
import { PipelineError } from "./config.js"
import type { Logger } from "./logger.js"

export interface CompletionRequest {
	system: string
	user: string
	temperature: number
	max_tokens: number
}

export interface CompletionClient {
	complete(request: CompletionRequest, signal?: AbortSignal): Promise<string>
}

export interface HttpCompletionOptions {
	base_url: string
	api_key: string
	model: string
	timeout_ms: number
}

const chatResponseSchema = z.object({
	choices: z
		.array(
			z.object({
				message: z.object({
					content: z.string().nullable(),
				}),
			}),
		)
		.min(1),
})

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>

export class HttpCompletionClient implements CompletionClient {
	private url: string

	constructor(
		private options: HttpCompletionOptions,
		private logger: Logger,
		private fetchImpl: FetchLike = fetch,
	) {
		this.url = `${options.base_url.replace(/\/+$/, "")}/chat/completions`
	}

	async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
		if (signal?.aborted) {
			throw new PipelineError("cancelled", "Completion request cancelled")
		}

		const startTime = Date.now()
		const controller = new AbortController()
		let timedOut = false
		const timeoutId = setTimeout(() => {
			timedOut = true
			controller.abort()
		}, this.options.timeout_ms)
		const onAbort = () => controller.abort()
		signal?.addEventListener("abort", onAbort, { once: true })

		try {
			const headers: Record<string, string> = {
				"Content-Type": "application/json",
				"Accept": "application/json",
			}
			if (this.options.api_key) headers["Authorization"] = `Bearer ${this.options.api_key}`

			const response = await this.fetchImpl(this.url, {
				method: "POST",
				headers,
				body: JSON.stringify({
					model: this.options.model,
					messages: [
						{ role: "system", content: request.system },
						{ role: "user", content: request.user },
					],
					temperature: request.temperature,
					max_tokens: request.max_tokens,
				}),
				signal: controller.signal,
			})

			if (!response.ok) {
				throw new PipelineError(
					"generation",
					`Completion service returned error: ${response.status}`,
					response.status >= 500 || response.status === 429, // 5xx and rate limits are recoverable
					{ statusCode: response.status },
				)
			}

			const body: unknown = await response.json()
			const parsed = chatResponseSchema.safeParse(body)
			if (!parsed.success) {
				throw new PipelineError("generation", "Completion service returned an unexpected response shape", false, {
					issues: parsed.error.issues.map((i) => i.path.join(".")),
				})
			}

			const content = parsed.data.choices[0].message.content ?? ""
			this.logger.debug("Completion received", {
				model: this.options.model,
				latency_ms: Date.now() - startTime,
				length: content.length,
			})
			return content
		} catch (error) {
			if (error instanceof PipelineError) throw error

			if (error instanceof Error && error.name === "AbortError") {
				if (timedOut) {
					throw new PipelineError(
						"timeout",
						`Completion request timed out after ${this.options.timeout_ms}ms`,
						true,
						{ timeout: this.options.timeout_ms },
					)
				}
				throw new PipelineError("cancelled", "Completion request cancelled")
			}

			// Network errors (fetch rejects with TypeError)
			if (error instanceof TypeError) {
				throw new PipelineError("generation", "Cannot reach the completion service", true, {
					originalError: error.message,
				})
			}

			throw new PipelineError("generation", "Unexpected error calling the completion service", false, {
				originalError: String(error),
			})
		} finally {
			clearTimeout(timeoutId)
			signal?.removeEventListener("abort", onAbort)
		}
	}
}
