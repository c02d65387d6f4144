// src/core/providerHttp.ts
export const delay = (ms: number) => new Promise<void>(res => setTimeout(res, ms))

/** Non-2xx answer from a provider API. */
export class ProviderHttpError extends Error {
	constructor(
		public readonly provider: string,
		public readonly status: number,
		public readonly body: string
	) {
		super(`${provider} HTTP ${status}: ${body.slice(0, 400)}`)
		this.name = 'ProviderHttpError'
	}
}

/** Timeout, DNS or socket failure before the whole answer arrived. */
export class ProviderNetworkError extends Error {
	constructor(
		public readonly provider: string,
		message: string,
		public readonly timedOut: boolean
	) {
		super(`${provider}: ${message}`)
		this.name = 'ProviderNetworkError'
	}
}

/** 2xx answer whose body is not what the adapter expects. */
export class ProviderPayloadError extends Error {
	constructor(public readonly provider: string, message: string) {
		super(`${provider}: ${message}`)
		this.name = 'ProviderPayloadError'
	}
}

export function isTransientStatus(status: number): boolean {
	return status === 408 || status === 429 || status >= 500
}

export function isTransient(error: unknown): boolean {
	if (error instanceof ProviderNetworkError) return true
	if (error instanceof ProviderHttpError) return isTransientStatus(error.status)
	return false
}

export type PostJsonOptions = {
	provider: string
	headers: Record<string, string>
	body: unknown
	timeoutMs?: number
	signal?: AbortSignal
}

/**
 * POSTs JSON and returns the parsed body. Aborts after timeoutMs or when
 * the caller's signal fires.
 */
export async function postJson(url: string, opts: PostJsonOptions): Promise<unknown> {
	const { provider, timeoutMs = 30000 } = opts
	const controller = new AbortController()
	const timer = setTimeout(
		() => controller.abort(new Error('Request timeout')),
		timeoutMs
	)
	const onAbort = () => controller.abort(new Error('Request aborted'))
	if (opts.signal?.aborted) onAbort()
	opts.signal?.addEventListener('abort', onAbort, { once: true })

	let res: Response
	let raw: string
	try {
		res = await fetch(url, {
			method: 'POST',
			headers: { 'Content-Type': 'application/json', ...opts.headers },
			body: JSON.stringify(opts.body),
			signal: controller.signal,
		})
		raw = await res.text()
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error)
		throw new ProviderNetworkError(provider, message, controller.signal.aborted)
	} finally {
		clearTimeout(timer)
		opts.signal?.removeEventListener('abort', onAbort)
	}

	if (!res.ok) {
		let hint = ''
		try {
			const parsed: unknown = JSON.parse(raw)
			hint = extractErrorMessage(parsed)
		} catch {
			hint = ''
		}
		throw new ProviderHttpError(provider, res.status, hint || raw)
	}

	try {
		return JSON.parse(raw)
	} catch {
		throw new ProviderPayloadError(provider, 'non-JSON response body')
	}
}

function extractErrorMessage(body: unknown): string {
	if (typeof body !== 'object' || body === null || !('error' in body)) return ''
	const { error } = body
	if (typeof error === 'string') return error
	if (typeof error === 'object' && error !== null && 'message' in error) {
		return typeof error.message === 'string' ? error.message : ''
	}
	return ''
}
