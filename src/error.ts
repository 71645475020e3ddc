import type {StaticResponse} from './response.js'

export type StaticErrorKind = 'configuration' | 'internal'

export class StaticError extends Error {
	readonly kind: StaticErrorKind

	constructor(kind: StaticErrorKind, message: string, options?: {cause?: unknown}) {
		super(message, options)
		this.name = 'StaticError'
		this.kind = kind
	}
}

export type Result<T> =
	| {ok: true, value: T}
	| {ok: false, error: StaticError}

export const ok = <T>(value: T): Result<T> => ({ok: true, value})
export const fail = <T = never>(error: StaticError): Result<T> => ({ok: false, error})

// content-type stays text/html for 404 to keep existing clients working
export function notFound(): StaticResponse {
	return {
		status: 404,
		headers: {'Content-Type': 'text/html', 'Content-Length': '9'},
		body: 'not found',
	}
}

export function internalServerError(): StaticResponse {
	return {
		status: 500,
		headers: {'Content-Type': 'text/plain', 'Content-Length': '21'},
		body: 'internal server error',
	}
}

export function describeError(e: unknown) {
	return e instanceof Error ? e.message : String(e)
}
