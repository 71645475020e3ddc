import {classifyPath} from './classify.js'
import type {StaticConfig} from './config.js'
import type {StaticResponse} from './response.js'
import {StaticError, describeError, internalServerError, notFound} from './error.js'
import {type Resolution, type StaticRequest, resolveRoots} from './roots.js'

export type {Resolution, StaticRequest}

export async function resolveStatic<C>(config: StaticConfig<C>, request: StaticRequest<C>): Promise<Resolution> {
	try {
		if (request.method !== 'GET' && request.method !== 'HEAD') return {kind: 'deferred'}

		const eligible = classifyPath(request.pathname, config, config.log)
		if (!eligible.ok) return {kind: 'error', error: eligible.error}
		if (!eligible.value) return {kind: 'deferred'}

		return await resolveRoots(config, request)
	} catch (e) {
		return {
			kind: 'error',
			error: e instanceof StaticError ? e : new StaticError('internal', describeError(e), {cause: e}),
		}
	}
}

// undefined: the fallback handler answers
export function responseFor<C>(config: StaticConfig<C>, resolution: Resolution, pathname: string): StaticResponse | undefined {
	switch (resolution.kind) {
		case 'served':
			return resolution.response
		case 'notFound':
			return notFound()
		case 'error':
			config.log.warn(`${resolution.error.message} (${pathname})`, {kind: resolution.error.kind})
			return internalServerError()
		case 'deferred':
			return
	}
}

// the request-target path, percent-decoded; undefined unless it is an origin-form path with valid encoding
export function pathnameFromUrl(url = '/') {
	const pathname = url.replace(/[?#].*$/s, '')
	if (!pathname.startsWith('/')) return
	try {
		return decodeURIComponent(pathname)
	} catch (e) {
		if (e instanceof URIError) return
		throw e
	}
}
