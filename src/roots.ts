import type {IncomingHttpHeaders} from 'node:http'
import type {RootProvider, RootSpec, StaticConfig} from './config.js'
import type {StaticResponse} from './response.js'
import {type Result, StaticError, describeError, fail, ok} from './error.js'
import {isRegularFile} from './staticHelpers.js'

export interface StaticRequest<C> {
	pathname: string // decoded, with the leading slash
	method: string
	headers: IncomingHttpHeaders
	context: C
}

export type Resolution =
	| {kind: 'served', response: StaticResponse}
	| {kind: 'notFound'}
	| {kind: 'deferred'}
	| {kind: 'error', error: StaticError}

async function provideRoots<C>(provide: RootProvider<C>, context: C): Promise<Result<readonly string[]>> {
	let roots: unknown
	try {
		roots = await provide(context)
	} catch (e) {
		return fail(new StaticError('configuration', `include path provider failed: ${describeError(e)}`, {cause: e}))
	}
	if (!Array.isArray(roots) || !roots.every((root): root is string => typeof root === 'string'))
		return fail(new StaticError('configuration', 'include path provider must return a list of directories'))
	return ok(roots)
}

export async function resolveRoots<C>(
	config: StaticConfig<C>,
	{pathname, method, headers, context}: StaticRequest<C>,
): Promise<Resolution> {
	const queue: RootSpec<C>[] = [...config.includePath]
	let spec: RootSpec<C> | undefined
	while ((spec = queue.shift())) {
		switch (spec.kind) {
			case 'provider': {
				const provided = await provideRoots(spec.provide, context)
				if (!provided.ok) return {kind: 'error', error: provided.error}
				// provided roots are searched before whatever was queued after the provider
				queue.unshift(...provided.value.map((path): RootSpec<C> => ({kind: 'path', path})))
				continue
			}
			case 'path': {
				if (!await isRegularFile(spec.path + pathname)) continue
				const response = await config.serve(spec.path, pathname, {
					contentType: config.contentType,
					expires: config.expires,
					method,
					headers,
				})
				// any status but 404 ends the search, errors included
				if (response.status !== 404) return {kind: 'served', response}
			}
		}
	}

	if (!config.dirs.length) {
		config.log.debug('Forwarding to the fallback handler.')
		return {kind: 'deferred'}
	}

	config.log.debug(`404: file not found: ${pathname}`)
	return {kind: 'notFound'}
}
