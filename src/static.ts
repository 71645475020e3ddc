import type {IncomingMessage, ServerResponse} from 'node:http'
import type {StaticConfig} from './config.js'
import {type Chainable, getReq, setResponse} from './context.js'
import {type ResponseTarget, type StaticResponse, writeRes} from './response.js'
import {startRequestLog} from './logger.js'
import {describeError} from './error.js'
import {pathnameFromUrl, responseFor, resolveStatic} from './resolve.js'

export type RequestLike = Pick<IncomingMessage, 'method' | 'url' | 'headers'>

async function resolveResponse<C extends RequestLike>(config: StaticConfig<C>, req: C): Promise<StaticResponse | undefined> {
	const pathname = pathnameFromUrl(req.url)
	if (pathname === undefined) return
	const resolution = await resolveStatic(config, {
		pathname,
		method: req.method ?? 'GET',
		headers: req.headers,
		context: req,
	})
	return responseFor(config, resolution, pathname)
}

// serves static files inside requestScope(); next() is the fallback
export function chainStatic(config: StaticConfig<IncomingMessage>): Chainable {
	return async next => {
		const req = getReq()
		const endLog = config.logging ? startRequestLog(config.log, req) : undefined
		const response = await resolveResponse(config, req)
		if (!response) return next()
		endLog?.(response.status)
		setResponse(response)
	}
}

// wraps a plain node request listener
export function staticHandler<
	Req extends RequestLike = IncomingMessage,
	Res extends ResponseTarget = ServerResponse,
>(
	config: StaticConfig<Req>,
	fallback: (req: Req, res: Res) => unknown,
) {
	return async (req: Req, res: Res) => {
		const endLog = config.logging ? startRequestLog(config.log, req) : undefined
		const response = await resolveResponse(config, req)
		if (!response) return fallback(req, res)
		endLog?.(response.status)
		// http.Server drops the promise a listener returns
		try {
			await writeRes(res, response, req.method)
		} catch (e) {
			config.log.warn(`failed to write the response: ${describeError(e)}`, {kind: 'internal'})
			res.destroy()
		}
	}
}
