import type {IncomingMessage} from 'node:http'
import {AsyncLocalStorage} from 'node:async_hooks'
import {type ResponseTarget, type StaticResponse, writeRes} from './response.js'
import {type ServeOptions, serveStaticFile} from './staticHelpers.js'

export type Next = () => unknown
export interface Chainable {
	(next: Next): Promise<unknown>
}

type ResponseState =
	| {type: 'response', response: StaticResponse}
	| {type: 'file', filePath: string, options?: ServeOptions}

interface RequestStore {
	req: IncomingMessage
	res: ResponseTarget
	state?: ResponseState
}

const requestStorage = new AsyncLocalStorage<RequestStore>()

function getStore() {
	const store = requestStorage.getStore()
	if (!store) throw new Error('request context is only available inside requestScope()')
	return store
}

// runs the chain, then writes whatever response it set
export function requestScope(req: IncomingMessage, res: ResponseTarget): Chainable {
	return async next => {
		const store: RequestStore = {req, res}
		const result = await requestStorage.run(store, next)
		const {state} = store
		if (state) await writeRes(
			res,
			state.type === 'file'
				? await serveStaticFile(state.filePath, {method: req.method, headers: req.headers, ...state.options})
				: state.response,
			req.method,
		)
		return result
	}
}

export function getReq(): IncomingMessage {return getStore().req}
export function getRes(): ResponseTarget {return getStore().res}

export function setResponse(response: StaticResponse) {
	getStore().state = {type: 'response', response}
}

export function setText(text: string, {status = 200}: {status?: number} = {}) {
	setResponse({
		status,
		headers: {
			'Content-Type': 'text/plain; charset=utf-8',
			'Content-Length': String(Buffer.byteLength(text)),
		},
		body: text,
	})
}

export function setHtml(html: string, {status = 200}: {status?: number} = {}) {
	setResponse({
		status,
		headers: {
			'Content-Type': 'text/html; charset=utf-8',
			'Content-Length': String(Buffer.byteLength(html)),
		},
		body: html,
	})
}

// serve a file chosen by the application, e.g. a generated thumbnail
export function setFile(filePath: string, options?: ServeOptions) {
	getStore().state = {type: 'file', filePath, options}
}
