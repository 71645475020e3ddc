import {mkdir, mkdtemp, rm, writeFile} from 'node:fs/promises'
import {IncomingMessage, type IncomingHttpHeaders} from 'node:http'
import {Socket} from 'node:net'
import {tmpdir} from 'node:os'
import {dirname, join} from 'node:path'
import {Readable, Writable} from 'node:stream'
import type {ResponseTarget, StaticResponse} from './response.js'
import type {LogEntry} from './logger.js'

// writes files (relative path -> content) under a fresh temporary directory
export async function makeTree(files: Record<string, string>) {
	const root = await mkdtemp(join(tmpdir(), 'static-roots-'))
	for (const [relative, content] of Object.entries(files)) {
		const fullPath = join(root, relative)
		await mkdir(dirname(fullPath), {recursive: true})
		await writeFile(fullPath, content)
	}
	return root
}

export const removeTree = (root: string) => rm(root, {recursive: true, force: true})

export function makeRequest(url: string, {method = 'GET', headers = {}}: {method?: string, headers?: IncomingHttpHeaders} = {}) {
	const req = new IncomingMessage(new Socket())
	req.url = url
	req.method = method
	req.headers = headers
	return req
}

export function captureLog() {
	const entries: LogEntry[] = []
	return {
		entries,
		sink(entry: LogEntry) {
			entries.push(entry)
		},
	}
}

export async function bodyText(body: StaticResponse['body']) {
	if (body === undefined) return ''
	if (!(body instanceof Readable)) return body.toString()
	const chunks: Buffer[] = []
	for await (const chunk of body) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
	return Buffer.concat(chunks).toString()
}

export class CapturedResponse extends Writable implements ResponseTarget {
	statusCode = 200
	headersSent = false
	readonly headers: Record<string, number | string | string[]> = {}
	private readonly chunks: Buffer[] = []

	setHeader(name: string, value: number | string | readonly string[]) {
		this.headers[name.toLowerCase()] = typeof value === 'object' ? [...value] : value
		return this
	}

	getHeader(name: string) {
		return this.headers[name.toLowerCase()]
	}

	override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
		this.headersSent = true
		this.chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
		callback()
	}

	get text() {
		return Buffer.concat(this.chunks).toString()
	}
}
