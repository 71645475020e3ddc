import {Readable} from 'node:stream'
import {pipeline} from 'node:stream/promises'

export interface StaticResponse {
	status: number
	headers: Record<string, string>
	body?: string | Buffer | Readable
}

// the part of ServerResponse we write to
export interface ResponseTarget extends NodeJS.WritableStream {
	statusCode: number
	readonly headersSent: boolean
	setHeader(name: string, value: number | string | readonly string[]): unknown
	getHeader(name: string): number | string | string[] | undefined
	destroy(error?: Error): unknown
}

export async function writeRes(
	res: ResponseTarget,
	{status, headers, body}: StaticResponse,
	method?: string,
) {
	if (res.headersSent) {
		// for example, the fallback handler already answered
		if (body instanceof Readable) body.destroy()
		return
	}

	res.statusCode = status
	for (const [name, value] of Object.entries(headers)) res.setHeader(name, value)

	if (body instanceof Readable) {
		if (method === 'HEAD') {
			body.destroy()
			return endRes(res)
		}
		// a client that hangs up mid-download ends the response, it is not a failure
		return pipeline(body, res).catch(e => {
			if (!isClientAbort(e)) throw e
		})
	}
	if (method === 'HEAD' || body === undefined) return endRes(res)
	return endRes(res, body)
}

const CLIENT_ABORT_CODES = new Set(['ERR_STREAM_PREMATURE_CLOSE', 'ECONNRESET', 'EPIPE'])

function isClientAbort(e: unknown) {
	return e instanceof Error && 'code' in e && typeof e.code === 'string' && CLIENT_ABORT_CODES.has(e.code)
}

function endRes(res: ResponseTarget, chunk?: string | Buffer) {
	return new Promise<void>(resolve => {
		if (chunk === undefined) res.end(() => resolve())
		else res.end(chunk, () => resolve())
	})
}
