import {createReadStream} from 'node:fs'
import {access, constants, stat} from 'node:fs/promises'
import type {IncomingHttpHeaders} from 'node:http'
import path from 'node:path'
import {type StaticResponse} from './response.js'
import {isFresh, statTag} from './etag.js'
import {notFound} from './error.js'
import {type ContentTypeResolver, makeContentTypeResolver} from './mime.js'

const UP_PATH_REGEXP = /(?:^|[\\/])\.\.(?:[\\/]|$)/

export interface ServeOptions {
	contentType?: ContentTypeResolver
	expires?: number // in seconds
	method?: string
	headers?: IncomingHttpHeaders
}

// root + pathname, the way the file is looked up before it is served
export type FileServer = (root: string, pathname: string, options: ServeOptions) => Promise<StaticResponse>

const textResponse = (status: number, text: string): StaticResponse => ({
	status,
	headers: {
		'Content-Type': 'text/plain',
		'Content-Length': String(Buffer.byteLength(text)),
	},
	body: text,
})

// a path that cannot be stat'ed (missing, symlink loop, no permission on a parent) is not a file
export async function isRegularFile(fullPath: string) {
	if (fullPath.includes('\0')) return false
	const fileStat = await stat(fullPath).catch(() => undefined)
	return fileStat?.isFile() ?? false
}

export const serveFile: FileServer = async (root, pathname, options) => {
	// null byte(s)
	if (pathname.includes('\0')) return textResponse(400, 'Invalid request')

	// malicious path
	if (UP_PATH_REGEXP.test(pathname)) return textResponse(403, 'forbidden')

	return sendFile(path.join(root, pathname), options)
}

async function sendFile(
	fullPath: string,
	{
		contentType = makeContentTypeResolver(),
		expires,
		method = 'GET',
		headers: reqHeaders = {},
	}: ServeOptions,
): Promise<StaticResponse> {
	if (!await isRegularFile(fullPath)) return textResponse(404, 'not found')

	try {
		await access(fullPath, constants.R_OK)
	} catch {
		return textResponse(403, 'forbidden')
	}

	const fileStat = await stat(fullPath)
	const headers: Record<string, string> = {
		'Content-Type': contentType(fullPath),
		'Content-Length': String(fileStat.size),
		'Last-Modified': fileStat.mtime.toUTCString(),
		ETag: statTag(fileStat),
	}
	if (expires !== undefined) {
		headers.Expires = new Date(Date.now() + expires * 1000).toUTCString()
		headers['Cache-Control'] = `public, max-age=${Math.floor(expires)}`
	}

	// conditional GET support
	if (isFresh(reqHeaders, {etag: headers.ETag, lastModified: headers['Last-Modified']})) {
		const {'Content-Type': _type, 'Content-Length': _length, ...rest} = headers
		return {status: 304, headers: rest}
	}

	// HEAD support
	if (method === 'HEAD') return {status: 200, headers}

	return {status: 200, headers, body: createReadStream(fullPath)}
}

// serve a file chosen by application code; anything but a regular file is the fixed 404
export async function serveStaticFile(fullPath: string, options: ServeOptions = {}) {
	if (!await isRegularFile(fullPath)) return notFound()
	return sendFile(fullPath, options)
}
