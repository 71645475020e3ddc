import type {Stats} from 'node:fs'
import type {IncomingHttpHeaders} from 'node:http'

export function statTag({mtime, size}: Pick<Stats, 'mtime' | 'size'>) {
	return `"${size.toString(16)}-${mtime.getTime().toString(16)}"`
}

const NO_CACHE_REGEXP = /(?:^|,)\s*?no-cache\s*?(?:,|$)/

// weak and strong forms of the same tag compare equal
function etagMatches(noneMatch: string, etag: string) {
	return noneMatch
		.split(',')
		.map(token => token.trim())
		.some(token => token === etag || token === `W/${etag}` || `W/${token}` === etag)
}

function notModifiedSince(modifiedSince: string, lastModified?: string) {
	const lastModifiedDate = lastModified ? Date.parse(lastModified) : NaN
	const modifiedSinceDate = Date.parse(modifiedSince)
	return !isNaN(lastModifiedDate) && !isNaN(modifiedSinceDate) && lastModifiedDate <= modifiedSinceDate
}

// conditional GET, after jshttp/fresh
export function isFresh(headers: IncomingHttpHeaders, {etag, lastModified}: {etag?: string, lastModified?: string}) {
	const noneMatch = headers['if-none-match']
	const modifiedSince = headers['if-modified-since']
	if (!noneMatch && !modifiedSince) return false

	// end-to-end reload
	const cacheControl = headers['cache-control']
	if (cacheControl && NO_CACHE_REGEXP.test(cacheControl)) return false

	if (noneMatch && noneMatch !== '*' && !(etag && etagMatches(noneMatch, etag))) return false
	if (modifiedSince && !notModifiedSince(modifiedSince, lastModified)) return false
	return true
}
