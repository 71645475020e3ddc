import mime from 'mime-types'

export type ContentTypeResolver = (fullPath: string) => string

const EXTENSION_REGEXP = /\.([^.\s]+)$/

function contentTypeForPath(fullPath: string) {
	const mimeType = mime.lookup(fullPath)
	if (!mimeType) return
	// text/* gets the database charset appended (utf-8)
	return mime.contentType(mimeType) || mimeType
}

// override map first, then the mime database, then text/plain
export function makeContentTypeResolver(mimeTypes: Readonly<Record<string, string>> = {}): ContentTypeResolver {
	return fullPath => {
		const extension = EXTENSION_REGEXP.exec(fullPath)?.[1]
		const override = extension !== undefined && Object.hasOwn(mimeTypes, extension) ? mimeTypes[extension] : undefined
		return override ?? contentTypeForPath(fullPath) ?? 'text/plain'
	}
}
