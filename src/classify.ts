import type {StaticConfig} from './config.js'
import {matchDirs} from './dirs.js'
import {type Result, ok} from './error.js'
import type {Log} from './logger.js'

// whether a request path may be served statically at all
export function classifyPath(
	pathname: string,
	{ignoreExtensions, ignoreDirs, dirs}: Pick<StaticConfig<unknown>, 'ignoreExtensions' | 'ignoreDirs' | 'dirs'>,
	log: Log,
): Result<boolean> {
	const lower = pathname.toLowerCase()
	for (const extension of ignoreExtensions) {
		if (lower.endsWith(`.${extension}`)) {
			log.debug(`Ignoring extension \`${extension}\``)
			return ok(false)
		}
	}

	for (const dir of ignoreDirs) {
		if (pathname.startsWith(`/${dir}/`) || pathname.startsWith(`/${dir}\\`)) {
			log.debug(`Ignoring directory \`${dir}\``)
			return ok(false)
		}
	}

	// without dirs, any existing file is served
	if (!dirs.length) return ok(true)

	return matchDirs(pathname, dirs)
}
