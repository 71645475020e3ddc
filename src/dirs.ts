import type {DirSpec} from './config.js'
import {type Result, StaticError, describeError, fail, ok} from './error.js'

const cache = new Map<string, RegExp>()
const cacheLimit = 10000

const REGEXP_LITERAL_PARTS = /^qr\/(.*)\/([a-z]*)$/s

// global and sticky flags would make test() stateful
const statelessFlags = (flags: string) => flags.replace(/[gy]/g, '')

export function compileDirPattern(source: string): Result<RegExp> {
	const cached = cache.get(source)
	if (cached) return ok(cached)

	const parts = REGEXP_LITERAL_PARTS.exec(source)
	let regexp: RegExp
	try {
		regexp = new RegExp(parts?.[1] ?? source, statelessFlags(parts?.[2] ?? ''))
	} catch (e) {
		return fail(new StaticError(
			'configuration',
			`Error compiling static dir regex '${source}': ${describeError(e)}`,
			{cause: e},
		))
	}

	if (cache.size < cacheLimit) cache.set(source, regexp)
	return ok(regexp)
}

function matchDir(pathname: string, dir: DirSpec): Result<boolean> {
	switch (dir.kind) {
		case 'regexp': {
			const {regexp} = dir
			const stateless = regexp.global || regexp.sticky ? new RegExp(regexp.source, statelessFlags(regexp.flags)) : regexp
			return ok(stateless.test(pathname))
		}
		case 'source': {
			const compiled = compileDirPattern(dir.source)
			return compiled.ok ? ok(compiled.value.test(pathname)) : compiled
		}
		case 'prefix':
			return ok(pathname.startsWith(`${dir.dir}/`))
	}
}

// pathname keeps its leading slash, which is removed before matching
export function matchDirs(pathname: string, dirs: readonly DirSpec[]): Result<boolean> {
	const relative = pathname.replace(/^\//, '')
	for (const dir of dirs) {
		const matched = matchDir(relative, dir)
		if (!matched.ok || matched.value) return matched
	}
	return ok(false)
}
