import type {IncomingMessage} from 'node:http'
import type {Promisable} from 'type-fest'
import {type Log, type LogSink, logWarn, makeLog} from './logger.js'
import {type ContentTypeResolver, makeContentTypeResolver} from './mime.js'
import {type FileServer, serveFile} from './staticHelpers.js'

// computes search roots at request time, e.g. from the session
export type RootProvider<C = IncomingMessage> = (context: C) => Promisable<readonly string[]>

export type RootSpec<C = IncomingMessage> =
	| {kind: 'path', path: string}
	| {kind: 'provider', provide: RootProvider<C>}

export type DirSpec =
	| {kind: 'prefix', dir: string}
	| {kind: 'regexp', regexp: RegExp}
	| {kind: 'source', source: string} // 'qr/pattern/flags', compiled on first use

export interface StaticOptions<C = IncomingMessage> {
	// top-level directories always served statically: a name, a RegExp, or a 'qr/pattern/flags' string
	dirs?: ReadonlyArray<string | RegExp>
	// searched in order; defaults to [root]
	includePath?: ReadonlyArray<string | RootProvider<C>>
	ignoreExtensions?: readonly string[]
	ignoreDirs?: readonly string[]
	mimeTypes?: Readonly<Record<string, string>>
	debug?: boolean
	logging?: boolean
	expires?: number // in seconds
	root?: string
	log?: LogSink
	serve?: FileServer
}

export interface StaticConfig<C = IncomingMessage> {
	readonly dirs: readonly DirSpec[]
	readonly includePath: readonly RootSpec<C>[]
	readonly ignoreExtensions: readonly string[]
	readonly ignoreDirs: readonly string[]
	readonly mimeTypes: Readonly<Record<string, string>>
	readonly debug: boolean
	readonly logging: boolean
	readonly expires?: number
	readonly contentType: ContentTypeResolver
	readonly serve: FileServer
	readonly log: Log
}

export const defaultIgnoreExtensions = ['tmpl', 'tt', 'tt2', 'html', 'xhtml'] as const

// qr/pattern/flags; a bare /name/ stays a literal directory
const REGEXP_LITERAL_REGEXP = /^qr\/.+\/[dgimsuy]*$/s

export function isRegExpLiteral(value: string) {
	return REGEXP_LITERAL_REGEXP.test(value)
}

function toDirSpec(dir: string | RegExp): DirSpec {
	if (dir instanceof RegExp) return {kind: 'regexp', regexp: dir}
	if (typeof dir !== 'string') throw new TypeError(`dirs: expected a string or a RegExp, got ${typeof dir}`)
	if (isRegExpLiteral(dir)) return {kind: 'source', source: dir}
	return {kind: 'prefix', dir: dir.replace(/\/$/, '')}
}

function toRootSpec<C>(root: string | RootProvider<C>): RootSpec<C> {
	if (typeof root === 'function') return {kind: 'provider', provide: root}
	if (typeof root !== 'string') throw new TypeError(`includePath: expected a string or a function, got ${typeof root}`)
	return {kind: 'path', path: root}
}

function stringList(name: string, value: readonly string[]): readonly string[] {
	if (!Array.isArray(value) || value.some(item => typeof item !== 'string')) throw new TypeError(`${name}: expected a list of strings`)
	return value
}

// later sources win per key
export function defineStaticConfig<C = IncomingMessage>(...sources: Array<StaticOptions<C> | undefined>): StaticConfig<C> {
	const options = sources.reduce<StaticOptions<C>>((merged, source) => ({...merged, ...source}), {})
	const {
		dirs = [],
		root = process.cwd(),
		includePath = [root],
		ignoreExtensions = defaultIgnoreExtensions,
		ignoreDirs = [],
		mimeTypes = {},
		debug = false,
		logging = false,
		expires,
		log = logWarn,
		serve = serveFile,
	} = options

	if (expires !== undefined && !(Number.isFinite(expires) && expires >= 0)) throw new TypeError('expires: expected a non-negative number of seconds')

	return Object.freeze({
		dirs: Object.freeze(dirs.map(dir => toDirSpec(dir))),
		includePath: Object.freeze(includePath.map(spec => toRootSpec(spec))),
		ignoreExtensions: Object.freeze(stringList('ignoreExtensions', ignoreExtensions).map(ext => ext.toLowerCase())),
		ignoreDirs: Object.freeze(stringList('ignoreDirs', ignoreDirs).map(dir => dir.replace(/[/\\]$/, ''))),
		mimeTypes: Object.freeze({...mimeTypes}),
		debug,
		logging,
		expires,
		contentType: makeContentTypeResolver(mimeTypes),
		serve,
		log: makeLog(log, debug),
	})
}
