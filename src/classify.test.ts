import {describe, expect, it} from 'vitest'
import {classifyPath} from './classify.js'
import {type StaticOptions, defineStaticConfig} from './config.js'
import {captureLog} from './testing.js'

function classify(pathname: string, options: StaticOptions = {}) {
	const {entries, sink} = captureLog()
	const config = defineStaticConfig({debug: true, log: sink}, options)
	return {result: classifyPath(pathname, config, config.log), entries}
}

describe('classifyPath', () => {
	it('rejects the default template extensions', () => {
		for (const pathname of ['/index.html', '/page.xhtml', '/t/a.tt', '/t/a.tt2', '/a.tmpl']) {
			expect(classify(pathname).result).toEqual({ok: true, value: false})
		}
	})

	it('compares extensions case-insensitively and logs the match', () => {
		const {result, entries} = classify('/INDEX.HTML')
		expect(result).toEqual({ok: true, value: false})
		expect(entries).toEqual([{level: 'debug', message: 'Ignoring extension `html`'}])
	})

	it('only matches a whole extension after a dot', () => {
		expect(classify('/notes.shtml').result).toEqual({ok: true, value: true})
		expect(classify('/html').result).toEqual({ok: true, value: true})
	})

	it('uses configured extensions instead of the defaults', () => {
		expect(classify('/index.html', {ignoreExtensions: ['PHP']}).result).toEqual({ok: true, value: true})
		expect(classify('/index.php', {ignoreExtensions: ['PHP']}).result).toEqual({ok: true, value: false})
	})

	it('rejects ignored directories with or without a trailing slash', () => {
		const {result, entries} = classify('/tmpl/a.css', {ignoreDirs: ['tmpl/']})
		expect(result).toEqual({ok: true, value: false})
		expect(entries).toEqual([{level: 'debug', message: 'Ignoring directory `tmpl`'}])
		expect(classify('/tmpl/a.css', {ignoreDirs: ['tmpl']}).result).toEqual({ok: true, value: false})
	})

	it('only rejects paths below the ignored directory', () => {
		expect(classify('/tmpl.css', {ignoreDirs: ['tmpl']}).result).toEqual({ok: true, value: true})
		expect(classify('/a/tmpl/x.css', {ignoreDirs: ['tmpl']}).result).toEqual({ok: true, value: true})
	})

	it('accepts every path when dirs is empty', () => {
		const {result, entries} = classify('/anything/at/all.bin')
		expect(result).toEqual({ok: true, value: true})
		expect(entries).toEqual([])
	})

	it('accepts only paths matching dirs when dirs is set', () => {
		expect(classify('/static/a.css', {dirs: ['static']}).result).toEqual({ok: true, value: true})
		expect(classify('/other/a.css', {dirs: ['static']}).result).toEqual({ok: true, value: false})
	})

	it('checks exclusions before dirs', () => {
		expect(classify('/static/page.html', {dirs: ['static']}).result).toEqual({ok: true, value: false})
	})

	it('does not log exclusions without the debug flag', () => {
		const {entries, sink} = captureLog()
		const config = defineStaticConfig({log: sink})
		expect(classifyPath('/index.html', config, config.log)).toEqual({ok: true, value: false})
		expect(entries).toEqual([])
	})

	it('reports a malformed pattern as a configuration error', () => {
		const {result} = classify('/images/a.png', {dirs: ['qr/(images/']})
		expect(result.ok).toBe(false)
		if (!result.ok) expect(result.error.kind).toBe('configuration')
	})
})
