import {describe, expect, it} from 'vitest'
import {makeContentTypeResolver} from './mime.js'

describe('makeContentTypeResolver', () => {
	it('looks the extension up in the mime database', () => {
		const contentType = makeContentTypeResolver()
		expect(contentType('/srv/root/images/logo.png')).toBe('image/png')
		expect(contentType('/srv/root/css/site.css')).toBe('text/css; charset=utf-8')
	})

	it('prefers the configured override', () => {
		const contentType = makeContentTypeResolver({jpg: 'image/jpg', tmpl: 'text/x-template'})
		expect(contentType('/srv/root/a.jpg')).toBe('image/jpg')
		expect(contentType('/srv/root/page.tmpl')).toBe('text/x-template')
		expect(contentType('/srv/root/a.png')).toBe('image/png')
	})

	it('uses the text after the last dot for overrides', () => {
		const contentType = makeContentTypeResolver({gz: 'application/x-custom-gzip'})
		expect(contentType('/srv/root/bundle.tar.gz')).toBe('application/x-custom-gzip')
	})

	it('falls back to text/plain', () => {
		const contentType = makeContentTypeResolver()
		expect(contentType('/srv/root/README')).toBe('text/plain')
		expect(contentType('/srv/root/data.unknownext')).toBe('text/plain')
	})

	it('ignores inherited keys of the override map', () => {
		expect(makeContentTypeResolver({})('/srv/root/a.constructor')).toBe('text/plain')
	})
})
