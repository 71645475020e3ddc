import {describe, expect, it} from 'vitest'
import {Readable} from 'node:stream'
import {requestScope, getReq, getRes, setHtml, setResponse} from './context.js'
import {writeRes} from './response.js'
import {CapturedResponse, makeRequest} from './testing.js'

describe('requestScope', () => {
	it('exposes the request and response to the chain', async () => {
		const req = makeRequest('/page')
		const res = new CapturedResponse()
		const result = await requestScope(req, res)(() => {
			expect(getReq()).toBe(req)
			expect(getRes()).toBe(res)
			return 'done'
		})
		expect(result).toBe('done')
	})

	it('writes html with its length', async () => {
		const res = new CapturedResponse()
		await requestScope(makeRequest('/page'), res)(() => setHtml('<b>hé</b>', {status: 201}))
		expect(res.statusCode).toBe(201)
		expect(res.headers).toEqual({'content-type': 'text/html; charset=utf-8', 'content-length': '10'})
		expect(res.text).toBe('<b>hé</b>')
	})

	it('writes nothing when the chain set no response', async () => {
		const res = new CapturedResponse()
		await requestScope(makeRequest('/page'), res)(() => undefined)
		expect(res.writableEnded).toBe(false)
	})

	it('throws outside a request', () => {
		expect(() => getReq()).toThrow('request context is only available inside requestScope()')
	})
})

describe('writeRes', () => {
	it('pipes stream bodies', async () => {
		const res = new CapturedResponse()
		await writeRes(res, {status: 200, headers: {'Content-Type': 'text/plain'}, body: Readable.from(['a', 'b'])})
		expect(res.text).toBe('ab')
		expect(res.writableFinished).toBe(true)
	})

	it('drops stream bodies for HEAD', async () => {
		const res = new CapturedResponse()
		const body = Readable.from(['a'])
		await writeRes(res, {status: 200, headers: {}, body}, 'HEAD')
		expect(res.text).toBe('')
		expect(body.destroyed).toBe(true)
	})

	it('finishes when the client hangs up mid-stream', async () => {
		class HangUp extends CapturedResponse {
			override _write(chunk: Buffer | string, encoding: BufferEncoding, callback: (error?: Error | null) => void) {
				super._write(chunk, encoding, callback)
				this.destroy()
			}
		}
		const res = new HangUp()
		const body = new Readable({
			read() {
				this.push('chunk')
			},
		})
		await expect(writeRes(res, {status: 200, headers: {}, body})).resolves.toBeUndefined()
		expect(res.destroyed).toBe(true)
		expect(body.destroyed).toBe(true)
	})

	it('rejects when the body fails to read', async () => {
		const res = new CapturedResponse()
		const body = new Readable({
			read() {
				this.destroy(new Error('disk gone'))
			},
		})
		await expect(writeRes(res, {status: 200, headers: {}, body})).rejects.toThrow('disk gone')
	})

	it('leaves a response alone once headers are sent', async () => {
		const res = new CapturedResponse()
		res.write('already')
		await requestScope(makeRequest('/page'), res)(() => setResponse({status: 500, headers: {}, body: 'late'}))
		expect(res.statusCode).toBe(200)
		expect(res.text).toBe('already')
	})
})
