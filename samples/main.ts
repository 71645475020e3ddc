import {Server} from 'node:http'
import {resolve} from 'node:path'
import {fileURLToPath} from 'node:url'
import chain from 'jchain'
import {chainStatic, defineStaticConfig, requestScope, logJson, setFile, setHtml} from '../src/index.js'

const here = fileURLToPath(new URL('.', import.meta.url))

const config = defineStaticConfig({
	root: resolve(here, 'public'),
	dirs: ['static', /^(images|css)\//],
	debug: true,
	logging: true,
	log: logJson,
	expires: 3600,
})

new Server().on('request', async (req, res) => {
	try {
		await chain(
			requestScope(req, res),
			chainStatic(config),
			() => req.url === '/dummy'
				? setFile(resolve(here, 'public/dummy.pdf'))
				: setHtml('not found', {status: 404}),
		)()
	} catch (e) {
		console.error(e)
		res.destroy()
	}
}).listen(3000, () => console.log('Server is running at http://localhost:3000'))
