export {
	requestScope,
	getReq,
	getRes,
	setFile,
	setHtml,
	setResponse,
	setText,
	type Chainable,
	type Next,
} from './context.js'
export {writeRes, type ResponseTarget, type StaticResponse} from './response.js'
export {
	defineStaticConfig,
	defaultIgnoreExtensions,
	type DirSpec,
	type RootProvider,
	type RootSpec,
	type StaticConfig,
	type StaticOptions,
} from './config.js'
export {classifyPath} from './classify.js'
export {compileDirPattern, matchDirs} from './dirs.js'
export {resolveRoots} from './roots.js'
export {pathnameFromUrl, resolveStatic, responseFor, type Resolution, type StaticRequest} from './resolve.js'
export {serveFile, serveStaticFile, type FileServer, type ServeOptions} from './staticHelpers.js'
export {makeContentTypeResolver, type ContentTypeResolver} from './mime.js'
export {StaticError, internalServerError, notFound, type Result, type StaticErrorKind} from './error.js'
export {logJson, logWarn, type LogEntry, type LogLevel, type LogSink} from './logger.js'
export {chainStatic, staticHandler, type RequestLike} from './static.js'
