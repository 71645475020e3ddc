import {hrtime} from 'node:process'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogEntry {
	level: LogLevel
	message: string
	[field: string]: unknown
}

export type LogSink = (entry: LogEntry) => void

export function logJson(entry: LogEntry) {
	console.log(JSON.stringify(entry))
}

// plain warning stream, used when no structured sink is configured
export function logWarn({message}: LogEntry) {
	console.warn(`static: ${message}`)
}

export interface Log {
	debug(message: string): void
	warn(message: string, fields?: Record<string, unknown>): void
	info(message: string, fields?: Record<string, unknown>): void
}

export function makeLog(sink: LogSink, debug: boolean): Log {
	return {
		debug(message) {
			if (debug) sink({level: 'debug', message})
		},
		info(message, fields) {
			sink({...fields, level: 'info', message})
		},
		warn(message, fields) {
			sink({...fields, level: 'warn', message})
		},
	}
}

let requestCount = 0

// one entry per request answered by the static layer
export function startRequestLog(log: Log, {method, url}: {method?: string, url?: string}) {
	const id = requestCount++
	const start = hrtime.bigint()
	return (status: number) => {
		const durationNs = hrtime.bigint() - start
		log.info(`${method ?? 'GET'} ${url ?? ''} ${status}`, {
			id,
			method,
			url,
			status,
			duration: Number(durationNs) / 1e6, // ms
		})
	}
}
