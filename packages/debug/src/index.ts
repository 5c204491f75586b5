import type { Debugger } from 'debug'
import debug from 'debug'

/**
 * Debug categories used across the client
 */
export type LogCategory =
	| 'codec'
	| 'type'

/**
 * Namespaced debug logger. Output is switched on with the `DEBUG` environment
 * variable, e.g. `DEBUG=spanjs:*`.
 */
export class DebugLogger {
	#namespace: string
	#debugger?: Debugger

	constructor(namespace: string) {
		this.#namespace = namespace
	}

	get #debug(): Debugger {
		if (!this.#debugger) {
			this.#debugger = debug(this.#namespace)
		}

		return this.#debugger
	}

	get namespace(): string {
		return this.#namespace
	}

	log(message: unknown, ...args: unknown[]): void {
		this.#debug(message, ...args)
	}

	get enabled(): boolean {
		return !!this.#debug.enabled
	}

	extend(subname: string): DebugLogger {
		return new DebugLogger(`${this.#namespace}:${subname}`)
	}
}

export let loggers: Record<LogCategory, DebugLogger> = {
	codec: new DebugLogger('spanjs:codec'),
	type: new DebugLogger('spanjs:type'),
}
