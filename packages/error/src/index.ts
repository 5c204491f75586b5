import { ExtendableError } from 'ts-error'

/**
 * An argument passed by the caller is out of range or malformed.
 * Indicates a bug in the calling code; never retried.
 */
export class InvalidArgumentError extends ExtendableError {
	readonly argument: string | undefined

	constructor(message: string, argument?: string) {
		super(message)
		this.argument = argument
	}
}

/**
 * The operation is not valid for the current state or kind of the receiver.
 */
export class InvalidOperationError extends ExtendableError {}
