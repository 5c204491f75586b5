/**
 * Folds the parts into a 32-bit hash with `hash * 397 ^ part`.
 */
export function combineHash(...parts: number[]): number {
	let hash = 0
	for (let part of parts) {
		hash = Math.imul(hash, 397) ^ part
	}

	return hash
}

export function stringHash(value: string): number {
	let hash = 0
	for (let i = 0; i < value.length; i++) {
		hash = (Math.imul(hash, 31) + value.charCodeAt(i)) | 0
	}

	return hash
}
