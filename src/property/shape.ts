import _ from 'lodash';

/**
 * Plain object (dot-dicts included), as opposed to class instances, arrays
 * and other exotic objects
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return _.isPlainObject(value);
}

export function isIterable(value: unknown): value is Iterable<unknown> {
	if (typeof value === 'string') {
		return true;
	}
	return (
		typeof value === 'object' &&
		value !== null &&
		Symbol.iterator in value &&
		typeof value[Symbol.iterator] === 'function'
	);
}
