import type { JsonArray, JsonObject, JsonValue } from 'type-fest';
import { describeValue, PropertyTypeError } from '../errors';
import { isRecord } from './shape';

/**
 * Checks that a value can be written to storage as is, returning it as a
 * JsonValue. Undefined object members are dropped, undefined array items
 * become null.
 */
export function toJsonValue(value: unknown, property?: string): JsonValue {
	if (value === null || value === undefined) {
		return null;
	}
	if (typeof value === 'string' || typeof value === 'boolean') {
		return value;
	}
	if (typeof value === 'number') {
		if (!Number.isFinite(value)) {
			throw new PropertyTypeError(`${value} cannot be stored`, property);
		}
		return value;
	}
	if (Array.isArray(value)) {
		return toJsonArray(value, property);
	}
	if (isRecord(value)) {
		return toJsonObject(value, property);
	}
	throw new PropertyTypeError(`${describeValue(value)} is not storage safe`, property);
}

export function toJsonArray(values: Iterable<unknown>, property?: string): JsonArray {
	return Array.from(values, (item) => toJsonValue(item, property));
}

export function toJsonObject(record: Record<string, unknown>, property?: string): JsonObject {
	const result: JsonObject = {};
	for (const [key, item] of Object.entries(record)) {
		if (item !== undefined) {
			result[key] = toJsonValue(item, property);
		}
	}
	return result;
}
