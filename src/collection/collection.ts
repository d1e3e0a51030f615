import type { JsonArray, JsonObject, JsonValue } from 'type-fest';
import { describeValue, PropertyTypeError } from '../errors';
import { toJsonArray, toJsonObject, toJsonValue } from '../property/json';
import { Property } from '../property/property';
import { isIterable, isRecord } from '../property/shape';
import type { PropertyOptions } from '../property/types';
import { createDotDict, type DotDict } from './dot-dict';

export class DictProperty extends Property<DotDict, JsonObject> {
	constructor(options?: PropertyOptions<DotDict>) {
		super(
			'dict',
			{
				standardize: (value, property) => {
					if (isRecord(value) || value instanceof Map) {
						return createDotDict(value);
					}
					throw new PropertyTypeError(`${describeValue(value)} is not a mapping`, property);
				},
				check: (value) => isRecord(value) || value instanceof Map,
				toDb: (value, property) => toJsonObject(value, property),
				fromDb: (raw, property) => {
					if (!isRecord(raw)) {
						throw new PropertyTypeError(`stored ${describeValue(raw)} is not a mapping`, property);
					}
					return createDotDict(raw);
				},
				emptyDefault: () => createDotDict()
			},
			options
		);
	}
}

/**
 * Ordered values with no coercion of their own: whatever standardize is given
 * is kept as is. Only the storage form has to be JSON safe.
 */
export class ListProperty extends Property<unknown, JsonValue> {
	constructor(options?: PropertyOptions<unknown>) {
		super(
			'list',
			{
				standardize: (value) => value,
				toDb: (value, property) => toJsonValue(value, property),
				fromDb: (raw) => raw,
				emptyDefault: () => []
			},
			options
		);
	}
}

export class SetProperty extends Property<Set<unknown>, JsonArray> {
	constructor(options?: PropertyOptions<Set<unknown>>) {
		super(
			'set',
			{
				standardize: (value, property) => {
					if (!isIterable(value)) {
						throw new PropertyTypeError(`${describeValue(value)} cannot be turned into a set`, property);
					}
					return new Set(value);
				},
				check: isIterable,
				toDb: (value, property) => toJsonArray(value, property),
				fromDb: (raw, property) => {
					if (!Array.isArray(raw)) {
						throw new PropertyTypeError(`stored ${describeValue(raw)} is not a list`, property);
					}
					return new Set(raw);
				},
				emptyDefault: () => new Set()
			},
			options
		);
	}
}
