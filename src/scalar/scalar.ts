import type { JsonValue } from 'type-fest';
import { toJsonValue } from '../property/json';
import { Property } from '../property/property';
import type { PropertyOptions } from '../property/types';
import { isCoercible, toFloat, toInteger } from './coerce';

/*
 * Stored values of the scalar variants are read back through the same
 * coercion as input, so a record written with the wrong type still comes back
 * in the declared type, or fails with a PropertyTypeError when it cannot.
 * Values already of the declared type pass through unchanged.
 */

export class StringProperty extends Property<string, string> {
	constructor(options?: PropertyOptions<string>) {
		super(
			'string',
			{
				standardize: (value) => String(value),
				toDb: (value) => value,
				fromDb: (raw) => String(raw)
			},
			options
		);
	}
}

export class IntegerProperty extends Property<number, number> {
	constructor(options?: PropertyOptions<number>) {
		super(
			'integer',
			{
				standardize: toInteger,
				check: (value) => isCoercible(toInteger, value),
				toDb: (value) => value,
				fromDb: toInteger
			},
			options
		);
	}
}

export class FloatProperty extends Property<number, number> {
	constructor(options?: PropertyOptions<number>) {
		super(
			'float',
			{
				standardize: toFloat,
				check: (value) => isCoercible(toFloat, value),
				toDb: (value) => value,
				fromDb: toFloat
			},
			options
		);
	}
}

export class BooleanProperty extends Property<boolean, boolean> {
	constructor(options?: PropertyOptions<boolean>) {
		super(
			'boolean',
			{
				standardize: (value) => Boolean(value),
				toDb: (value) => value,
				fromDb: (raw) => Boolean(raw)
			},
			options
		);
	}
}

/**
 * Accepts anything, leaving coercion and checks to the configured processors
 * and validators. The value still has to be JSON safe by the time it is
 * stored.
 */
export class DynamicProperty extends Property<unknown, JsonValue> {
	constructor(options?: PropertyOptions<unknown>) {
		super(
			'dynamic',
			{
				standardize: (value) => value,
				toDb: toJsonValue,
				fromDb: (raw) => raw
			},
			options
		);
	}
}
