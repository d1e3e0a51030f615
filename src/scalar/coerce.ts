import { describeValue, PropertyTypeError } from '../errors';

const INTEGER_PATTERN = /^[+-]?\d+$/;

export function toInteger(value: unknown, property?: string): number {
	if (typeof value === 'boolean') {
		return value ? 1 : 0;
	}
	if (typeof value === 'number' && Number.isFinite(value)) {
		// truncates toward zero, without producing -0
		return Math.trunc(value) || 0;
	}
	if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
		const parsed = Number.parseInt(value.trim(), 10);
		if (Number.isSafeInteger(parsed)) {
			return parsed;
		}
	}
	throw new PropertyTypeError(`${describeValue(value)} is not an integer`, property);
}

export function toFloat(value: unknown, property?: string): number {
	if (typeof value === 'boolean') {
		return value ? 1 : 0;
	}
	if (typeof value === 'number' && Number.isFinite(value)) {
		return value;
	}
	if (typeof value === 'string' && value.trim() !== '') {
		const parsed = Number(value.trim());
		if (Number.isFinite(parsed)) {
			return parsed;
		}
	}
	throw new PropertyTypeError(`${describeValue(value)} is not a number`, property);
}

/**
 * Turns a throwing coercion into a predicate. Only PropertyTypeError counts as
 * "not coercible", anything else is a bug and propagates.
 */
export function isCoercible(coerce: (value: unknown) => unknown, value: unknown): boolean {
	try {
		coerce(value);
		return true;
	} catch (error) {
		if (error instanceof PropertyTypeError) {
			return false;
		}
		throw error;
	}
}
