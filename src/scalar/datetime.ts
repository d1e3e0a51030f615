import { describeValue, PropertyTypeError } from '../errors';
import { Property } from '../property/property';
import type { PropertyOptions } from '../property/types';
import { isCoercible } from './coerce';

/**
 * Date and time, stored as a Unix timestamp in seconds. Defaults to the
 * current time.
 *
 * Values are held as `Date`, so a stored timestamp comes back exactly only to
 * the millisecond: `1700000000.1234` is read and written again as
 * `1700000000.123`.
 */
export class DateTimeProperty extends Property<Date, number> {
	constructor(options?: PropertyOptions<Date>) {
		super(
			'datetime',
			{
				standardize: (value, property) => {
					if (typeof value === 'number') {
						return fromTimestamp(value, property);
					}
					if (value instanceof Date) {
						return value;
					}
					throw new PropertyTypeError(
						`datetime property only accepts timestamps and dates, not ${describeValue(value)}`,
						property
					);
				},
				check: (value) => {
					if (typeof value === 'number') {
						return isCoercible(fromTimestamp, value);
					}
					return value instanceof Date && !Number.isNaN(value.getTime());
				},
				toDb: toTimestamp,
				fromDb: (raw, property) => {
					if (typeof raw !== 'number') {
						throw new PropertyTypeError(`stored ${describeValue(raw)} is not a timestamp`, property);
					}
					return fromTimestamp(raw, property);
				},
				emptyDefault: () => new Date()
			},
			options
		);
	}
}

export function fromTimestamp(seconds: unknown, property?: string): Date {
	const date = new Date(typeof seconds === 'number' ? Math.round(seconds * 1000) : Number.NaN);
	if (Number.isNaN(date.getTime())) {
		throw new PropertyTypeError(`${describeValue(seconds)} is not a valid timestamp`, property);
	}
	return date;
}

/**
 * Numbers are taken to be timestamps already and pass through
 */
export function toTimestamp(value: Date | number, property?: string): number {
	if (typeof value === 'number') {
		return value;
	}
	const milliseconds = value.getTime();
	if (Number.isNaN(milliseconds)) {
		throw new PropertyTypeError('invalid date cannot be stored', property);
	}
	return milliseconds / 1000;
}
