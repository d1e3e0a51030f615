import { describeValue, PropertyTypeError } from '../errors';
import { enumValuesSchema, parseOptions } from '../property/options';
import { Property } from '../property/property';
import type { PropertyOptions } from '../property/types';

/**
 * Restricts a field to a fixed list of string labels. Labels are what
 * application code sees, storage only keeps the label's index.
 */
export class EnumProperty extends Property<string, number> {
	public readonly values: readonly string[];

	constructor(values: readonly string[], options?: PropertyOptions<string>) {
		const labels: readonly string[] = parseOptions(enumValuesSchema, values, 'enum property');
		const indexes = new Map(labels.map((label, index): [string, number] => [label, index]));
		super(
			'enum',
			{
				standardize: (value, property) => {
					if (typeof value === 'number') {
						return labelAt(labels, value, property);
					}
					if (typeof value === 'string') {
						return value;
					}
					throw new PropertyTypeError(
						`enum property only accepts labels and indexes, not ${describeValue(value)}`,
						property
					);
				},
				check: (value) => typeof value === 'string' && indexes.has(value),
				toDb: (value, property) => {
					const index = indexes.get(value);
					if (index === undefined) {
						throw new PropertyTypeError(`${describeValue(value)} is not one of the enum values`, property);
					}
					return index;
				},
				fromDb: (raw, property) => labelAt(labels, raw, property)
			},
			options
		);
		this.values = labels;
	}
}

function labelAt(labels: readonly string[], index: unknown, property: string | undefined): string {
	if (typeof index === 'number' && Number.isInteger(index) && index >= 0 && index < labels.length) {
		return labels[index];
	}
	throw new PropertyTypeError(`${describeValue(index)} is not an enum index`, property);
}
