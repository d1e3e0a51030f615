import { describeValue, PropertyTypeError } from '../errors';
import { toJsonObject } from '../property/json';
import { isRecord } from '../property/shape';
import type { EmbeddableDocument, EmbeddableDocumentClass } from './types';

/**
 * The one coercion every embedded value goes through: instances are kept,
 * mappings become new instances, anything else is refused.
 */
export function standardizeEmbedded<T extends EmbeddableDocument>(
	documentClass: EmbeddableDocumentClass<T>,
	value: unknown,
	property?: string
): T {
	if (value instanceof documentClass) {
		return value;
	}
	if (isRecord(value)) {
		return new documentClass(value);
	}
	throw new PropertyTypeError(
		`${documentClass.name} can only be built from a mapping or an instance, not ${describeValue(value)}`,
		property
	);
}

export function isEmbeddable<T extends EmbeddableDocument>(
	documentClass: EmbeddableDocumentClass<T>,
	value: unknown
): boolean {
	return value instanceof documentClass || isRecord(value);
}

export function constructEmbedded<T extends EmbeddableDocument>(
	documentClass: EmbeddableDocumentClass<T>,
	raw: unknown,
	property?: string
): T {
	if (!isRecord(raw)) {
		throw new PropertyTypeError(
			`stored ${describeValue(raw)} is not a serialized ${documentClass.name}`,
			property
		);
	}
	return documentClass.constructObject(toJsonObject(raw, property));
}
