import type { JsonObject } from 'type-fest';
import { describeValue, PropertyTypeError } from '../errors';
import { Property } from '../property/property';
import { isIterable, isRecord } from '../property/shape';
import type { PropertyOptions } from '../property/types';
import { EmbeddedDocumentDict, EmbeddedDocumentList } from './containers';
import { constructEmbedded, isEmbeddable, standardizeEmbedded } from './standardize';
import type { EmbeddableDocument, EmbeddableDocumentClass } from './types';

/**
 * A single embedded document, serialized inline
 */
export class EmbeddedDocumentProperty<T extends EmbeddableDocument> extends Property<
	T,
	JsonObject
> {
	constructor(
		public readonly documentClass: EmbeddableDocumentClass<T>,
		options?: PropertyOptions<T>
	) {
		super(
			'embedded',
			{
				standardize: (value, property) => standardizeEmbedded(documentClass, value, property),
				check: (value) => isEmbeddable(documentClass, value),
				toDb: (value) => value.serialize(),
				fromDb: (raw, property) => constructEmbedded(documentClass, raw, property)
			},
			options
		);
	}

	/** Embedded documents hold no links of their own */
	public deleteReference(): boolean {
		return false;
	}
}

export class EmbeddedDocumentsListProperty<T extends EmbeddableDocument> extends Property<
	EmbeddedDocumentList<T>,
	JsonObject[]
> {
	constructor(
		public readonly documentClass: EmbeddableDocumentClass<T>,
		options?: PropertyOptions<EmbeddedDocumentList<T>>
	) {
		super(
			'embeddedList',
			{
				standardize: (value, property) => {
					if (typeof value === 'object' && isIterable(value)) {
						return new EmbeddedDocumentList(documentClass, value);
					}
					throw new PropertyTypeError(
						`${describeValue(value)} is not a list of ${documentClass.name}`,
						property
					);
				},
				check: (value) =>
					value instanceof EmbeddedDocumentList ||
					(Array.isArray(value) && value.every((item) => isEmbeddable(documentClass, item))),
				toDb: (value) => value.toArray().map((document) => document.serialize()),
				fromDb: (raw, property) => {
					if (!Array.isArray(raw)) {
						throw new PropertyTypeError(`stored ${describeValue(raw)} is not a list`, property);
					}
					return new EmbeddedDocumentList(
						documentClass,
						raw.map((item) => constructEmbedded(documentClass, item, property))
					);
				},
				emptyDefault: () => new EmbeddedDocumentList(documentClass),
				toDbAbsent: () => []
			},
			options
		);
	}

	public deleteReference(): boolean {
		return false;
	}
}

export class EmbeddedDocumentsDictProperty<T extends EmbeddableDocument> extends Property<
	EmbeddedDocumentDict<T>,
	Record<string, JsonObject>
> {
	constructor(
		public readonly documentClass: EmbeddableDocumentClass<T>,
		options?: PropertyOptions<EmbeddedDocumentDict<T>>
	) {
		super(
			'embeddedDict',
			{
				standardize: (value, property) => {
					if (value instanceof EmbeddedDocumentDict || value instanceof Map || isRecord(value)) {
						return new EmbeddedDocumentDict(documentClass, value);
					}
					throw new PropertyTypeError(
						`${describeValue(value)} is not a mapping of ${documentClass.name}`,
						property
					);
				},
				check: (value) =>
					value instanceof EmbeddedDocumentDict ||
					(isRecord(value) &&
						Object.values(value).every((item) => isEmbeddable(documentClass, item))),
				toDb: (value) => {
					const serialized: Record<string, JsonObject> = {};
					for (const [key, document] of value) {
						serialized[key] = document.serialize();
					}
					return serialized;
				},
				fromDb: (raw, property) => {
					if (!isRecord(raw)) {
						throw new PropertyTypeError(`stored ${describeValue(raw)} is not a mapping`, property);
					}
					const documents = new EmbeddedDocumentDict(documentClass);
					for (const [key, item] of Object.entries(raw)) {
						documents.set(key, constructEmbedded(documentClass, item, property));
					}
					return documents;
				},
				emptyDefault: () => new EmbeddedDocumentDict(documentClass),
				toDbAbsent: () => ({})
			},
			options
		);
	}

	public deleteReference(): boolean {
		return false;
	}
}
