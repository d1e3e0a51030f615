import _ from 'lodash';
import type { JsonValue } from 'type-fest';
import { describeValue, PropertyConfigurationError, PropertyTypeError } from '../errors';
import { collectionNameSchema, parseOptions } from '../property/options';
import { Property } from '../property/property';
import { isIterable, isRecord } from '../property/shape';
import type {
	PropertyCodec,
	PropertyKind,
	PropertyOptions,
	ReferenceableDocument,
	ReferencingDocument
} from '../property/types';
import { ReferenceResolver } from './resolver';
import type { ReferenceTarget, ReferenceValue } from './types';

export type ReferencePropertyOptions<TValue> = PropertyOptions<TValue> & {
	/** Name of the inverse link created on the referenced class */
	collectionName?: string;
};

/**
 * Shared state of the reference properties. The conversion stages come from
 * the codec each subclass builds on top of the resolver.
 */
export abstract class ReferenceBaseProperty<
	T extends ReferenceableDocument,
	TValue,
	TDb extends JsonValue
> extends Property<TValue, TDb> {
	public readonly collectionName: string | undefined;
	/** Set by the inverse-link registry on the property it synthesizes */
	public isReferenceBack = false;
	protected readonly resolver: ReferenceResolver<T>;

	protected constructor(
		kind: PropertyKind,
		resolver: ReferenceResolver<T>,
		codec: PropertyCodec<TValue, TDb>,
		options: ReferencePropertyOptions<TValue>
	) {
		const { collectionName, ...propertyOptions } = options;
		super(kind, codec, propertyOptions);
		this.collectionName = parseOptions(collectionNameSchema, collectionName, `${kind} property`);
		this.resolver = resolver;
	}

	get referenceClass(): ReferenceTarget<T> {
		return this.resolver.referenceClass;
	}

	/**
	 * Storage form of a single reference: the key of a document, a raw key
	 * unchanged, or null
	 */
	public attemptToDb(value: unknown): string | null {
		return this.resolver.toDb(value, this.name);
	}

	/**
	 * Drops `ref` from the field on `doc`, mutating the stored value in place.
	 * Returns whether anything was removed.
	 */
	public abstract deleteReference(doc: ReferencingDocument, ref: ReferenceableDocument): boolean;

	protected boundName(): string {
		if (this.name === undefined) {
			throw new PropertyConfigurationError(`${this.kind} property is not bound to a field`);
		}
		return this.name;
	}
}

/**
 * Reference to one document
 */
export class ReferenceProperty<T extends ReferenceableDocument> extends ReferenceBaseProperty<
	T,
	ReferenceValue<T>,
	string
> {
	constructor(
		referenceClass: ReferenceTarget<T>,
		options: ReferencePropertyOptions<ReferenceValue<T>> = {}
	) {
		const resolver = new ReferenceResolver(referenceClass);
		super(
			'reference',
			resolver,
			{
				standardize: (value, property) => resolver.standardize(value, property),
				check: (value) => resolver.isPresentReference(value),
				toDb: (value, property) => resolver.keyFor(value, property),
				fromDb: (raw, property) => storedKey(raw, property)
			},
			options
		);
	}

	public attemptLoad(value: ReferenceValue<T> | null): ReferenceValue<T> | null {
		return this.resolver.load(value, this.name);
	}

	public deleteReference(doc: ReferencingDocument): boolean {
		const name = this.boundName();
		const current = doc._data[name];
		if (current === null || current === undefined) {
			return false;
		}
		doc._data[name] = null;
		return true;
	}
}

/**
 * Ordered list of references
 */
export class MultiReferenceProperty<T extends ReferenceableDocument> extends ReferenceBaseProperty<
	T,
	ReferenceValue<T>[],
	string[]
> {
	constructor(
		referenceClass: ReferenceTarget<T>,
		options: ReferencePropertyOptions<ReferenceValue<T>[]> = {}
	) {
		const resolver = new ReferenceResolver(referenceClass);
		super(
			'multiReference',
			resolver,
			{
				standardize: (value, property) => {
					if (typeof value === 'string' || !isIterable(value)) {
						throw new PropertyTypeError(
							`${describeValue(value)} is not a list of references`,
							property
						);
					}
					return Array.from(value, (item) => resolver.standardize(item, property));
				},
				check: (value) =>
					Array.isArray(value) && value.every((item) => resolver.isPresentReference(item)),
				toDb: (value, property) => value.map((item) => resolver.keyFor(item, property)),
				fromDb: (raw, property) => {
					if (!Array.isArray(raw)) {
						throw new PropertyTypeError(`stored ${describeValue(raw)} is not a list`, property);
					}
					return raw.map((item) => storedKey(item, property));
				},
				emptyDefault: () => [],
				toDbAbsent: () => []
			},
			options
		);
	}

	public attemptLoad(values: ReferenceValue<T>[] | null): ReferenceValue<T>[] {
		if (values === null) {
			return [];
		}
		return values.map((value) => this.resolver.load(value, this.name) ?? value);
	}

	public deleteReference(doc: ReferencingDocument, ref: ReferenceableDocument): boolean {
		const current = doc._data[this.boundName()];
		if (!Array.isArray(current)) {
			return false;
		}
		const index = _.findIndex(current, (item) => this.resolver.keyOf(item) === ref.key);
		if (index === -1) {
			return false;
		}
		current.splice(index, 1);
		return true;
	}
}

/**
 * References keyed by arbitrary names. Inverse links cannot be derived from
 * it, so `collectionName` is refused.
 */
export class DictReferenceProperty<T extends ReferenceableDocument> extends ReferenceBaseProperty<
	T,
	Record<string, ReferenceValue<T>>,
	Record<string, string>
> {
	constructor(
		referenceClass: ReferenceTarget<T>,
		options: ReferencePropertyOptions<Record<string, ReferenceValue<T>>> = {}
	) {
		if (options.collectionName !== undefined) {
			throw new PropertyConfigurationError(
				'collectionName is not allowed on a dictReference property'
			);
		}
		const resolver = new ReferenceResolver(referenceClass);
		super(
			'dictReference',
			resolver,
			{
				standardize: (value, property) => {
					if (!isRecord(value)) {
						throw new PropertyTypeError(
							`${describeValue(value)} is not a mapping of references`,
							property
						);
					}
					return _.mapValues(value, (item) => resolver.standardize(item, property));
				},
				check: (value) =>
					isRecord(value) &&
					Object.values(value).every((item) => resolver.isPresentReference(item)),
				toDb: (value, property) => _.mapValues(value, (item) => resolver.keyFor(item, property)),
				fromDb: (raw, property) => {
					if (!isRecord(raw)) {
						throw new PropertyTypeError(`stored ${describeValue(raw)} is not a mapping`, property);
					}
					return _.mapValues(raw, (item) => storedKey(item, property));
				},
				emptyDefault: () => ({}),
				toDbAbsent: () => ({})
			},
			options
		);
	}

	public attemptLoad(
		values: Record<string, ReferenceValue<T>> | null
	): Record<string, ReferenceValue<T>> {
		if (values === null) {
			return {};
		}
		return _.mapValues(values, (value) => this.resolver.load(value, this.name) ?? value);
	}

	public deleteReference(doc: ReferencingDocument, ref: ReferenceableDocument): boolean {
		const current = doc._data[this.boundName()];
		if (!isRecord(current)) {
			return false;
		}
		const key = _.findKey(current, (item) => this.resolver.keyOf(item) === ref.key);
		if (key === undefined) {
			return false;
		}
		delete current[key];
		return true;
	}
}

function storedKey(raw: unknown, property: string | undefined): string {
	if (typeof raw !== 'string') {
		throw new PropertyTypeError(`stored reference ${describeValue(raw)} is not a key`, property);
	}
	return raw;
}
