import _ from 'lodash';
import type { JsonValue } from 'type-fest';
import { PropertyConfigurationError, PropertyTypeError } from '../errors';
import { parseOptions, propertyOptionsSchema } from './options';
import { applyProcessors, toList } from './pipeline';
import { isRecord } from './shape';
import type {
	DefaultOption,
	DocumentProperty,
	ExistenceLookup,
	Processor,
	PropertyCodec,
	PropertyKind,
	PropertyOptions,
	Validator
} from './types';

/**
 * One declared document field.
 *
 * The four conversion stages always run in the same order, whatever the
 * variant:
 * - standardize: the standard processors see the raw input, then absent
 *   results stay absent and present ones are coerced by the codec
 * - validate: codec check on present values AND every validator
 * - convertToDb: forward processors, then the codec's storage form
 * - convertFromDb: codec decoding, default back-fill for absent values, then
 *   the backward processors
 *
 * Instances are shared by every document of a class and hold no per-document
 * state. Only `name` is assigned after construction, by the document
 * framework.
 */
export class Property<TValue, TDb extends JsonValue> implements DocumentProperty<TValue, TDb> {
	public name: string | undefined;
	public readonly required: boolean;
	public readonly unique: boolean;

	readonly #codec: PropertyCodec<TValue, TDb>;
	readonly #default: () => TValue | null;
	readonly #validators: readonly Validator[];
	readonly #standardProcessors: readonly Processor<unknown>[];
	readonly #forwardProcessors: readonly Processor<TValue>[];
	readonly #backwardProcessors: readonly Processor<TValue>[];
	readonly #existenceLookup: ExistenceLookup | undefined;

	constructor(
		public readonly kind: PropertyKind,
		codec: PropertyCodec<TValue, TDb>,
		options: PropertyOptions<TValue> = {}
	) {
		parseOptions(propertyOptionsSchema, options, `${kind} property`);
		this.#codec = codec;
		this.required = options.required ?? false;
		this.unique = options.unique ?? false;
		this.#default = toDefaultFactory(options.default);
		this.#validators = toList(options.validators);
		this.#standardProcessors = toList(options.standardProcessors);
		this.#forwardProcessors = toList(options.forwardProcessors);
		this.#backwardProcessors = toList(options.backwardProcessors);
		this.#existenceLookup = options.existenceLookup;
	}

	public standardize(value: unknown): TValue | null {
		const processed = applyProcessors<unknown>(value ?? null, this.#standardProcessors);
		if (processed === null || processed === undefined) {
			if (this.#codec.rejectsAbsent) {
				throw new PropertyTypeError(`${this.kind} property does not accept ${processed}`, this.name);
			}
			return null;
		}
		return this.#codec.standardize(processed, this.name);
	}

	public validate(value: unknown): boolean {
		const present = value !== null && value !== undefined;
		if (present && this.#codec.check && !this.#codec.check(value)) {
			return false;
		}
		return this.#validators.every((validator) => validator(value ?? null));
	}

	public convertToDb(value: TValue | null | undefined): TDb | null {
		const processed = applyProcessors(value ?? null, this.#forwardProcessors);
		if (processed === null || processed === undefined) {
			return this.#codec.toDbAbsent ? this.#codec.toDbAbsent() : null;
		}
		return this.#codec.toDb(processed, this.name);
	}

	public convertFromDb(raw: unknown): TValue | null {
		const decoded = raw === null || raw === undefined ? null : this.#codec.fromDb(raw, this.name);
		// Fields added to a schema after a record was written come back absent
		const value = decoded ?? this.defaultValue();
		return applyProcessors(value, this.#backwardProcessors);
	}

	public defaultValue(): TValue | null {
		const resolved = this.#default();
		if (resolved !== null && resolved !== undefined) {
			return resolved;
		}
		return this.#codec.emptyDefault ? this.#codec.emptyDefault() : null;
	}

	/**
	 * Asks the storage client whether a value is already taken. Returns null
	 * for properties that are not unique; enforcing uniqueness is up to the
	 * caller.
	 */
	public hasValue(value: unknown): boolean | null {
		if (!this.unique) {
			return null;
		}
		if (!this.#existenceLookup) {
			throw new PropertyConfigurationError('unique property has no existence lookup', this.name);
		}
		return this.#existenceLookup(value);
	}
}

function toDefaultFactory<TValue>(option: DefaultOption<TValue> | undefined): () => TValue | null {
	if (isDefaultFactory(option)) {
		return option;
	}
	const value = option ?? null;
	return isMutableLiteral(value) ? () => _.cloneDeep(value) : () => value;
}

function isMutableLiteral(value: unknown): boolean {
	return Array.isArray(value) || isRecord(value) || value instanceof Set || value instanceof Map;
}

function isDefaultFactory<TValue>(
	option: DefaultOption<TValue> | undefined
): option is () => TValue | null {
	return typeof option === 'function';
}
