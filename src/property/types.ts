import type { JsonValue } from 'type-fest';

/**
 * Transform applied at one stage of the conversion pipeline
 */
export type Processor<TValue> = (value: TValue | null) => TValue | null;

export type Validator = (value: unknown) => boolean;

/**
 * Existence lookup against the storage client, used by unique properties
 */
export type ExistenceLookup = (value: unknown) => boolean;

export type OneOrMany<T> = T | readonly T[];

export type DefaultOption<TValue> = TValue | null | (() => TValue | null);

export type PropertyOptions<TValue> = {
	required?: boolean;
	unique?: boolean;
	/**
	 * Literal arrays, plain objects, sets and maps are copied for every
	 * document; anything else literal is shared, so use a factory for it
	 */
	default?: DefaultOption<TValue>;
	validators?: OneOrMany<Validator>;
	/**
	 * Applied on the raw input, absent values included, before the variant
	 * coerces it
	 */
	standardProcessors?: OneOrMany<Processor<unknown>>;
	/** Applied right before the value is converted to its storage form */
	forwardProcessors?: OneOrMany<Processor<TValue>>;
	/** Applied right after the value is read back from storage */
	backwardProcessors?: OneOrMany<Processor<TValue>>;
	existenceLookup?: ExistenceLookup;
};

export type PropertyKind =
	// scalar
	| 'string'
	| 'integer'
	| 'float'
	| 'boolean'
	| 'enum'
	| 'datetime'
	| 'dynamic'
	// collections
	| 'dict'
	| 'list'
	| 'set'
	// embedded documents
	| 'embedded'
	| 'embeddedDict'
	| 'embeddedList'
	// references
	| 'reference'
	| 'multiReference'
	| 'dictReference'
	// value added
	| 'password';

/**
 * Per-variant conversion strategy. Absent values never reach a codec: the
 * property handles `null`/`undefined` itself before delegating.
 */
export interface PropertyCodec<TValue, TDb extends JsonValue> {
	/** Coerces a present input value, throwing PropertyTypeError when it cannot */
	standardize(value: unknown, property: string | undefined): TValue;
	/** Structural domain check on a present value, must not throw */
	check?(value: unknown): boolean;
	toDb(value: TValue, property: string | undefined): TDb;
	fromDb(raw: unknown, property: string | undefined): TValue;
	/** Fresh empty value used when no default is configured */
	emptyDefault?(): TValue;
	/** Storage form written for an absent value, `null` when not given */
	toDbAbsent?(): TDb;
	/** Absent values are refused by standardize */
	rejectsAbsent?: boolean;
}

/**
 * Document holding raw per-field data, as seen by reference deletion
 */
export interface ReferencingDocument {
	_data: Record<string, unknown>;
}

/**
 * Anything addressable by a storage key
 */
export interface ReferenceableDocument {
	readonly key: string;
}

/**
 * Contract exposed to the document framework. The framework calls
 * `standardize` on attribute set, `validate` and `convertToDb` before a save
 * and `convertFromDb` after a load.
 */
export interface DocumentProperty<TValue = unknown, TDb extends JsonValue = JsonValue> {
	readonly kind: PropertyKind;
	readonly required: boolean;
	readonly unique: boolean;
	name: string | undefined;
	standardize(value: unknown): TValue | null;
	validate(value: unknown): boolean;
	convertToDb(value: TValue | null | undefined): TDb | null;
	convertFromDb(raw: unknown): TValue | null;
	defaultValue(): TValue | null;
	hasValue(value: unknown): boolean | null;
	deleteReference?(doc: ReferencingDocument, ref: ReferenceableDocument): boolean;
}
