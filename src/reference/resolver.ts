import { z } from 'zod';
import { describeValue, PropertyConfigurationError, PropertyTypeError } from '../errors';
import type { ReferenceableDocument } from '../property/types';
import {
	ANY_DOCUMENT,
	type ReferenceSlot,
	type ReferenceTarget,
	type ReferenceValue
} from './types';

const referenceKindSchema = z.enum(['resolved', 'loadable']);

/**
 * Shape dispatch for reference values, shared by the three reference
 * properties. Raw input is classified once into a ReferenceSlot and
 * everything else works on the slot.
 */
export class ReferenceResolver<T extends ReferenceableDocument> {
	readonly #load: ((key: string) => T) | undefined;

	constructor(public readonly referenceClass: ReferenceTarget<T>) {
		if (referenceClass === ANY_DOCUMENT) {
			this.#load = undefined;
			return;
		}
		const kind = referenceKindSchema.safeParse(referenceClass.referenceKind);
		if (!kind.success) {
			throw new PropertyConfigurationError(
				`Reference property cannot be constructed with class '${referenceClass.name}'`
			);
		}
		const load = referenceClass.load;
		if (kind.data === 'loadable' && typeof load !== 'function') {
			throw new PropertyConfigurationError(
				`'${referenceClass.name}' is loadable but does not implement load()`
			);
		}
		this.#load = kind.data === 'loadable' ? load?.bind(referenceClass) : undefined;
	}

	get targetName(): string {
		return this.referenceClass === ANY_DOCUMENT ? 'document' : this.referenceClass.name;
	}

	public isInstance(value: unknown): value is T {
		if (this.referenceClass === ANY_DOCUMENT) {
			return (
				typeof value === 'object' && value !== null && 'key' in value && typeof value.key === 'string'
			);
		}
		return value instanceof this.referenceClass;
	}

	/**
	 * Classifies a value, returning undefined when it is neither a key, an
	 * instance of the reference class nor absent
	 */
	public toSlot(value: unknown): ReferenceSlot<T> | undefined {
		if (value === null || value === undefined) {
			return { kind: 'absent' };
		}
		if (typeof value === 'string') {
			return { kind: 'key', key: value };
		}
		if (this.isInstance(value)) {
			return { kind: 'instance', document: value };
		}
		return undefined;
	}

	/** Key or instance, never absent */
	public isPresentReference(value: unknown): boolean {
		const slot = this.toSlot(value);
		return slot !== undefined && slot.kind !== 'absent';
	}

	public standardize(value: unknown, property?: string): ReferenceValue<T> {
		const slot = this.toSlot(value);
		if (slot?.kind === 'key') {
			return slot.key;
		}
		if (slot?.kind === 'instance') {
			return slot.document;
		}
		throw this.#typeError(value, property);
	}

	/**
	 * Storage form of a present reference: its key
	 */
	public keyFor(value: unknown, property?: string): string {
		const key = this.keyOf(value);
		if (key === undefined) {
			throw this.#typeError(value, property);
		}
		return key;
	}

	public keyOf(value: unknown): string | undefined {
		const slot = this.toSlot(value);
		if (slot?.kind === 'key') {
			return slot.key;
		}
		return slot?.kind === 'instance' ? slot.document.key : undefined;
	}

	public toDb(value: unknown, property?: string): string | null {
		return this.toSlot(value)?.kind === 'absent' ? null : this.keyFor(value, property);
	}

	/**
	 * Resolves a raw key into a document when the reference class is
	 * loadable. Load failures propagate.
	 */
	public load(value: ReferenceValue<T> | null, property?: string): ReferenceValue<T> | null {
		const slot = this.toSlot(value);
		if (slot === undefined) {
			throw this.#typeError(value, property);
		}
		if (slot.kind !== 'key' || !this.#load) {
			return value;
		}
		return this.#load(slot.key);
	}

	#typeError(value: unknown, property: string | undefined): PropertyTypeError {
		return new PropertyTypeError(
			`reference to ${this.targetName} cannot hold ${describeValue(value)}`,
			property
		);
	}
}
