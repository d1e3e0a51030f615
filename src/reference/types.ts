import type { ReferenceableDocument } from '../property/types';

/**
 * How a referenced class gets hold of its documents:
 * - resolved: values are always held as instances already
 * - loadable: raw keys are turned into instances through `load`
 */
export type ReferenceKind = 'resolved' | 'loadable';

export interface ReferenceableDocumentClass<T extends ReferenceableDocument> {
	new (...args: never[]): T;
	readonly name: string;
	readonly referenceKind?: ReferenceKind;
	load?(key: string): T;
}

/**
 * Reference target accepting any document that has a key
 */
export const ANY_DOCUMENT = Symbol('anyDocument');

export type ReferenceTarget<T extends ReferenceableDocument> =
	| ReferenceableDocumentClass<T>
	| typeof ANY_DOCUMENT;

/** A stored reference: either the raw key or the resolved document */
export type ReferenceValue<T extends ReferenceableDocument> = string | T;

export type ReferenceSlot<T extends ReferenceableDocument> =
	| { kind: 'key'; key: string }
	| { kind: 'instance'; document: T }
	| { kind: 'absent' };
