import type { JsonObject } from 'type-fest';

/**
 * Document stored inline within its parent
 */
export interface EmbeddableDocument {
	serialize(): JsonObject;
}

export interface EmbeddableDocumentClass<T extends EmbeddableDocument> {
	/** Builds an instance from keyword fields */
	new (fields: Record<string, unknown>): T;
	/** Rebuilds an instance from its serialized form */
	constructObject(data: JsonObject): T;
	readonly name: string;
}
