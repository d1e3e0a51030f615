import type { JsonObject } from 'type-fest';
import type { EmbeddableDocument, ReferenceableDocument, ReferenceKind } from '../src/index';

export class Point implements EmbeddableDocument {
	public x: number;
	public y: number;

	constructor(fields: Record<string, unknown> = {}) {
		this.x = Number(fields.x ?? 0);
		this.y = Number(fields.y ?? 0);
	}

	serialize(): JsonObject {
		return { x: this.x, y: this.y };
	}

	static constructObject(data: JsonObject): Point {
		return new Point(data);
	}
}

/** Always held as an instance */
export class Author implements ReferenceableDocument {
	static readonly referenceKind: ReferenceKind = 'resolved';

	constructor(public readonly key: string) {}
}

/** Loaded from an in-memory store by key */
export class Book implements ReferenceableDocument {
	static readonly referenceKind: ReferenceKind = 'loadable';
	static readonly store = new Map<string, Book>();

	constructor(
		public readonly key: string,
		public readonly title = ''
	) {}

	static load(key: string): Book {
		const book = Book.store.get(key);
		if (!book) {
			throw new Error(`Book ${key} not found`);
		}
		return book;
	}
}

/** Does not declare how it is referenced */
export class Note implements ReferenceableDocument {
	constructor(public readonly key: string) {}
}

export function present<T>(value: T | null): T {
	if (value === null) {
		throw new Error('Expected a value');
	}
	return value;
}
