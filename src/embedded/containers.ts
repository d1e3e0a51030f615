import { isRecord } from '../property/shape';
import { standardizeEmbedded } from './standardize';
import type { EmbeddableDocument, EmbeddableDocumentClass } from './types';

/**
 * List of embedded documents. Items are standardized on every insertion, so
 * the list only ever holds instances of its document class. Mutation goes
 * through the methods below; the backing array is never handed out.
 */
export class EmbeddedDocumentList<T extends EmbeddableDocument> implements Iterable<T> {
	readonly #items: T[];

	constructor(
		public readonly documentClass: EmbeddableDocumentClass<T>,
		items: Iterable<unknown> = []
	) {
		this.#items = Array.from(items, (item) => this.#standardize(item));
	}

	get length(): number {
		return this.#items.length;
	}

	public at(index: number): T | undefined {
		return this.#items.at(index);
	}

	public append(item: unknown): void {
		this.#items.push(this.#standardize(item));
	}

	public insert(index: number, item: unknown): void {
		this.#items.splice(index, 0, this.#standardize(item));
	}

	public extend(items: Iterable<unknown>): void {
		// all or nothing
		const standardized = Array.from(items, (item) => this.#standardize(item));
		this.#items.push(...standardized);
	}

	public set(index: number, item: unknown): void {
		const position = index < 0 ? this.#items.length + index : index;
		if (position < 0 || position >= this.#items.length) {
			throw new RangeError(`Index ${index} is out of range for a list of ${this.#items.length}`);
		}
		this.#items[position] = this.#standardize(item);
	}

	public removeAt(index: number): T | undefined {
		const position = index < 0 ? this.#items.length + index : index;
		if (position < 0 || position >= this.#items.length) {
			return undefined;
		}
		return this.#items.splice(position, 1)[0];
	}

	public indexOf(item: T): number {
		return this.#items.indexOf(item);
	}

	public clear(): void {
		this.#items.length = 0;
	}

	public toArray(): T[] {
		return [...this.#items];
	}

	[Symbol.iterator](): Iterator<T> {
		return this.#items[Symbol.iterator]();
	}

	#standardize(item: unknown): T {
		return standardizeEmbedded(this.documentClass, item);
	}
}

export type EmbeddedEntries = Record<string, unknown> | Iterable<readonly [string, unknown]>;

/**
 * String-keyed map of embedded documents, standardizing values the same way
 * EmbeddedDocumentList does.
 */
export class EmbeddedDocumentDict<T extends EmbeddableDocument> implements Iterable<[string, T]> {
	readonly #entries = new Map<string, T>();

	constructor(
		public readonly documentClass: EmbeddableDocumentClass<T>,
		entries?: EmbeddedEntries
	) {
		if (entries) {
			this.update(entries);
		}
	}

	get size(): number {
		return this.#entries.size;
	}

	public get(key: string): T | undefined {
		return this.#entries.get(key);
	}

	public has(key: string): boolean {
		return this.#entries.has(key);
	}

	public set(key: string, item: unknown): this {
		this.#entries.set(key, this.#standardize(item));
		return this;
	}

	/**
	 * Returns the document stored under `key`, storing `fallback` there first
	 * when the key is missing
	 */
	public setdefault(key: string, fallback: unknown): T {
		const existing = this.#entries.get(key);
		if (existing !== undefined) {
			return existing;
		}
		const item = this.#standardize(fallback);
		this.#entries.set(key, item);
		return item;
	}

	public update(entries: EmbeddedEntries): void {
		const pairs: Array<readonly [string, unknown]> = isRecord(entries)
			? Object.entries(entries)
			: Array.from(entries);
		// standardize everything before touching the map, so a bad value leaves it unchanged
		const standardized = pairs.map(([key, item]): [string, T] => [key, this.#standardize(item)]);
		for (const [key, item] of standardized) {
			this.#entries.set(key, item);
		}
	}

	public delete(key: string): boolean {
		return this.#entries.delete(key);
	}

	public clear(): void {
		this.#entries.clear();
	}

	public keys(): IterableIterator<string> {
		return this.#entries.keys();
	}

	public values(): IterableIterator<T> {
		return this.#entries.values();
	}

	public entries(): IterableIterator<[string, T]> {
		return this.#entries.entries();
	}

	public toObject(): Record<string, T> {
		return Object.fromEntries(this.#entries);
	}

	[Symbol.iterator](): Iterator<[string, T]> {
		return this.#entries[Symbol.iterator]();
	}

	#standardize(item: unknown): T {
		return standardizeEmbedded(this.documentClass, item);
	}
}
