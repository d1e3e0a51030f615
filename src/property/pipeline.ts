import type { OneOrMany, Processor } from './types';

/**
 * Threads a value through a single processor or a sequence of them, left to
 * right. An empty sequence is the identity.
 */
export function applyProcessors<TValue>(
	value: TValue | null,
	processors: OneOrMany<Processor<TValue>>
): TValue | null {
	if (typeof processors === 'function') {
		return processors(value);
	}
	return processors.reduce<TValue | null>((current, processor) => processor(current), value);
}

export function toList<T>(value: OneOrMany<T> | undefined): readonly T[] {
	if (value === undefined) {
		return [];
	}
	return isList(value) ? value : [value];
}

function isList<T>(value: OneOrMany<T>): value is readonly T[] {
	return Array.isArray(value);
}
