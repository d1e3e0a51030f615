import { isRecord } from '../property/shape';

/**
 * Record whose members are reachable with dot notation. Every write goes
 * through the proxy, so a nested plain object can never be stored without
 * being turned into a dot-dict first.
 */
export type DotDict = Record<string, unknown>;

const dotDicts = new WeakSet<object>();

export function isDotDict(value: unknown): value is DotDict {
	return typeof value === 'object' && value !== null && dotDicts.has(value);
}

export function createDotDict(
	source?: Record<string, unknown> | ReadonlyMap<string, unknown> | null
): DotDict {
	const dict = new Proxy<DotDict>(
		{},
		{
			// plain assignment and Object.assign both end up here
			defineProperty(target, key, descriptor) {
				if (typeof key === 'string' && 'value' in descriptor) {
					return Reflect.defineProperty(target, key, {
						...descriptor,
						value: toDotDictEntry(descriptor.value)
					});
				}
				return Reflect.defineProperty(target, key, descriptor);
			}
		}
	);
	dotDicts.add(dict);
	if (source) {
		Object.assign(dict, source instanceof Map ? Object.fromEntries(source) : source);
	}
	return dict;
}

function toDotDictEntry(value: unknown): unknown {
	return isRecord(value) && !isDotDict(value) ? createDotDict(value) : value;
}
