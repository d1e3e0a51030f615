import stringify from 'safe-stable-stringify';

/**
 * Base class of every error raised by the property layer
 */
export class PropertyError extends Error {
	constructor(
		message: string,
		public readonly property?: string
	) {
		super(property ? `${property}: ${message}` : message);
		this.name = 'PropertyError';
	}
}

/**
 * Raised at construction time (or on first use of an unbound property) when a
 * property is set up in a way it cannot work with
 */
export class PropertyConfigurationError extends PropertyError {
	constructor(message: string, property?: string) {
		super(message, property);
		this.name = 'PropertyConfigurationError';
	}
}

/**
 * Raised when a value has no valid coercion into the property's domain or its
 * storage form
 */
export class PropertyTypeError extends PropertyError {
	constructor(message: string, property?: string) {
		super(message, property);
		this.name = 'PropertyTypeError';
	}
}

export function describeValue(value: unknown): string {
	if (typeof value === 'function') {
		return `[function ${value.name || 'anonymous'}]`;
	}
	if (typeof value === 'symbol' || typeof value === 'bigint') {
		return value.toString();
	}
	if (value instanceof Set || value instanceof Map) {
		return `${value.constructor.name}(${stringify([...value]) ?? ''})`;
	}
	if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
		const name = value.constructor?.name;
		if (name && name !== 'Object') {
			return `${name} ${stringify(value) ?? ''}`.trim();
		}
	}
	return stringify(value) ?? String(value);
}
