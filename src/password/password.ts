import type { JsonObject } from 'type-fest';
import { z } from 'zod';
import { describeValue, PropertyTypeError } from '../errors';
import { Property } from '../property/property';
import type { PropertyOptions } from '../property/types';
import { pbkdf2Hasher, type PasswordHasher } from './hasher';

export type PasswordDigest = {
	readonly salt: string;
	readonly hash: string;
};

export type PasswordPropertyOptions = PropertyOptions<PasswordDigest> & {
	hasher?: PasswordHasher;
};

const passwordDigestSchema = z.object({
	salt: z.string(),
	hash: z.string()
});

/**
 * Salted password hash. Assigning plain text hashes it with a fresh salt;
 * reading it back from storage never hashes again.
 */
export class PasswordProperty extends Property<PasswordDigest, JsonObject> {
	readonly #hasher: PasswordHasher;

	constructor(options: PasswordPropertyOptions = {}) {
		const { hasher = pbkdf2Hasher, ...propertyOptions } = options;
		super(
			'password',
			{
				rejectsAbsent: true,
				standardize: (value, property) => {
					if (typeof value !== 'string') {
						throw new PropertyTypeError(
							`password must be a string, not ${describeValue(value)}`,
							property
						);
					}
					const salt = hasher.generateSalt();
					return Object.freeze({ salt, hash: hasher.hashPassword(value, salt) });
				},
				toDb: (value) => ({ salt: value.salt, hash: value.hash }),
				fromDb: (raw, property) => toDigest(raw, property)
			},
			propertyOptions
		);
		this.#hasher = hasher;
	}

	/**
	 * Checks plain text against a digest, either standardized or as stored
	 */
	public verify(plainText: string, stored: unknown): boolean {
		const { salt, hash } = toDigest(stored, this.name);
		if (this.#hasher.checkPassword) {
			return this.#hasher.checkPassword(plainText, salt, hash);
		}
		return this.#hasher.hashPassword(plainText, salt) === hash;
	}
}

function toDigest(raw: unknown, property: string | undefined): PasswordDigest {
	const parsed = passwordDigestSchema.safeParse(raw);
	if (!parsed.success) {
		throw new PropertyTypeError(`${describeValue(raw)} is not a password digest`, property);
	}
	return Object.freeze({ salt: parsed.data.salt, hash: parsed.data.hash });
}
