import { pbkdf2Sync, randomBytes, timingSafeEqual } from 'node:crypto';

/**
 * Hashing primitives used by PasswordProperty
 */
export interface PasswordHasher {
	generateSalt(): string;
	hashPassword(plainText: string, salt: string): string;
	/** Falls back to comparing `hashPassword` output when missing */
	checkPassword?(plainText: string, salt: string, hash: string): boolean;
}

const DIGEST = 'sha256';
const ITERATIONS = 100000;
const KEY_LENGTH = 32;
const SALT_LENGTH = 16;

function hashPassword(plainText: string, salt: string): string {
	return pbkdf2Sync(plainText, salt, ITERATIONS, KEY_LENGTH, DIGEST).toString('hex');
}

/**
 * PBKDF2 with SHA-256 over a random hex salt, digests as hex
 */
export const pbkdf2Hasher: PasswordHasher = {
	generateSalt: () => randomBytes(SALT_LENGTH).toString('hex'),
	hashPassword,
	checkPassword: (plainText, salt, hash) => {
		const expected = Buffer.from(hashPassword(plainText, salt), 'utf8');
		const actual = Buffer.from(hash, 'utf8');
		return expected.length === actual.length && timingSafeEqual(expected, actual);
	}
};
