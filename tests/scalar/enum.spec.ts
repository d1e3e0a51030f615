import { describe, expect, it } from 'vitest';
import { EnumProperty, PropertyConfigurationError, PropertyTypeError } from '../../src/index';

describe('EnumProperty', () => {
	const property = new EnumProperty(['a', 'b', 'c']);

	it('should store labels as indexes', () => {
		expect(property.convertToDb('b')).toBe(1);
		expect(property.convertFromDb(1)).toBe('b');
		expect(property.convertFromDb(null)).toBeNull();
	});
	it('should map indexes to labels on standardize', () => {
		expect(property.standardize(2)).toBe('c');
		expect(property.standardize('a')).toBe('a');
		expect(property.standardize(null)).toBeNull();
	});
	it('should pass unknown labels through standardize and reject them on validate', () => {
		expect(property.standardize('z')).toBe('z');
		expect(property.validate('z')).toBe(false);
		expect(property.validate('a')).toBe(true);
		expect(property.validate(null)).toBe(true);
		expect(property.validate(1)).toBe(false);
	});
	it('should refuse values outside the labels and indexes', () => {
		expect(() => property.standardize(5)).toThrow(PropertyTypeError);
		expect(() => property.standardize(true)).toThrow(
			'enum property only accepts labels and indexes, not true'
		);
		expect(() => property.convertToDb('z')).toThrow('"z" is not one of the enum values');
		expect(() => property.convertFromDb(7)).toThrow('7 is not an enum index');
	});
	it('should back-fill its default from storage', () => {
		expect(new EnumProperty(['a', 'b'], { default: 'a' }).convertFromDb(undefined)).toBe('a');
	});
	it('should require distinct labels', () => {
		expect(() => new EnumProperty([])).toThrow(PropertyConfigurationError);
		expect(() => new EnumProperty(['a', 'a'])).toThrow(
			'Invalid enum property options: enum values must be distinct'
		);
	});
	it('should expose its labels', () => {
		expect(property.values).toEqual(['a', 'b', 'c']);
	});
});
