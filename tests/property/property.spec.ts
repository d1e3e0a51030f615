import { describe, expect, it, vi } from 'vitest';
import {
	DictProperty,
	IntegerProperty,
	PropertyConfigurationError,
	PropertyTypeError,
	StringProperty
} from '../../src/index';
import { present } from '../fixtures';

describe('Property', () => {
	describe('configuration', () => {
		it('should expose its flags and stay unbound after construction', () => {
			const property = new IntegerProperty({ required: true });
			expect(property.kind).toBe('integer');
			expect(property.required).toBe(true);
			expect(property.unique).toBe(false);
			expect(property.name).toBeUndefined();
		});
		it('should refuse a unique property without an existence lookup', () => {
			expect(() => new StringProperty({ unique: true })).toThrow(PropertyConfigurationError);
			expect(() => new StringProperty({ unique: true })).toThrow(
				'Invalid string property options: existenceLookup: unique properties need an existenceLookup'
			);
		});
		it('should refuse malformed options', () => {
			expect(() => Reflect.construct(StringProperty, [{ required: 'yes' }])).toThrow(
				PropertyConfigurationError
			);
			expect(() => Reflect.construct(StringProperty, [{ validators: ['not a function'] }])).toThrow(
				PropertyConfigurationError
			);
		});
	});

	describe('defaultValue', () => {
		it('should return null without a default', () => {
			expect(new StringProperty().defaultValue()).toBeNull();
		});
		it('should return a literal default as is', () => {
			expect(new StringProperty({ default: 'anonymous' }).defaultValue()).toBe('anonymous');
		});
		it('should copy literal containers for every call', () => {
			const property = new DictProperty({ default: { tags: ['a'] } });
			const first = present(property.defaultValue());
			expect(first).toEqual({ tags: ['a'] });
			expect(property.defaultValue()).not.toBe(first);
			expect(property.defaultValue()?.tags).not.toBe(first.tags);
		});
		it('should call a default factory every time', () => {
			let counter = 0;
			const property = new IntegerProperty({ default: () => ++counter });
			expect(property.defaultValue()).toBe(1);
			expect(property.defaultValue()).toBe(2);
		});
	});

	describe('standardize', () => {
		it('should keep absent values absent', () => {
			const property = new StringProperty();
			expect(property.standardize(null)).toBeNull();
			expect(property.standardize(undefined)).toBeNull();
		});
		it('should run the standard processors in order before coercion', () => {
			const property = new StringProperty({
				standardProcessors: [
					(value) => (typeof value === 'string' ? value.trim() : value),
					(value) => (typeof value === 'string' ? value.toLowerCase() : value)
				]
			});
			expect(property.standardize('  HeLLo ')).toBe('hello');
		});
		it('should coerce what the processors return', () => {
			const property = new IntegerProperty({
				standardProcessors: (value) => (typeof value === 'string' ? value.replace(/,/g, '') : value)
			});
			expect(property.standardize('1,000')).toBe(1000);
		});
		it('should hand absent values to the processors', () => {
			const property = new StringProperty({ standardProcessors: (value) => value ?? 'none' });
			expect(property.standardize(undefined)).toBe('none');
		});
		it('should refuse what the processors turn into something out of domain', () => {
			const property = new IntegerProperty({ standardProcessors: () => 'many' });
			expect(() => property.standardize(1)).toThrow(PropertyTypeError);
		});
	});

	describe('validate', () => {
		it('should pass anything in the domain without validators', () => {
			const property = new StringProperty();
			expect(property.validate('text')).toBe(true);
			expect(property.validate(null)).toBe(true);
		});
		it('should AND every validator', () => {
			const property = new StringProperty({
				validators: [
					(value) => typeof value === 'string',
					(value) => typeof value === 'string' && value.length >= 3
				]
			});
			expect(property.validate('ab')).toBe(false);
			expect(property.validate('abc')).toBe(true);
		});
		it('should accept a single validator and hand it null for absent values', () => {
			const validator = vi.fn((value: unknown) => value !== null);
			const property = new StringProperty({ validators: validator });
			expect(property.validate(undefined)).toBe(false);
			expect(validator).toHaveBeenCalledWith(null);
		});
		it('should not run validators once the domain check fails', () => {
			const validator = vi.fn(() => true);
			const property = new IntegerProperty({ validators: validator });
			expect(property.validate('twelve')).toBe(false);
			expect(validator).not.toHaveBeenCalled();
		});
	});

	describe('convertToDb', () => {
		it('should run the forward processors first', () => {
			const property = new StringProperty({
				forwardProcessors: (value) => (value === null ? null : `${value}!`)
			});
			expect(property.convertToDb('hi')).toBe('hi!');
		});
		it('should hand absent values to the forward processors', () => {
			expect(new StringProperty().convertToDb(null)).toBeNull();
			const property = new StringProperty({ forwardProcessors: (value) => value ?? 'none' });
			expect(property.convertToDb(undefined)).toBe('none');
		});
	});

	describe('convertFromDb', () => {
		it('should back-fill the default for absent values', () => {
			const property = new StringProperty({ default: 'anonymous' });
			expect(property.convertFromDb(null)).toBe('anonymous');
			expect(property.convertFromDb(undefined)).toBe('anonymous');
			expect(property.convertFromDb('kept')).toBe('kept');
		});
		it('should return null for absent values without a default', () => {
			expect(new StringProperty().convertFromDb(null)).toBeNull();
		});
		it('should run the backward processors after defaulting', () => {
			const property = new StringProperty({
				default: 'anonymous',
				backwardProcessors: (value) => value?.toUpperCase() ?? null
			});
			expect(property.convertFromDb(null)).toBe('ANONYMOUS');
		});
		it('should refuse stored values of the wrong shape', () => {
			expect(() => new IntegerProperty().convertFromDb('many')).toThrow(PropertyTypeError);
		});
	});

	describe('hasValue', () => {
		it('should return null when the property is not unique', () => {
			expect(new StringProperty().hasValue('anything')).toBeNull();
		});
		it('should delegate to the existence lookup when unique', () => {
			const existenceLookup = vi.fn((value: unknown) => value === 'taken');
			const property = new StringProperty({ unique: true, existenceLookup });
			expect(property.hasValue('taken')).toBe(true);
			expect(property.hasValue('free')).toBe(false);
			expect(existenceLookup).toHaveBeenCalledWith('taken');
		});
	});
});
