import { describe, expect, it, vi } from 'vitest';
import {
	DocumentSchema,
	IntegerProperty,
	ListProperty,
	MultiReferenceProperty,
	PropertyConfigurationError,
	PropertyTypeError,
	ReferenceProperty,
	StringProperty
} from '../../src/index';
import { Author, Book } from '../fixtures';

function librarySchema() {
	return new DocumentSchema({
		title: new StringProperty({ required: true }),
		pages: new IntegerProperty({ default: 100, validators: (value) => value === null || Number(value) > 0 }),
		tags: new ListProperty(),
		author: new ReferenceProperty(Author),
		books: new MultiReferenceProperty(Book),
		isbn: new StringProperty({ unique: true, existenceLookup: vi.fn(() => false) })
	});
}

describe('DocumentSchema', () => {
	it('should bind every property to its field', () => {
		const schema = librarySchema();
		expect(schema.fields).toEqual(['title', 'pages', 'tags', 'author', 'books', 'isbn']);
		expect(schema.property('pages')?.name).toBe('pages');
		expect(schema.property('missing')).toBeUndefined();
	});
	it('should refuse a property bound to another field', () => {
		const shared = new StringProperty();
		new DocumentSchema({ title: shared });
		expect(() => new DocumentSchema({ subtitle: shared })).toThrow(
			"subtitle: property is already bound to field 'title'"
		);
		expect(() => new DocumentSchema({ subtitle: shared })).toThrow(PropertyConfigurationError);
	});
	it('should standardize input and fill defaults', () => {
		const schema = librarySchema();
		expect(schema.standardize({ title: 42, pages: '12' })).toEqual({
			title: '42',
			pages: 12,
			tags: [],
			author: null,
			books: [],
			isbn: null
		});
	});
	it('should refuse undeclared fields', () => {
		expect(() => librarySchema().standardize({ subtitle: 'x' })).toThrow(
			'subtitle: field is not declared'
		);
		expect(() => librarySchema().standardize({ subtitle: 'x' })).toThrow(PropertyTypeError);
	});
	it('should report required and invalid fields', () => {
		const schema = librarySchema();
		expect(schema.validate({ pages: 0, author: 5 })).toEqual([
			{ field: 'title', reason: 'required' },
			{ field: 'pages', reason: 'invalid' },
			{ field: 'author', reason: 'invalid' }
		]);
		expect(schema.validate(schema.standardize({ title: 'Dune' }))).toEqual([]);
	});
	it('should convert whole records to storage and back', () => {
		const schema = librarySchema();
		const data = schema.standardize({
			title: 'Dune',
			author: new Author('a1'),
			books: ['b1']
		});
		const stored = schema.toDb(data);
		expect(stored).toEqual({
			title: 'Dune',
			pages: 100,
			tags: [],
			author: 'a1',
			books: ['b1'],
			isbn: null
		});
		expect(schema.fromDb({ title: 'Dune' })).toEqual({
			title: 'Dune',
			pages: 100,
			tags: [],
			author: null,
			books: [],
			isbn: null
		});
	});
	it('should delete references from every field holding them', () => {
		const schema = librarySchema();
		const doc = { _data: { title: 'Dune', author: 'a1', books: ['x', 'b1'] } };
		expect(schema.deleteReferences(doc, new Book('b1'))).toEqual(['author', 'books']);
		expect(doc._data).toEqual({ title: 'Dune', author: null, books: ['x'] });
	});
	it('should list unique fields', () => {
		expect(librarySchema().uniqueFields()).toEqual(['isbn']);
	});
});
