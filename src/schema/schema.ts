import type { JsonObject } from 'type-fest';
import { PropertyConfigurationError, PropertyTypeError } from '../errors';
import type {
	DocumentProperty,
	ReferenceableDocument,
	ReferencingDocument
} from '../property/types';

export type SchemaViolation = {
	field: string;
	reason: 'required' | 'invalid';
};

/**
 * Field registry of one document class. Binds each property to its field
 * name and drives the property stages over whole records.
 */
export class DocumentSchema {
	readonly #properties = new Map<string, DocumentProperty>();

	constructor(properties: Record<string, DocumentProperty>) {
		for (const [field, property] of Object.entries(properties)) {
			if (property.name !== undefined && property.name !== field) {
				throw new PropertyConfigurationError(
					`property is already bound to field '${property.name}'`,
					field
				);
			}
			property.name = field;
			this.#properties.set(field, property);
		}
	}

	get fields(): string[] {
		return [...this.#properties.keys()];
	}

	public property(field: string): DocumentProperty | undefined {
		return this.#properties.get(field);
	}

	/**
	 * Standardizes every declared field, filling the missing ones with their
	 * default value
	 */
	public standardize(input: Record<string, unknown>): Record<string, unknown> {
		for (const field of Object.keys(input)) {
			if (!this.#properties.has(field)) {
				throw new PropertyTypeError('field is not declared', field);
			}
		}
		const result: Record<string, unknown> = {};
		for (const [field, property] of this.#properties) {
			result[field] = field in input ? property.standardize(input[field]) : property.defaultValue();
		}
		return result;
	}

	public validate(data: Record<string, unknown>): SchemaViolation[] {
		const violations: SchemaViolation[] = [];
		for (const [field, property] of this.#properties) {
			const value = data[field];
			if (value === null || value === undefined) {
				if (property.required) {
					violations.push({ field, reason: 'required' });
					continue;
				}
			}
			if (!property.validate(value)) {
				violations.push({ field, reason: 'invalid' });
			}
		}
		return violations;
	}

	public toDb(data: Record<string, unknown>): JsonObject {
		const result: JsonObject = {};
		for (const [field, property] of this.#properties) {
			result[field] = property.convertToDb(data[field]);
		}
		return result;
	}

	/**
	 * Fields missing from storage come back as their default value
	 */
	public fromDb(raw: Record<string, unknown>): Record<string, unknown> {
		const result: Record<string, unknown> = {};
		for (const [field, property] of this.#properties) {
			result[field] = property.convertFromDb(raw[field]);
		}
		return result;
	}

	/**
	 * Removes `ref` from every field of `doc` able to hold it, returning the
	 * fields that changed
	 */
	public deleteReferences(doc: ReferencingDocument, ref: ReferenceableDocument): string[] {
		const changed: string[] = [];
		for (const [field, property] of this.#properties) {
			if (property.deleteReference?.(doc, ref)) {
				changed.push(field);
			}
		}
		return changed;
	}

	public uniqueFields(): string[] {
		return this.fields.filter((field) => this.#properties.get(field)?.unique);
	}
}
