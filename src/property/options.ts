import { z, ZodError, type ZodTypeAny } from 'zod';
import { PropertyConfigurationError } from '../errors';

const callable = z.custom<(...args: never[]) => unknown>((value) => typeof value === 'function', {
	message: 'Expected a function'
});
const callables = z.union([callable, z.array(callable)]).optional();

export const propertyOptionsSchema = z
	.object({
		required: z.boolean().optional(),
		unique: z.boolean().optional(),
		default: z.unknown().optional(),
		validators: callables,
		standardProcessors: callables,
		forwardProcessors: callables,
		backwardProcessors: callables,
		existenceLookup: callable.optional()
	})
	.refine((options) => !options.unique || options.existenceLookup !== undefined, {
		message: 'unique properties need an existenceLookup',
		path: ['existenceLookup']
	});

export const enumValuesSchema = z
	.array(z.string())
	.nonempty()
	.refine((values) => new Set(values).size === values.length, {
		message: 'enum values must be distinct'
	});

export const collectionNameSchema = z.string().min(1).optional();

/**
 * Parses construction input, turning zod issues into a configuration error
 */
export function parseOptions<TSchema extends ZodTypeAny>(
	schema: TSchema,
	input: unknown,
	context: string
): z.output<TSchema> {
	try {
		return schema.parse(input);
	} catch (error) {
		if (error instanceof ZodError) {
			const issues = error.issues
				.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ` : '') + issue.message)
				.join(', ');
			throw new PropertyConfigurationError(`Invalid ${context} options: ${issues}`);
		}
		throw error;
	}
}
