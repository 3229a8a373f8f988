import { z, ZodError } from 'zod';
import { ValidationError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';

export const SearchInputSchema = z.object({
    // Searched exactly as given; surrounding spaces are part of the keyword
    keyword: z.string().refine((k) => k.trim().length > 0, 'Keyword must not be empty'),
    minOccurrences: z.number().int().min(1).default(1),
});

export type SearchInput = z.infer<typeof SearchInputSchema>;

/**
 * Validate keyword and threshold, throwing ValidationError with the schema issues
 */
export function parseSearchInput(input: z.input<typeof SearchInputSchema>): SearchInput {
    try {
        return SearchInputSchema.parse(input);
    } catch (error) {
        if (error instanceof ZodError) {
            const details = error.issues.map((e) => ({
                path: e.path.join('.'),
                message: e.message,
            }));
            logger.warn({ details }, 'Search input validation failed');
            throw new ValidationError('Validation failed', { details });
        }
        throw error;
    }
}
