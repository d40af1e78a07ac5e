/**
 * Query request contract
 */

import { z } from 'zod';
import { DEFAULT_MAX_RECORDS, DEFAULT_REGIONS, MAX_RECORDS_LIMIT } from '../config/index.js';
import { InvalidArgumentError } from './errors.js';

// Values are echoed back as given, so blanks are rejected without trimming
const nonBlank = (message: string) => z.string().refine((value) => value.trim().length > 0, message);

export const queryRequestSchema = z.object({
    service_code: nonBlank('service_code is required'),
    regions: z
        .array(nonBlank('region must not be blank'))
        .min(1, 'regions must name at least one region')
        .default([...DEFAULT_REGIONS]),
    filters: z.record(z.string(), z.string({ invalid_type_error: 'filter values must be strings' })).default({}),
    max_records: z
        .number()
        .int('max_records must be an integer')
        .min(1, 'max_records must be at least 1')
        .max(MAX_RECORDS_LIMIT, `max_records must not exceed ${MAX_RECORDS_LIMIT}`)
        .default(DEFAULT_MAX_RECORDS),
    result_file_path: z.string().min(1).optional(),
});

export type QueryRequestInput = z.input<typeof queryRequestSchema>;
export type QueryRequest = z.output<typeof queryRequestSchema>;

/**
 * Validate raw invocation arguments, collecting every issue into one error
 */
export function parseQueryRequest(args: unknown): QueryRequest {
    const result = queryRequestSchema.safeParse(args);

    if (!result.success) {
        const issues = result.error.issues.map((issue) =>
            issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
        );
        throw new InvalidArgumentError(`Invalid pricing query: ${issues.join('; ')}`, issues);
    }

    return result.data;
}
