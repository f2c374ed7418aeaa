/**
 * Settings Zod schemas and validation.
 */
import { z } from 'zod'

import type { Settings, SettingsInput } from './types.js'


/**
 * Log verbosity levels.
 */
export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'verbose'], {
    errorMap: () => ({ message: 'Log level must be one of silent, error, warn, info, verbose' }),
})

const MaxBytesSchema = z
    .number({ invalid_type_error: 'Max bytes billed must be a number' })
    .int('Max bytes billed must be an integer')
    .nonnegative('Max bytes billed must not be negative')


/**
 * Fully resolved settings schema.
 */
export const SettingsSchema = z.object({
    templatesRoot: z.string().trim().min(1, 'Templates root must not be empty').default('./templates'),
    project: z.string().trim().min(1, 'Project must not be empty').optional(),
    location: z.string().trim().min(1, 'Location must not be empty').default('US'),
    maxBytesBilled: MaxBytesSchema.optional(),
    logLevel: LogLevelSchema.default('info'),
})


/**
 * Schema of the `sqljob.yml` settings file.
 *
 * Keys are snake_case like the job spec; unknown keys are rejected so a
 * typo does not silently fall back to a default.
 */
export const SettingsFileSchema = z
    .object(
        {
            templates_root: z.string().optional(),
            project: z.string().optional(),
            location: z.string().optional(),
            max_bytes_billed: MaxBytesSchema.optional(),
            log_level: LogLevelSchema.optional(),
        },
        { invalid_type_error: 'Settings file must be a mapping' },
    )
    .strict()
    .transform((file): SettingsInput => ({
        templatesRoot: file.templates_root,
        project: file.project,
        location: file.location,
        maxBytesBilled: file.max_bytes_billed,
        logLevel: file.log_level,
    }))


/**
 * Error thrown when settings validation fails.
 *
 * Includes the field that failed and every validation issue.
 */
export class SettingsValidationError extends Error {

    override readonly name = 'SettingsValidationError' as const

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message)
    }
}


/**
 * Error thrown when a settings file cannot be read or parsed.
 */
export class SettingsFileError extends Error {

    override readonly name = 'SettingsFileError' as const

    constructor(
        public readonly filepath: string,
        public readonly reason: string,
    ) {

        super(`Cannot load settings file '${filepath}': ${reason}`)
    }
}


/**
 * Convert a failed parse into a SettingsValidationError.
 */
function toValidationError(error: z.ZodError): SettingsValidationError {

    const firstIssue = error.issues[0]
    const field = firstIssue?.path.join('.') || 'unknown'

    return new SettingsValidationError(
        firstIssue ? `Invalid setting '${field}': ${firstIssue.message}` : 'Validation failed',
        field,
        error.issues,
    )
}


/**
 * Parse and validate settings, applying defaults for missing fields.
 *
 * @throws SettingsValidationError if validation fails
 *
 * @example
 * ```typescript
 * const settings = parseSettings({ project: 'acme-data' })
 * // settings.location === 'US' (default)
 * // settings.templatesRoot === './templates' (default)
 * ```
 */
export function parseSettings(input: unknown): Settings {

    const result = SettingsSchema.safeParse(input)

    if (!result.success) {

        throw toValidationError(result.error)
    }

    return result.data
}


/**
 * Parse the contents of a settings file.
 *
 * @throws SettingsValidationError if the file has unknown keys or bad values
 */
export function parseSettingsFile(data: unknown): SettingsInput {

    const result = SettingsFileSchema.safeParse(data ?? {})

    if (!result.success) {

        throw toValidationError(result.error)
    }

    return result.data
}
