/**
 * Job spec Zod schemas.
 *
 * `JobStructureSchema` checks required fields and field shapes without
 * touching variables or the schedule, which the validator checks in later
 * passes with their own messages. `parseJobSpecData` turns a document that
 * passed validation into a typed `JobSpec` with defaults applied.
 */
import { z } from 'zod'

import type { JobSpec, QuerySpec } from './types.js'


/**
 * Non-empty string with a field label in its messages.
 */
function requiredString(label: string) {

    return z
        .string({
            required_error: `${label} is required`,
            invalid_type_error: `${label} must be a string`,
        })
        .trim()
        .min(1, `${label} must not be empty`)
}


/**
 * Split `dataset.table` or `project.dataset.table` into a destination mapping.
 *
 * Any other string is passed through so the object schema rejects it.
 */
function splitTableId(value: unknown): unknown {

    if (typeof value !== 'string') {

        return value
    }

    const parts = value.trim().split('.')

    if (parts.some((part) => part.length === 0)) {

        return value
    }

    if (parts.length === 2) {

        const [dataset, table] = parts

        return { dataset, table }
    }

    if (parts.length === 3) {

        const [project, dataset, table] = parts

        return { project, dataset, table }
    }

    return value
}


/**
 * Destination table: a mapping or a dotted table id.
 */
export const DestinationSchema = z.preprocess(
    splitTableId,
    z.object(
        {
            project: requiredString('Destination project').optional(),
            dataset: requiredString('Destination dataset'),
            table: requiredString('Destination table'),
        },
        {
            required_error: 'Destination is required',
            invalid_type_error: "Destination must be 'dataset.table', 'project.dataset.table' or a mapping with dataset and table",
        },
    ),
)


/**
 * Write disposition, case-insensitive.
 */
export const WriteDispositionSchema = z
    .string({ invalid_type_error: 'Write disposition must be a string' })
    .transform((value) => value.trim().toUpperCase())
    .pipe(
        z.enum(['WRITE_TRUNCATE', 'WRITE_APPEND', 'WRITE_EMPTY'], {
            errorMap: () => ({
                message: 'Write disposition must be one of WRITE_TRUNCATE, WRITE_APPEND, WRITE_EMPTY',
            }),
        }),
    )


/**
 * Deployment environment.
 */
export const EnvironmentSchema = z.enum(['dev', 'stage', 'prod'], {
    errorMap: () => ({ message: 'Environment must be one of dev, stage, prod' }),
})


const LabelsSchema = z.record(
    z.string(),
    z.string({ invalid_type_error: 'Label values must be strings' }),
    { invalid_type_error: 'Labels must be a mapping of strings' },
)


const LimitsSchema = z.object(
    {
        max_bytes_billed: z
            .number({
                required_error: 'max_bytes_billed is required',
                invalid_type_error: 'max_bytes_billed must be a number',
            })
            .int('max_bytes_billed must be an integer')
            .nonnegative('max_bytes_billed must not be negative'),
    },
    { invalid_type_error: 'Limits must be a mapping' },
)


/**
 * Structure of one query entry. Variables are checked separately.
 */
const QueryStructureSchema = z.object(
    {
        name: requiredString('Query name'),
        template: requiredString('Template path'),
        variables: z.unknown().optional(),
        write_disposition: WriteDispositionSchema.optional(),
        destination: DestinationSchema.optional(),
    },
    { invalid_type_error: 'Each query must be a mapping' },
)


/**
 * Structure of the whole job. Defaults, variables and schedule are checked
 * by later validator passes.
 */
export const JobStructureSchema = z.object({
    job_name: requiredString('Job name'),
    defaults: z.unknown().optional(),
    destination: DestinationSchema,
    schedule: z.unknown().optional(),
    write_disposition: WriteDispositionSchema.optional(),
    labels: LabelsSchema.optional(),
    environment: EnvironmentSchema.optional(),
    limits: LimitsSchema.optional(),
    queries: z
        .array(QueryStructureSchema, {
            required_error: 'Queries are required',
            invalid_type_error: 'Queries must be a list',
        })
        .min(1, 'At least one query is required'),
})


const ScalarSchema = z.union([z.string(), z.number(), z.boolean()])

const VariablesSchema = z
    .record(z.string(), ScalarSchema)
    .nullish()
    .transform((value) => value ?? {})


/**
 * Full schema used once validation has passed.
 */
const JobSpecSchema = JobStructureSchema.extend({
    defaults: VariablesSchema,
    schedule: z
        .string()
        .trim()
        .nullish()
        .transform((value) => value ?? undefined),
    queries: z
        .array(
            QueryStructureSchema.extend({
                variables: VariablesSchema,
            }),
        )
        .min(1),
})


/**
 * Format a Zod issue path as a dotted path with bracketed indices.
 *
 * @example
 * ```typescript
 * formatPath(['queries', 2, 'template'])  // 'queries[2].template'
 * formatPath([])                          // '(root)'
 * ```
 */
export function formatPath(path: ReadonlyArray<string | number>): string {

    let out = ''

    for (const segment of path) {

        if (typeof segment === 'number') {

            out += `[${segment}]`
        }
        else {

            out += out.length === 0 ? segment : `.${segment}`
        }
    }

    return out.length === 0 ? '(root)' : out
}


/**
 * Parse validated document data into a typed job spec.
 *
 * Applies defaults (`WRITE_TRUNCATE`, empty variables and labels) and
 * mirrors the environment into the labels.
 *
 * @throws ZodError when the data does not match; callers validate first
 */
export function parseJobSpecData(data: unknown): JobSpec {

    const parsed = JobSpecSchema.parse(data)

    const labelled = EnvironmentSchema.safeParse(parsed.labels?.['environment'])
    const environment = parsed.environment ?? (labelled.success ? labelled.data : undefined)
    const labels: Record<string, string> = { ...parsed.labels }

    if (environment) {

        labels['environment'] = environment
    }

    const writeDisposition = parsed.write_disposition ?? 'WRITE_TRUNCATE'

    const queries: QuerySpec[] = parsed.queries.map((query) => ({
        name: query.name,
        template: query.template,
        variables: query.variables,
        write_disposition: query.write_disposition ?? writeDisposition,
        destination: query.destination,
    }))

    return {
        job_name: parsed.job_name,
        defaults: parsed.defaults,
        destination: parsed.destination,
        schedule: parsed.schedule,
        write_disposition: writeDisposition,
        labels,
        environment,
        limits: parsed.limits,
        queries,
    }
}
