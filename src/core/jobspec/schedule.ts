/**
 * Schedule string checks.
 *
 * Accepts either a warehouse interval phrase (`every 24 hours`,
 * `every monday 09:00`) or a five-field cron expression.
 *
 * @example
 * ```typescript
 * checkSchedule('every 24 hours')  // null
 * checkSchedule('0 6 * * 1-5')     // null
 * checkSchedule('61 * * * *')      // "minute value '61' is outside 0-59"
 * ```
 */


interface CronField {

    name: string
    min: number
    max: number
    names?: string[]
}


const MONTH_NAMES = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec']
const DAY_NAMES = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat']

const CRON_FIELDS: CronField[] = [
    { name: 'minute', min: 0, max: 59 },
    { name: 'hour', min: 0, max: 23 },
    { name: 'day-of-month', min: 1, max: 31 },
    { name: 'month', min: 1, max: 12, names: MONTH_NAMES },
    { name: 'day-of-week', min: 0, max: 7, names: DAY_NAMES },
]

const CRON_MACROS = new Set([
    '@yearly',
    '@annually',
    '@monthly',
    '@weekly',
    '@daily',
    '@midnight',
    '@hourly',
])


/**
 * Check a schedule string.
 *
 * @returns null when the schedule is acceptable, otherwise the reason it is not
 */
export function checkSchedule(schedule: string): string | null {

    const value = schedule.trim()

    if (value.length === 0) {

        return 'schedule must not be empty'
    }

    if (/^every\s+\S/i.test(value)) {

        return null
    }

    if (CRON_MACROS.has(value.toLowerCase())) {

        return null
    }

    const parts = value.split(/\s+/)

    if (parts.length !== CRON_FIELDS.length) {

        return `schedule must be a cron expression with ${CRON_FIELDS.length} fields or an 'every ...' phrase, got '${value}'`
    }

    for (let i = 0; i < CRON_FIELDS.length; i++) {

        const field = CRON_FIELDS[i]
        const part = parts[i]

        if (!field || part === undefined) {

            continue
        }

        const reason = checkCronField(part, field)

        if (reason) {

            return reason
        }
    }

    return null
}


/**
 * Check one cron field: a comma list of `*`, values, ranges and steps.
 */
function checkCronField(part: string, field: CronField): string | null {

    for (const item of part.split(',')) {

        const [range, step, extra] = item.split('/')

        if (extra !== undefined || range === undefined || range === '') {

            return `${field.name} field '${part}' is malformed`
        }

        if (step !== undefined && !/^[1-9]\d*$/.test(step)) {

            return `${field.name} step '${step}' must be a positive integer`
        }

        if (range === '*') {

            continue
        }

        const bounds = range.split('-')

        if (bounds.length > 2) {

            return `${field.name} range '${range}' is malformed`
        }

        const values: number[] = []

        for (const bound of bounds) {

            const parsed = parseCronValue(bound, field)

            if (parsed === null) {

                return `${field.name} value '${bound}' is outside ${field.min}-${field.max}`
            }

            values.push(parsed)
        }

        const [low, high] = values

        if (low !== undefined && high !== undefined && low > high) {

            return `${field.name} range '${range}' is reversed`
        }
    }

    return null
}


/**
 * Parse a single cron value (number or name) within the field's bounds.
 */
function parseCronValue(raw: string, field: CronField): number | null {

    if (/^\d+$/.test(raw)) {

        const value = Number(raw)

        return value >= field.min && value <= field.max ? value : null
    }

    const index = field.names?.indexOf(raw.toLowerCase()) ?? -1

    if (index === -1) {

        return null
    }

    // Month names are 1-based, day names 0-based
    return field.min + index
}
