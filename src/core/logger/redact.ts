/**
 * Redaction
 *
 * Masks log values whose field name looks like a credential. Template
 * variables travel on `query:rendered`, so a default such as `api_token`
 * never reaches the log in clear text.
 *
 * Names are compared after dropping case, separators and the `sqljob`
 * prefix: `apiToken`, `API_TOKEN`, `api-token` and `SQLJOB_API_TOKEN` are
 * the same field.
 *
 * @example
 * ```typescript
 * maskValue('test-secret-value', 'api_token', 'info')
 * // => '<ApiToken ************... (17) />'
 * ```
 */
import { isMapping } from '../shared/index.js';
import type { LogLevel } from './types.js';

const MASK_MAX_LENGTH = 12;

const MASKED_FIELDS = new Set<string>();

function normalizeField(name: string): string {

    return name.toLowerCase().replace(/[-_\s]/g, '').replace(/^sqljob/, '');

}

/**
 * Mask further field names.
 */
export function addMaskedFields(fields: string[]): void {

    for (const field of fields) {

        MASKED_FIELDS.add(normalizeField(field));

    }

}

addMaskedFields([
    'password',
    'secret',
    'token',
    'api_key',
    'api_token',
    'access_token',
    'client_secret',
    'private_key',
    'credentials',
]);

/**
 * Check if a field name should be masked.
 */
export function isMaskedField(key: string): boolean {

    return MASKED_FIELDS.has(normalizeField(key));

}

/**
 * Mask a value as `<FieldName *** (length) />`. At verbose level the first
 * four characters stay visible.
 */
export function maskValue(value: string, field: string, level: LogLevel): string {

    const shown = level === 'verbose' && value.length >= 4 ? value.slice(0, 4) : '';
    const stars = '*'.repeat(Math.max(0, Math.min(value.length, MASK_MAX_LENGTH) - shown.length));
    const overflow = value.length > MASK_MAX_LENGTH ? '...' : '';

    const label = field
        .split(/[-_\s]+/)
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
        .join('');

    return `<${label} ${shown}${stars}${overflow} (${value.length}) />`;

}

/**
 * Copy event data for logging, masking credential-named strings at any
 * depth and reducing errors to their name and message.
 */
export function filterData(
    entry: Record<string, unknown>,
    level: LogLevel,
): Record<string, unknown> {

    const filtered: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(entry)) {

        filtered[key] = filterValue(key, value, level);

    }

    return filtered;

}

function filterValue(key: string, value: unknown, level: LogLevel): unknown {

    if (typeof value === 'string') {

        return isMaskedField(key) ? maskValue(value, key, level) : value;

    }

    if (value instanceof Error) {

        return { name: value.name, message: value.message };

    }

    if (Array.isArray(value)) {

        return value.map((item: unknown) => (isMapping(item) ? filterData(item, level) : item));

    }

    if (isMapping(value)) {

        return filterData(value, level);

    }

    return value;

}
