/**
 * Check whether a value is a plain mapping (not null, not a list).
 */
export function isMapping(value: unknown): value is Record<string, unknown> {

    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
