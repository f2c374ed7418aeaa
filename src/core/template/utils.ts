/**
 * SQL string helpers used as template filters.
 *
 * @example
 * ```typescript
 * sqlEscape("O'Brien")       // → "O''Brien"
 * sqlQuote("O'Brien")        // → "'O''Brien'"
 * sqlIdent('my-project.ds')  // → '`my-project.ds`'
 * ```
 */


/**
 * SQL-escape a string value.
 *
 * Escapes single quotes by doubling them, which is the standard
 * SQL escape sequence for string literals.
 *
 * @param value - The string to escape
 * @returns The escaped string (without surrounding quotes)
 */
export function sqlEscape(value: string): string {

    return value.replace(/'/g, "''")
}


/**
 * SQL-escape and wrap in single quotes.
 *
 * @example
 * ```typescript
 * sqlQuote("O'Brien")  // → "'O''Brien'"
 * sqlQuote('42')       // → "'42'"
 * ```
 */
export function sqlQuote(value: string): string {

    return `'${sqlEscape(value)}'`
}


/**
 * Wrap an identifier in backticks, escaping embedded backticks.
 *
 * @example
 * ```typescript
 * sqlIdent('sales_daily')          // → '`sales_daily`'
 * sqlIdent('proj.analytics.sales') // → '`proj.analytics.sales`'
 * ```
 */
export function sqlIdent(value: string): string {

    return `\`${value.replace(/\\/g, '\\\\').replace(/`/g, '\\`')}\``
}
