/**
 * SQL string helper tests.
 */
import { describe, it, expect } from 'vitest'

import { sqlEscape, sqlIdent, sqlQuote } from '../../../src/core/template/index.js'


describe('template: utils', () => {

    it('should double single quotes', () => {

        expect(sqlEscape("O'Brien")).toBe("O''Brien")
        expect(sqlEscape('plain')).toBe('plain')
    })

    it('should quote and escape', () => {

        expect(sqlQuote("it's")).toBe("'it''s'")
        expect(sqlQuote('42')).toBe("'42'")
    })

    it('should wrap identifiers in backticks', () => {

        expect(sqlIdent('proj.analytics.sales')).toBe('`proj.analytics.sales`')
        expect(sqlIdent('a`b')).toBe('`a\\`b`')
    })
})
