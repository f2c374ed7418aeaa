/**
 * SQL renderer tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'

import {
    SqlRenderer,
    TemplateNotFoundError,
    TemplateSyntaxError,
    UndeclaredVariableError,
} from '../../../src/core/template/index.js'
import { observer } from '../../../src/core/observer.js'
import { createWorkspace, type Workspace } from '../../utils/workspace.js'


const FROM = { queryName: 'daily_totals', template: 'sales/daily.sql' }


describe('template: renderer', () => {

    let renderer: SqlRenderer

    beforeEach(() => {

        renderer = new SqlRenderer()
    })

    describe('renderString', () => {

        it('should substitute variables', () => {

            const sql = renderer.renderString(
                'SELECT * FROM {{ table }} WHERE days = {{days}}',
                { table: 'sales', days: 7 },
                FROM,
            )

            expect(sql).toBe('SELECT * FROM sales WHERE days = 7')
        })

        it('should render booleans as text', () => {

            expect(renderer.renderString('{{ flag }}', { flag: false }, FROM)).toBe('false')
        })

        it('should apply filters left to right', () => {

            const sql = renderer.renderString(
                "WHERE region = {{ region | quote }} AND name = {{ name | upper | quote }}",
                { region: "o'hare", name: 'eu' },
                FROM,
            )

            expect(sql).toBe("WHERE region = 'o''hare' AND name = 'EU'")
        })

        it('should accept custom filters', () => {

            const custom = new SqlRenderer({ filters: { reverse: (value) => [...value].reverse().join('') } })

            expect(custom.renderString('{{ word | reverse }}', { word: 'abc' }, FROM)).toBe('cba')
            expect(custom.filterNames).toEqual(['escape', 'ident', 'lower', 'quote', 'reverse', 'upper'])
        })

        it('should drop comments', () => {

            const sql = renderer.renderString('SELECT 1 {# {{ unused }} #}FROM t', {}, FROM)

            expect(sql).toBe('SELECT 1 FROM t')
        })

        it('should not rescan substituted values', () => {

            const sql = renderer.renderString('SELECT {{ a }}', { a: '{{ b }}' }, FROM)

            expect(sql).toBe('SELECT {{ b }}')
        })

        it('should trim output by default', () => {

            expect(renderer.renderString('\n  SELECT 1\n\n', {}, FROM)).toBe('SELECT 1')
            expect(new SqlRenderer({ trim: false }).renderString(' SELECT 1\n', {}, FROM)).toBe(' SELECT 1\n')
        })

        it('should throw UndeclaredVariableError with the line number', () => {

            let caught: unknown

            try {

                renderer.renderString('SELECT 1\nFROM t\nWHERE x = {{ missing }}', { present: 1 }, FROM)
            }
            catch (err) {

                caught = err
            }

            expect(caught).toBeInstanceOf(UndeclaredVariableError)

            if (caught instanceof UndeclaredVariableError) {

                expect(caught.variable).toBe('missing')
                expect(caught.line).toBe(3)
                expect(caught.message).toBe(
                    "Query 'daily_totals' template 'sales/daily.sql' line 3 references undeclared variable 'missing'",
                )
            }
        })

        it('should not resolve inherited properties', () => {

            expect(() => renderer.renderString('{{ toString }}', {}, FROM)).toThrow(UndeclaredVariableError)
        })

        it('should reject malformed markers', () => {

            expect(() => renderer.renderString('SELECT {{ a', { a: 1 }, FROM)).toThrow(
                "Query 'daily_totals' template 'sales/daily.sql' line 1: unterminated '{{'",
            )
            expect(() => renderer.renderString('SELECT {{  }}', {}, FROM)).toThrow('empty variable marker')
            expect(() => renderer.renderString('{{ a.b }}', {}, FROM)).toThrow("'a.b' is not a variable name")
            expect(() => renderer.renderString('{{ a | nope }}', { a: 1 }, FROM)).toThrow("unknown filter 'nope'")
            expect(() => renderer.renderString('{{ a | }}', { a: 1 }, FROM)).toThrow('empty filter')
            expect(() => renderer.renderString('x\n{# open', {}, FROM)).toThrow(TemplateSyntaxError)
        })

        it('should reject control blocks instead of copying them through', () => {

            const source = "SELECT *\nFROM sales {% if region == 'US' %}WHERE us{% endif %}"

            expect(() => renderer.renderString(source, { region: 'US' }, FROM)).toThrow(
                "Query 'daily_totals' template 'sales/daily.sql' line 2: control blocks '{% %}' are not supported",
            )
        })

        it('should reject a control block that follows a variable marker', () => {

            expect(() => renderer.renderString('{{ a }} {% endif %}', { a: 1 }, FROM)).toThrow(TemplateSyntaxError)
        })
    })

    describe('render', () => {

        let ws: Workspace

        beforeEach(() => {

            ws = createWorkspace()
        })

        afterEach(() => {

            ws.cleanup()
        })

        it('should read and render a template file', () => {

            const filepath = ws.template('sales/daily.sql', 'SELECT {{ region | quote }} AS region\n')
            const rendered: string[] = []
            const cleanup = observer.on('template:render', (data) => rendered.push(data.queryName))

            const sql = renderer.render({ ...FROM, filepath }, { region: 'US' })

            cleanup()

            expect(sql).toBe("SELECT 'US' AS region")
            expect(rendered).toEqual(['daily_totals'])
        })

        it('should produce identical output on repeated renders', () => {

            const filepath = ws.template('sales/daily.sql', 'SELECT {{ a }}, {{ b }}')
            const handle = { ...FROM, filepath }

            expect(renderer.render(handle, { a: 1, b: 'x' })).toBe(renderer.render(handle, { a: 1, b: 'x' }))
        })

        it('should throw TemplateNotFoundError when the file is gone', () => {

            const filepath = `${ws.templates}/sales/gone.sql`

            expect(() => renderer.render({ ...FROM, filepath }, {})).toThrow(TemplateNotFoundError)
        })
    })
})
