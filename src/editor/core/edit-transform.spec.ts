import { describe, expect, it, vi } from 'vitest';
import { DEFAULT_SETTINGS } from '../../settings';
import type { MarkerConfig } from '../../types';
import { removeEmptyItemIndent, transformEdit } from './edit-transform';
import { classifyLine } from './line-classifier';
import type { EditGesture, EditTransformInput } from './protocol-types';

function createInput(
    gesture: EditGesture,
    lineText: string,
    overrides: Partial<EditTransformInput> = {}
): EditTransformInput {
    const config: MarkerConfig = overrides.config ?? DEFAULT_SETTINGS;
    return {
        gesture,
        item: classifyLine(lineText, config),
        lineText,
        indentUnit: '  ',
        lineNumber: 1,
        cursorColumn: lineText.length,
        config,
        nextSiblingNumber: () => 1n,
        ...overrides,
    };
}

describe('edit-transform', () => {
    describe('confirm', () => {
        it('continues an unordered item below', () => {
            expect(transformEdit(createInput('confirm', '* Item 1'))).toEqual({
                type: 'insert-line',
                afterLine: 1,
                text: '* ',
                cursorLine: 2,
                cursorColumn: 2,
                enterInsertMode: true,
            });
        });

        it('continues an ordered item with the next number', () => {
            const directive = transformEdit(createInput('confirm', '1. First item', { lineNumber: 4 }));
            expect(directive).toEqual({
                type: 'insert-line',
                afterLine: 4,
                text: '2. ',
                cursorLine: 5,
                cursorColumn: 3,
                enterInsertMode: true,
            });
        });

        it('keeps the indent and separator of the current item', () => {
            const directive = transformEdit(createInput('confirm', '    9) nine'));
            expect(directive.type === 'insert-line' ? directive.text : null).toBe('    10) ');
        });

        it('increments long ordered numbers exactly', () => {
            const directive = transformEdit(createInput('confirm', '12345678901234567890. x'));
            expect(directive.type === 'insert-line' ? directive.text : null).toBe('12345678901234567891. ');
        });

        it('starts a nested list after a plain colon line', () => {
            const directive = transformEdit(createInput('confirm', 'Topics:'));
            expect(directive).toEqual({
                type: 'insert-line',
                afterLine: 1,
                text: '  * ',
                cursorLine: 2,
                cursorColumn: 4,
                enterInsertMode: true,
            });
        });

        it('picks the child marker from the child depth', () => {
            const fromItem = transformEdit(createInput('confirm', '  - Steps:'));
            expect(fromItem.type === 'insert-line' ? fromItem.text : null).toBe('    + ');

            const fromOrdered = transformEdit(createInput('confirm', '1. Steps:', { indentUnit: '\t' }));
            expect(fromOrdered.type === 'insert-line' ? fromOrdered.text : null).toBe('\t* ');
        });

        it('ignores the cursor column on colon lines', () => {
            const atStart = transformEdit(createInput('confirm', 'Topics:', { cursorColumn: 0 }));
            const atEnd = transformEdit(createInput('confirm', 'Topics:', { cursorColumn: 7 }));
            expect(atStart).toEqual(atEnd);
        });

        it('unindents an empty nested item in place', () => {
            expect(transformEdit(createInput('confirm', '  * ', { lineNumber: 3 }))).toEqual({
                type: 'replace-current-line',
                line: 3,
                text: '* ',
                cursorColumn: 2,
                passthroughAfter: false,
            });
        });

        it('renumbers an empty nested ordered item from its new siblings', () => {
            const nextSiblingNumber = vi.fn(() => 4n);
            const directive = transformEdit(createInput('confirm', '    1) ', { lineNumber: 6, nextSiblingNumber }));
            expect(nextSiblingNumber).toHaveBeenCalledWith('  ', 6);
            expect(directive).toEqual({
                type: 'replace-current-line',
                line: 6,
                text: '  4) ',
                cursorColumn: 5,
                passthroughAfter: false,
            });
        });

        it('strips two spaces from an empty item even with a wider indent unit', () => {
            const directive = transformEdit(createInput('confirm', '        - ', { indentUnit: '    ' }));
            expect(directive.type === 'replace-current-line' ? directive.text : null).toBe('      - ');
        });

        it('strips one tab from an empty tab-indented item', () => {
            const directive = transformEdit(createInput('confirm', '\t\t- ', { indentUnit: '\t' }));
            expect(directive.type === 'replace-current-line' ? directive.text : null).toBe('\t- ');
        });

        it('clears an empty top-level item and hands the newline to the host', () => {
            expect(transformEdit(createInput('confirm', '* ', { lineNumber: 2 }))).toEqual({
                type: 'replace-current-line',
                line: 2,
                text: '',
                cursorColumn: 0,
                passthroughAfter: true,
            });
        });

        it('passes through plain prose', () => {
            expect(transformEdit(createInput('confirm', 'hello world'))).toEqual({ type: 'passthrough' });
        });
    });

    describe('open-below', () => {
        it('treats empty items like any other sibling', () => {
            const directive = transformEdit(createInput('open-below', '  3. ', { lineNumber: 2 }));
            expect(directive).toEqual({
                type: 'insert-line',
                afterLine: 2,
                text: '  4. ',
                cursorLine: 3,
                cursorColumn: 5,
                enterInsertMode: true,
            });

            const unordered = transformEdit(createInput('open-below', '- '));
            expect(unordered.type === 'insert-line' ? unordered.text : null).toBe('- ');
        });

        it('uses the colon marker for children of colon lines', () => {
            const directive = transformEdit(createInput('open-below', 'Topics:'));
            expect(directive.type === 'insert-line' ? directive.text : null).toBe('  - ');

            const custom = transformEdit(createInput('open-below', '- Topics:', {
                config: { markers: ['-', '*'], colonMarker: '+' },
            }));
            expect(custom.type === 'insert-line' ? custom.text : null).toBe('  + ');
        });

        it('passes through plain prose', () => {
            expect(transformEdit(createInput('open-below', 'prose'))).toEqual({ type: 'passthrough' });
        });
    });

    describe('open-above', () => {
        it('inserts an unordered sibling above', () => {
            expect(transformEdit(createInput('open-above', '  + entry', { lineNumber: 5 }))).toEqual({
                type: 'insert-line',
                afterLine: 4,
                text: '  + ',
                cursorLine: 5,
                cursorColumn: 4,
                enterInsertMode: true,
            });
        });

        it('inserts the same number above and renumbers the current line', () => {
            expect(transformEdit(createInput('open-above', '2. Second', { lineNumber: 2 }))).toEqual({
                type: 'replace-and-insert-above',
                line: 2,
                aboveText: '2. ',
                text: '3. Second',
                cursorLine: 2,
                cursorColumn: 3,
                enterInsertMode: true,
            });
        });

        it('renumbers long ordered numbers exactly', () => {
            const directive = transformEdit(createInput('open-above', '99999999999999999999) x'));
            expect(directive.type === 'replace-and-insert-above' ? directive.text : null).toBe('100000000000000000000) x');
        });

        it.each(['Topics:', '- Topics:', '1. Steps:', 'plain'])('passes through on %j', (line) => {
            expect(transformEdit(createInput('open-above', line))).toEqual({ type: 'passthrough' });
        });
    });

    describe('indent and outdent', () => {
        it('indents with the marker for the new depth', () => {
            expect(transformEdit(createInput('indent', '- item', { cursorColumn: 3, lineNumber: 7 }))).toEqual({
                type: 'replace-line-range',
                fromLine: 7,
                toLine: 7,
                text: '  * item',
                cursorLine: 7,
                cursorColumn: 5,
            });
        });

        it('outdents one unit and shifts the cursor back', () => {
            const directive = transformEdit(createInput('outdent', '    + deep', { cursorColumn: 8 }));
            expect(directive).toEqual({
                type: 'replace-line-range',
                fromLine: 1,
                toLine: 1,
                text: '  * deep',
                cursorLine: 1,
                cursorColumn: 6,
            });
        });

        it('clamps a short indent to zero on outdent', () => {
            const directive = transformEdit(createInput('outdent', ' * x', { cursorColumn: 0 }));
            expect(directive.type === 'replace-line-range' ? directive.text : null).toBe('- x');
            expect(directive.type === 'replace-line-range' ? directive.cursorColumn : null).toBe(0);
        });

        it.each(['- top', '* starred', '3. third', '- '])('leaves %j unchanged when outdenting at zero indent', (line) => {
            const directive = transformEdit(createInput('outdent', line));
            expect(directive.type === 'replace-line-range' ? directive.text : null).toBe(line);
        });

        it('keeps the text after the prefix verbatim, colon included', () => {
            const directive = transformEdit(createInput('indent', '1.  Steps:', { indentUnit: '\t' }));
            expect(directive.type === 'replace-line-range' ? directive.text : null).toBe('\t* Steps:');
        });

        it('reuses the last marker past the configured depth', () => {
            const directive = transformEdit(createInput('indent', '      > deep'));
            expect(directive.type === 'replace-line-range' ? directive.text : null).toBe('        > deep');
        });

        it('passes through plain colon lines and prose', () => {
            expect(transformEdit(createInput('indent', 'Topics:'))).toEqual({ type: 'passthrough' });
            expect(transformEdit(createInput('outdent', 'prose'))).toEqual({ type: 'passthrough' });
        });
    });

    it('strips at most the available indent from empty items', () => {
        expect(removeEmptyItemIndent(' ')).toBe('');
        expect(removeEmptyItemIndent('\t')).toBe('');
        expect(removeEmptyItemIndent('\t  ')).toBe('\t');
    });
});
