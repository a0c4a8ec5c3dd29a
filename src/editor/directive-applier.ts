import { EditorSelection, type EditorState, type TransactionSpec } from '@codemirror/state';
import type { EditDirective } from './core/protocol-types';

/**
 * Offset of the start of `row` (0-based) inside a multi-line replacement text.
 */
function rowStartOffset(text: string, row: number): number {
    const rows = text.split('\n');
    let offset = 0;
    for (let i = 0; i < Math.min(row, rows.length - 1); i++) {
        offset += (rows[i] ?? '').length + 1;
    }
    return offset;
}

/**
 * Column clamped to the length of `row` (0-based) inside the replacement text.
 */
function clampColumn(text: string, row: number, column: number): number {
    const rows = text.split('\n');
    const rowText = rows[Math.min(Math.max(0, row), rows.length - 1)] ?? '';
    return Math.min(Math.max(0, column), rowText.length);
}

function cursorAfterLineInsert(
    state: EditorState,
    afterLine: number,
    inserted: string,
    cursorLine: number
): { from: number; length: number } {
    if (cursorLine <= afterLine) {
        const line = state.doc.line(cursorLine);
        return { from: line.from, length: line.length };
    }
    if (cursorLine === afterLine + 1) {
        const from = afterLine === 0 ? 0 : state.doc.line(afterLine).to + 1;
        return { from, length: inserted.length };
    }
    // Lines below the new one are the old lines shifted down by one row.
    const line = state.doc.line(cursorLine - 1);
    return { from: line.from + inserted.length + 1, length: line.length };
}

/**
 * Converts a directive into a CodeMirror transaction spec. Passthrough, and any
 * directive that points outside the document, yields null.
 */
export function applyEditDirective(state: EditorState, directive: EditDirective): TransactionSpec | null {
    const doc = state.doc;

    switch (directive.type) {
        case 'passthrough':
            return null;

        case 'insert-line': {
            if (directive.afterLine < 0 || directive.afterLine > doc.lines) return null;
            if (directive.cursorLine < 1 || directive.cursorLine > doc.lines + 1) return null;
            const target = cursorAfterLineInsert(state, directive.afterLine, directive.text, directive.cursorLine);
            const column = Math.min(Math.max(0, directive.cursorColumn), target.length);
            const changes = directive.afterLine === 0
                ? { from: 0, insert: `${directive.text}\n` }
                : { from: doc.line(directive.afterLine).to, insert: `\n${directive.text}` };
            return {
                changes,
                selection: EditorSelection.cursor(target.from + column),
                scrollIntoView: true,
                userEvent: 'input',
            };
        }

        case 'replace-current-line': {
            if (directive.line < 1 || directive.line > doc.lines) return null;
            const line = doc.line(directive.line);
            return {
                changes: { from: line.from, to: line.to, insert: directive.text },
                selection: EditorSelection.cursor(line.from + clampColumn(directive.text, 0, directive.cursorColumn)),
                userEvent: directive.text.length === 0 ? 'delete' : 'input',
            };
        }

        case 'replace-and-insert-above': {
            if (directive.line < 1 || directive.line > doc.lines) return null;
            const line = doc.line(directive.line);
            const insert = `${directive.aboveText}\n${directive.text}`;
            const row = directive.cursorLine - directive.line;
            const lineStart = line.from + rowStartOffset(insert, row);
            return {
                changes: { from: line.from, to: line.to, insert },
                selection: EditorSelection.cursor(lineStart + clampColumn(insert, row, directive.cursorColumn)),
                scrollIntoView: true,
                userEvent: 'input',
            };
        }

        case 'replace-line-range': {
            if (directive.fromLine < 1 || directive.toLine > doc.lines || directive.fromLine > directive.toLine) {
                return null;
            }
            const from = doc.line(directive.fromLine).from;
            const to = doc.line(directive.toLine).to;
            const row = directive.cursorLine - directive.fromLine;
            const lineStart = from + rowStartOffset(directive.text, row);
            return {
                changes: { from, to, insert: directive.text },
                selection: EditorSelection.cursor(lineStart + clampColumn(directive.text, row, directive.cursorColumn)),
                userEvent: 'input',
            };
        }
    }
}
