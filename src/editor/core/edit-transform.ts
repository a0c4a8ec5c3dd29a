import { ListItemKind, type ListItem, type MarkerConfig } from '../../types';
import { isColonKind } from './line-classifier';
import { colonMarker, getIndentLevel, markerForDepth } from './marker-policy';
import type {
    EditDirective,
    EditTransformInput,
    InsertLineDirective,
    NextSiblingNumberFn,
} from './protocol-types';

const PASSTHROUGH: EditDirective = { type: 'passthrough' };

function insertBelow(lineNumber: number, text: string): InsertLineDirective {
    return {
        type: 'insert-line',
        afterLine: lineNumber,
        text,
        cursorLine: lineNumber + 1,
        cursorColumn: text.length,
        enterInsertMode: true,
    };
}

function siblingText(item: ListItem): string | null {
    if (item.kind === ListItemKind.Unordered || item.kind === ListItemKind.UnorderedColon) {
        return `${item.indent}${item.marker} `;
    }
    if (item.kind === ListItemKind.Ordered || item.kind === ListItemKind.OrderedColon) {
        return `${item.indent}${item.number + 1n}${item.separator} `;
    }
    return null;
}

function childText(item: ListItem, indentUnit: string, marker: string): string {
    return `${item.indent}${indentUnit}${marker} `;
}

/**
 * Always strips two spaces (or one tab for tab-only indents), whatever the
 * configured indent width is. An indent shorter than the unit is stripped to
 * nothing rather than left as it was.
 */
export function removeEmptyItemIndent(indent: string): string {
    const unit = /^\t+$/.test(indent) ? '\t' : '  ';
    return indent.slice(0, Math.max(0, indent.length - unit.length));
}

function collapseEmptyItem(
    item: ListItem,
    lineNumber: number,
    nextSiblingNumber: NextSiblingNumberFn
): EditDirective {
    if (item.indent.length === 0) {
        return {
            type: 'replace-current-line',
            line: lineNumber,
            text: '',
            cursorColumn: 0,
            passthroughAfter: true,
        };
    }

    const reducedIndent = removeEmptyItemIndent(item.indent);
    let text: string;
    if (item.kind === ListItemKind.Ordered || item.kind === ListItemKind.OrderedColon) {
        text = `${reducedIndent}${nextSiblingNumber(reducedIndent, lineNumber)}${item.separator} `;
    } else if (item.kind === ListItemKind.Unordered || item.kind === ListItemKind.UnorderedColon) {
        text = `${reducedIndent}${item.marker} `;
    } else {
        return PASSTHROUGH;
    }

    return {
        type: 'replace-current-line',
        line: lineNumber,
        text,
        cursorColumn: text.length,
        passthroughAfter: false,
    };
}

function transformConfirm(input: EditTransformInput, item: ListItem): EditDirective {
    // Only the line text is inspected; the cursor column plays no part here.
    if (isColonKind(item)) {
        const level = getIndentLevel(`${item.indent}${input.indentUnit}`, input.indentUnit);
        return insertBelow(input.lineNumber, childText(item, input.indentUnit, markerForDepth(level, input.config)));
    }

    if (item.empty) {
        return collapseEmptyItem(item, input.lineNumber, input.nextSiblingNumber);
    }

    const text = siblingText(item);
    return text === null ? PASSTHROUGH : insertBelow(input.lineNumber, text);
}

function transformOpenBelow(input: EditTransformInput, item: ListItem): EditDirective {
    if (isColonKind(item)) {
        return insertBelow(input.lineNumber, childText(item, input.indentUnit, colonMarker(input.config)));
    }

    const text = siblingText(item);
    return text === null ? PASSTHROUGH : insertBelow(input.lineNumber, text);
}

function transformOpenAbove(input: EditTransformInput, item: ListItem): EditDirective {
    if (item.kind === ListItemKind.Unordered) {
        const text = `${item.indent}${item.marker} `;
        return {
            type: 'insert-line',
            afterLine: input.lineNumber - 1,
            text,
            cursorLine: input.lineNumber,
            cursorColumn: text.length,
            enterInsertMode: true,
        };
    }

    if (item.kind === ListItemKind.Ordered) {
        const aboveText = `${item.indent}${item.number}${item.separator} `;
        return {
            type: 'replace-and-insert-above',
            line: input.lineNumber,
            aboveText,
            text: `${item.indent}${item.number + 1n}${item.separator} ${item.content}`,
            cursorLine: input.lineNumber,
            cursorColumn: aboveText.length,
            enterInsertMode: true,
        };
    }

    // Colon lines never get a nested item above them.
    return PASSTHROUGH;
}

export function shiftListItemIndent(
    item: ListItem,
    lineText: string,
    indentUnit: string,
    direction: 'indent' | 'outdent',
    config: MarkerConfig
): { text: string; shift: number } {
    let newIndent: string;
    if (direction === 'indent') {
        newIndent = `${item.indent}${indentUnit}`;
    } else if (item.indent.length >= indentUnit.length) {
        newIndent = item.indent.slice(0, item.indent.length - indentUnit.length);
    } else {
        newIndent = '';
    }

    if (newIndent === item.indent) {
        return { text: lineText, shift: 0 };
    }

    const newMarker = markerForDepth(getIndentLevel(newIndent, indentUnit), config);
    const afterPrefix = lineText.slice(item.indent.length + item.prefix.length);
    return {
        text: `${newIndent}${newMarker} ${afterPrefix}`,
        shift: newIndent.length - item.indent.length,
    };
}

function transformIndent(input: EditTransformInput, item: ListItem, direction: 'indent' | 'outdent'): EditDirective {
    // A plain colon line has no marker to re-level.
    if (item.kind === ListItemKind.Colon) return PASSTHROUGH;

    const { text, shift } = shiftListItemIndent(item, input.lineText, input.indentUnit, direction, input.config);
    return {
        type: 'replace-line-range',
        fromLine: input.lineNumber,
        toLine: input.lineNumber,
        text,
        cursorLine: input.lineNumber,
        cursorColumn: Math.max(0, input.cursorColumn + shift),
    };
}

export function transformEdit(input: EditTransformInput): EditDirective {
    const item = input.item;
    if (!item) return PASSTHROUGH;

    switch (input.gesture) {
        case 'confirm':
            return transformConfirm(input, item);
        case 'open-below':
            return transformOpenBelow(input, item);
        case 'open-above':
            return transformOpenAbove(input, item);
        case 'indent':
        case 'outdent':
            return transformIndent(input, item, input.gesture);
    }
}
