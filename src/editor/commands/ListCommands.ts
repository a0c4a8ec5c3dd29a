import type { StateCommand } from '@codemirror/state';
import { buildIndentUnit, LOG_TAG } from '../../settings';
import type { ListContinuationSettings } from '../../types';
import { transformEdit } from '../core/edit-transform';
import { classifyLine } from '../core/line-classifier';
import type { EditDirective, EditGesture } from '../core/protocol-types';
import { findNextSiblingNumber } from '../core/sibling-numbering';
import { applyEditDirective } from '../directive-applier';

export interface ListCommandHooks {
    /** Called after a directive asks for text-insertion mode (modal hosts only) */
    onEnterInsertMode?: () => void;
}

export interface ListCommands {
    confirmListItem: StateCommand;
    openListItemBelow: StateCommand;
    openListItemAbove: StateCommand;
    indentListItem: StateCommand;
    outdentListItem: StateCommand;
}

function wantsInsertMode(directive: EditDirective): boolean {
    return (directive.type === 'insert-line' || directive.type === 'replace-and-insert-above')
        && directive.enterInsertMode;
}

export function createListCommands(
    settings: Readonly<ListContinuationSettings>,
    hooks: ListCommandHooks = {}
): ListCommands {
    const indentUnit = buildIndentUnit(settings);

    const run = (gesture: EditGesture): StateCommand => ({ state, dispatch }) => {
        try {
            const head = state.selection.main.head;
            const line = state.doc.lineAt(head);
            const directive = transformEdit({
                gesture,
                item: classifyLine(line.text, settings),
                lineText: line.text,
                indentUnit,
                lineNumber: line.number,
                cursorColumn: head - line.from,
                config: settings,
                nextSiblingNumber: (indent, fromLine) => findNextSiblingNumber(state.doc, indent, fromLine, settings),
            });

            const spec = applyEditDirective(state, directive);
            if (!spec) return false;
            dispatch(state.update(spec));

            if (wantsInsertMode(directive)) {
                hooks.onEnterInsertMode?.();
            }
            if (directive.type === 'replace-current-line' && directive.passthroughAfter) {
                return false;
            }
            return true;
        } catch (error) {
            console.error(`${LOG_TAG} ${gesture} failed:`, error);
            return false;
        }
    };

    return {
        confirmListItem: run('confirm'),
        openListItemBelow: run('open-below'),
        openListItemAbove: run('open-above'),
        indentListItem: run('indent'),
        outdentListItem: run('outdent'),
    };
}
