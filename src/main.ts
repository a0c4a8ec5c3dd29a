import type { Extension } from '@codemirror/state';
import type { ListCommandHooks } from './editor/commands/ListCommands';
import { listKeymapExtension } from './editor/list-keymap';
import { isActiveForFiletype, resolveSettings, type ListContinuationOptions } from './settings';

export interface ListContinuationSetup extends ListCommandHooks {
    /** When given, the extension is only active for the configured filetypes */
    filetype?: string;
}

export function listContinuation(options: ListContinuationOptions = {}, setup: ListContinuationSetup = {}): Extension {
    const settings = resolveSettings(options);
    if (setup.filetype !== undefined && !isActiveForFiletype(settings, setup.filetype)) {
        return [];
    }
    return listKeymapExtension(settings, { onEnterInsertMode: setup.onEnterInsertMode });
}

export { buildListKeyBindings, listKeymapExtension } from './editor/list-keymap';
export { createListCommands } from './editor/commands/ListCommands';
export type { ListCommandHooks, ListCommands } from './editor/commands/ListCommands';
export { applyEditDirective } from './editor/directive-applier';
export { classifyLine, escapeMarker, renderListItem } from './editor/core/line-classifier';
export { colonMarker, getIndentLevel, markerForDepth } from './editor/core/marker-policy';
export { transformEdit } from './editor/core/edit-transform';
export { findNextSiblingNumber } from './editor/core/sibling-numbering';
export type * from './editor/core/protocol-types';
export { DEFAULT_SETTINGS, buildIndentUnit, isActiveForFiletype, resolveSettings } from './settings';
export type { ListContinuationOptions } from './settings';
export * from './types';
