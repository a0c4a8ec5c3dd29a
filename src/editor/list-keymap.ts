import { Prec, type Extension } from '@codemirror/state';
import { keymap, type KeyBinding } from '@codemirror/view';
import type { ListContinuationSettings } from '../types';
import { createListCommands, type ListCommandHooks } from './commands/ListCommands';

export function buildListKeyBindings(
    settings: Readonly<ListContinuationSettings>,
    hooks: ListCommandHooks = {}
): KeyBinding[] {
    const commands = createListCommands(settings, hooks);
    return [
        { key: settings.keys.confirm, run: commands.confirmListItem },
        { key: settings.keys.openBelow, run: commands.openListItemBelow },
        { key: settings.keys.openAbove, run: commands.openListItemAbove },
        { key: settings.keys.indent, run: commands.indentListItem },
        { key: settings.keys.outdent, run: commands.outdentListItem },
    ];
}

export function listKeymapExtension(
    settings: Readonly<ListContinuationSettings>,
    hooks: ListCommandHooks = {}
): Extension {
    // Ahead of the default keymap so a passthrough falls through to it.
    return Prec.high(keymap.of(buildListKeyBindings(settings, hooks)));
}
