/**
 * List item kinds recognised on a single line
 */
export enum ListItemKind {
    Unordered = 'unordered',
    Ordered = 'ordered',
    UnorderedColon = 'unordered-colon',
    OrderedColon = 'ordered-colon',
    Colon = 'colon',
}

export type OrderedSeparator = '.' | ')';

interface ListItemBase {
    /** Leading whitespace, verbatim */
    indent: string;
    /** Marker text including its trailing whitespace; empty for plain colon lines */
    prefix: string;
    /** Text after the prefix, trailing colon stripped for colon kinds */
    content: string;
    empty: boolean;
}

export interface UnorderedListItem extends ListItemBase {
    kind: ListItemKind.Unordered | ListItemKind.UnorderedColon;
    marker: string;
}

export interface OrderedListItem extends ListItemBase {
    kind: ListItemKind.Ordered | ListItemKind.OrderedColon;
    /** Arbitrary-length digit runs stay exact */
    number: bigint;
    separator: OrderedSeparator;
}

export interface ColonLine extends ListItemBase {
    kind: ListItemKind.Colon;
}

export type ListItem = UnorderedListItem | OrderedListItem | ColonLine;

export interface MarkerConfig {
    /** Declaration order is the matching priority and the depth lookup */
    markers: readonly string[];
    colonMarker: string | null;
}

export interface ListKeyBindings {
    confirm: string;
    openBelow: string;
    openAbove: string;
    indent: string;
    outdent: string;
}

export interface ListContinuationSettings extends MarkerConfig {
    filetypes: readonly string[];
    useTabs: boolean;
    indentWidth: number;
    keys: ListKeyBindings;
}
