import type { ListItem, MarkerConfig } from '../../types';

export type EditGesture = 'confirm' | 'open-below' | 'open-above' | 'indent' | 'outdent';

export interface DocLineLike {
    text: string;
}

export interface DocLike {
    lines: number;
    line: (n: number) => DocLineLike;
}

export type NextSiblingNumberFn = (indent: string, fromLine: number) => bigint;

export interface EditTransformInput {
    gesture: EditGesture;
    /** Classification of the current line, null when it is not a list item */
    item: ListItem | null;
    /** Raw text of the current line */
    lineText: string;
    /** One indentation level as the host writes it: N spaces or a single tab */
    indentUnit: string;
    /** 1-based */
    lineNumber: number;
    /** 0-based column of the cursor on the current line */
    cursorColumn: number;
    config: MarkerConfig;
    nextSiblingNumber: NextSiblingNumberFn;
}

export interface PassthroughDirective {
    type: 'passthrough';
}

export interface InsertLineDirective {
    type: 'insert-line';
    /** The new line goes after this line; 0 inserts above the first line */
    afterLine: number;
    text: string;
    cursorLine: number;
    cursorColumn: number;
    enterInsertMode: boolean;
}

export interface ReplaceCurrentLineDirective {
    type: 'replace-current-line';
    line: number;
    text: string;
    cursorColumn: number;
    /** The host still runs its default action for the gesture afterwards */
    passthroughAfter: boolean;
}

export interface ReplaceAndInsertAboveDirective {
    type: 'replace-and-insert-above';
    line: number;
    text: string;
    aboveText: string;
    cursorLine: number;
    cursorColumn: number;
    enterInsertMode: boolean;
}

export interface ReplaceLineRangeDirective {
    type: 'replace-line-range';
    fromLine: number;
    toLine: number;
    text: string;
    cursorLine: number;
    cursorColumn: number;
}

export type EditDirective =
    | PassthroughDirective
    | InsertLineDirective
    | ReplaceCurrentLineDirective
    | ReplaceAndInsertAboveDirective
    | ReplaceLineRangeDirective;
