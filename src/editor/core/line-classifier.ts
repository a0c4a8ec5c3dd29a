import { ListItemKind, type ListItem, type MarkerConfig, type OrderedSeparator } from '../../types';

type LineMatcher = (line: string, config: MarkerConfig) => ListItem | null;

const ORDERED_COLON_PATTERN = /^([ \t]*)((\d+)([.)])[ \t]+)(.+):$/;
const ORDERED_PATTERN = /^([ \t]*)((\d+)([.)])[ \t]+)(.*)$/;
const COLON_PATTERN = /^([ \t]*)(.+):$/;

export function escapeMarker(marker: string): string {
    return marker.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function unorderedPattern(marker: string, colon: boolean): RegExp {
    const body = colon ? '(.+):' : '(.*)';
    return new RegExp(`^([ \\t]*)(${escapeMarker(marker)}[ \\t]+)${body}$`);
}

function toSeparator(raw: string): OrderedSeparator {
    return raw === ')' ? ')' : '.';
}

function matchUnordered(
    line: string,
    config: MarkerConfig,
    kind: ListItemKind.Unordered | ListItemKind.UnorderedColon
): ListItem | null {
    const colon = kind === ListItemKind.UnorderedColon;
    for (const marker of config.markers) {
        const match = line.match(unorderedPattern(marker, colon));
        if (!match) continue;
        const content = match[3] ?? '';
        return {
            kind,
            indent: match[1] ?? '',
            marker,
            prefix: match[2] ?? '',
            content,
            empty: !colon && content === '',
        };
    }
    return null;
}

function matchOrdered(line: string, kind: ListItemKind.Ordered | ListItemKind.OrderedColon): ListItem | null {
    const colon = kind === ListItemKind.OrderedColon;
    const match = line.match(colon ? ORDERED_COLON_PATTERN : ORDERED_PATTERN);
    if (!match) return null;
    const content = match[5] ?? '';
    return {
        kind,
        indent: match[1] ?? '',
        number: BigInt(match[3] ?? '0'),
        separator: toSeparator(match[4] ?? '.'),
        prefix: match[2] ?? '',
        content,
        empty: !colon && content === '',
    };
}

function matchColon(line: string): ListItem | null {
    const match = line.match(COLON_PATTERN);
    if (!match) return null;
    return {
        kind: ListItemKind.Colon,
        indent: match[1] ?? '',
        prefix: '',
        content: match[2] ?? '',
        empty: false,
    };
}

/**
 * Evaluated top-down, first match wins. Colon variants come before the plain
 * ones so that `- Topics:` nests instead of continuing, and within each group
 * markers are tried in declaration order.
 */
const LINE_MATCHERS: readonly LineMatcher[] = [
    (line, config) => matchUnordered(line, config, ListItemKind.UnorderedColon),
    (line) => matchOrdered(line, ListItemKind.OrderedColon),
    (line, config) => matchUnordered(line, config, ListItemKind.Unordered),
    (line) => matchOrdered(line, ListItemKind.Ordered),
    (line) => matchColon(line),
];

export function classifyLine(line: string, config: MarkerConfig): ListItem | null {
    for (const matcher of LINE_MATCHERS) {
        const item = matcher(line, config);
        if (item) return item;
    }
    return null;
}

export function isColonKind(item: ListItem): boolean {
    return item.kind === ListItemKind.UnorderedColon
        || item.kind === ListItemKind.OrderedColon
        || item.kind === ListItemKind.Colon;
}

export function renderListItem(item: ListItem): string {
    const tail = isColonKind(item) ? ':' : '';
    return `${item.indent}${item.prefix}${item.content}${tail}`;
}
