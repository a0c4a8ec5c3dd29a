import { ListItemKind, type MarkerConfig } from '../../types';
import { classifyLine } from './line-classifier';
import type { DocLike } from './protocol-types';

/**
 * Scans upward from the line above `fromLine` through the contiguous block of
 * ordered items at `indent`. Deeper list items are nested children and are
 * skipped; anything else ends the block. Returns the highest number seen plus
 * one, or 1 when the block is empty.
 */
export function findNextSiblingNumber(
    doc: DocLike,
    indent: string,
    fromLine: number,
    config: MarkerConfig
): bigint {
    let max = 0n;
    let found = false;
    for (let i = Math.min(fromLine - 1, doc.lines); i >= 1; i--) {
        const item = classifyLine(doc.line(i).text, config);
        if (!item) break;

        if (item.indent.length > indent.length && item.indent.startsWith(indent)) continue;
        if (item.indent !== indent) break;
        if (item.kind !== ListItemKind.Ordered && item.kind !== ListItemKind.OrderedColon) break;

        if (!found || item.number > max) max = item.number;
        found = true;
    }
    return found ? max + 1n : 1n;
}
