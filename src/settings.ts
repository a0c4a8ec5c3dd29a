import type { ListContinuationSettings, ListKeyBindings } from './types';

export const LOG_TAG = '[ListContinuation]';

export const DEFAULT_KEYS: ListKeyBindings = {
    confirm: 'Enter',
    openBelow: 'Mod-Enter',
    openAbove: 'Mod-Shift-Enter',
    indent: 'Tab',
    outdent: 'Shift-Tab',
};

export const DEFAULT_SETTINGS: ListContinuationSettings = {
    markers: ['-', '*', '+', '>'],
    colonMarker: null,
    filetypes: ['markdown', 'text'],
    useTabs: false,
    indentWidth: 2,
    keys: DEFAULT_KEYS,
};

export type ListContinuationOptions = Partial<Omit<ListContinuationSettings, 'keys'>> & {
    keys?: Partial<ListKeyBindings>;
};

function sanitizeMarkers(markers: readonly unknown[]): string[] {
    const kept: string[] = [];
    for (const marker of markers) {
        if (typeof marker !== 'string' || marker.length === 0 || /\s/.test(marker)) {
            console.warn(`${LOG_TAG} ignoring invalid list marker:`, marker);
            continue;
        }
        if (kept.includes(marker)) {
            console.warn(`${LOG_TAG} ignoring duplicate list marker:`, marker);
            continue;
        }
        kept.push(marker);
    }
    return kept;
}

/**
 * Merges user options over the defaults. The result is frozen and is meant to be
 * built once at setup and passed down explicitly.
 */
export function resolveSettings(options: ListContinuationOptions = {}): Readonly<ListContinuationSettings> {
    const merged: ListContinuationSettings = Object.assign({}, DEFAULT_SETTINGS, options, {
        keys: Object.assign({}, DEFAULT_KEYS, options.keys),
    });

    let markers = sanitizeMarkers(merged.markers);
    if (markers.length === 0) {
        console.warn(`${LOG_TAG} no usable list markers configured, using defaults`);
        markers = [...DEFAULT_SETTINGS.markers];
    }

    let colonMarker = merged.colonMarker;
    if (colonMarker !== null && (typeof colonMarker !== 'string' || colonMarker.length === 0)) {
        colonMarker = null;
    }

    let indentWidth = merged.indentWidth;
    if (!Number.isInteger(indentWidth) || indentWidth <= 0) {
        console.warn(`${LOG_TAG} invalid indent width, using ${DEFAULT_SETTINGS.indentWidth}:`, indentWidth);
        indentWidth = DEFAULT_SETTINGS.indentWidth;
    }

    return Object.freeze({
        ...merged,
        markers: Object.freeze(markers),
        colonMarker,
        indentWidth,
        filetypes: Object.freeze([...merged.filetypes]),
        keys: Object.freeze(merged.keys),
    });
}

export function buildIndentUnit(settings: Pick<ListContinuationSettings, 'useTabs' | 'indentWidth'>): string {
    if (settings.useTabs) return '\t';
    return ' '.repeat(Math.max(1, settings.indentWidth));
}

export function isActiveForFiletype(settings: Pick<ListContinuationSettings, 'filetypes'>, filetype: string): boolean {
    return settings.filetypes.includes(filetype);
}
