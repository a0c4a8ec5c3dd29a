import type { MarkerConfig } from '../../types';

/**
 * Levels past the configured markers reuse the last one.
 */
export function markerForDepth(level: number, config: MarkerConfig): string {
    const markers = config.markers;
    const index = Math.min(Math.max(0, level), markers.length - 1);
    return markers[index] ?? '';
}

export function colonMarker(config: MarkerConfig): string {
    return config.colonMarker ?? config.markers[0] ?? '';
}

export function getIndentLevel(indent: string, indentUnit: string): number {
    if (indentUnit.length === 0) return 0;
    return Math.floor(indent.length / indentUnit.length);
}
