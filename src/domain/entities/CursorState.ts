/**
 * Persisted position in the product list.
 */
export interface CursorState {
    /** Index of the next product to process */
    currentRow: number;
    /** ISO timestamp of the last cursor advance */
    lastRun: string | null;
}

export const DEFAULT_CURSOR_STATE: Readonly<CursorState> = Object.freeze({
    currentRow: 0,
    lastRun: null,
});

export function createDefaultCursorState(): CursorState {
    return { ...DEFAULT_CURSOR_STATE };
}

/**
 * Maps a stored row onto the current list. The list may have grown or shrunk since it was saved.
 */
export function wrapRow(row: number, listLength: number): number {
    if (listLength <= 0) {
        throw new RangeError('listLength must be positive');
    }
    return ((row % listLength) + listLength) % listLength;
}

/**
 * Validates a parsed state file. Returns null when the shape is wrong.
 */
export function parseCursorState(value: unknown): CursorState | null {
    if (typeof value !== 'object' || value === null || !('currentRow' in value)) {
        return null;
    }
    const { currentRow } = value;
    if (typeof currentRow !== 'number' || !Number.isInteger(currentRow) || currentRow < 0) {
        return null;
    }

    let lastRun: string | null = null;
    if ('lastRun' in value) {
        const raw = value.lastRun;
        if (typeof raw === 'string') {
            lastRun = raw;
        } else if (raw !== null && raw !== undefined) {
            return null;
        }
    }

    return { currentRow, lastRun };
}
