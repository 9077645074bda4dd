import { CursorState } from '../entities/CursorState';

/**
 * Port for the persisted product cursor.
 */
export interface ICursorStore {
    /**
     * Returns the stored state, or the default when nothing usable is stored.
     */
    load(): Promise<CursorState>;

    /**
     * Overwrites the stored state.
     */
    save(state: CursorState): Promise<void>;

    /**
     * Moves the cursor to `nextRow` and stamps lastRun.
     */
    advance(nextRow: number): Promise<CursorState>;

    /**
     * Sets currentRow back to 0.
     */
    reset(): Promise<CursorState>;
}
