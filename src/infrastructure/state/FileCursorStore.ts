import fs from 'fs/promises';
import path from 'path';
import { ICursorStore } from '../../domain/ports/ICursorStore';
import { CursorState, createDefaultCursorState, parseCursorState } from '../../domain/entities/CursorState';
import { StateCorruptionError, getErrorMessage } from '../../domain/errors';
import { Semaphore } from '../concurrency/Semaphore';

export interface FileCursorStoreOptions {
    /** Clock used for lastRun stamps */
    now?: () => Date;
}

/**
 * Cursor store backed by a small JSON file.
 *
 * Writes go to a sibling temp file that is renamed over the target, so a crash never
 * leaves half a record behind. Persistence is best-effort: a failed write is logged and
 * the in-memory run carries on.
 */
export class FileCursorStore implements ICursorStore {
    private readonly statePath: string;
    private readonly now: () => Date;
    private readonly ioLock = new Semaphore(1);

    constructor(statePath: string, options: FileCursorStoreOptions = {}) {
        if (!statePath.trim()) {
            throw new Error('State file path is required');
        }
        this.statePath = path.resolve(statePath);
        this.now = options.now ?? (() => new Date());
    }

    get filePath(): string {
        return this.statePath;
    }

    async load(): Promise<CursorState> {
        return this.ioLock.runExclusive(() => this.readState());
    }

    async save(state: CursorState): Promise<void> {
        await this.ioLock.runExclusive(() => this.writeState(state));
    }

    async advance(nextRow: number): Promise<CursorState> {
        return this.ioLock.runExclusive(async () => {
            const state: CursorState = {
                currentRow: nextRow,
                lastRun: this.now().toISOString(),
            };
            await this.writeState(state);
            return state;
        });
    }

    async reset(): Promise<CursorState> {
        return this.ioLock.runExclusive(async () => {
            const current = await this.readState();
            const state: CursorState = { currentRow: 0, lastRun: current.lastRun };
            await this.writeState(state);
            console.log(`[CursorStore] Cursor reset to row 0 (${this.statePath})`);
            return state;
        });
    }

    private async readState(): Promise<CursorState> {
        let raw: string;
        try {
            raw = await fs.readFile(this.statePath, 'utf-8');
        } catch (error) {
            if (isMissingFile(error)) {
                return createDefaultCursorState();
            }
            this.warnCorrupt(getErrorMessage(error));
            return createDefaultCursorState();
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            this.warnCorrupt(`invalid JSON (${getErrorMessage(error)})`);
            return createDefaultCursorState();
        }

        const state = parseCursorState(parsed);
        if (!state) {
            this.warnCorrupt('unexpected shape');
            return createDefaultCursorState();
        }
        return state;
    }

    private async writeState(state: CursorState): Promise<void> {
        const tmpPath = `${this.statePath}.tmp`;
        try {
            await fs.mkdir(path.dirname(this.statePath), { recursive: true });
            await fs.writeFile(tmpPath, JSON.stringify(state, null, 2), 'utf-8');
            await fs.rename(tmpPath, this.statePath);
        } catch (error) {
            console.error(`[CursorStore] Could not save state to ${this.statePath}:`, getErrorMessage(error));
        }
    }

    private warnCorrupt(reason: string): void {
        const error = new StateCorruptionError(this.statePath, reason);
        console.warn(`[CursorStore] ${error.message}. Starting from row 0.`);
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
