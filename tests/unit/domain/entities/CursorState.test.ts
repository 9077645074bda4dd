import { createDefaultCursorState, parseCursorState, wrapRow } from '../../../../src/domain/entities/CursorState';

describe('CursorState', () => {
    describe('wrapRow', () => {
        it('should keep rows inside the list', () => {
            expect(wrapRow(0, 3)).toBe(0);
            expect(wrapRow(2, 3)).toBe(2);
            expect(wrapRow(5, 3)).toBe(2);
        });

        it('should wrap a cursor left behind by a shrunk list', () => {
            expect(wrapRow(10, 4)).toBe(2);
        });

        it('should reject an empty list', () => {
            expect(() => wrapRow(0, 0)).toThrow(RangeError);
        });
    });

    describe('parseCursorState', () => {
        it('should accept a valid state', () => {
            expect(parseCursorState({ currentRow: 2, lastRun: '2024-05-01T09:00:00.000Z' }))
                .toEqual({ currentRow: 2, lastRun: '2024-05-01T09:00:00.000Z' });
        });

        it('should default a missing lastRun to null', () => {
            expect(parseCursorState({ currentRow: 1 })).toEqual({ currentRow: 1, lastRun: null });
        });

        it.each([
            ['negative row', { currentRow: -1, lastRun: null }],
            ['fractional row', { currentRow: 1.5, lastRun: null }],
            ['string row', { currentRow: '1', lastRun: null }],
            ['numeric lastRun', { currentRow: 1, lastRun: 5 }],
            ['missing row', { lastRun: null }],
            ['array', [1, 2]],
            ['null', null],
        ])('should reject %s', (_label, value) => {
            expect(parseCursorState(value)).toBeNull();
        });
    });

    it('should hand out independent default states', () => {
        const state = createDefaultCursorState();
        state.currentRow = 4;
        expect(createDefaultCursorState()).toEqual({ currentRow: 0, lastRun: null });
    });
});
