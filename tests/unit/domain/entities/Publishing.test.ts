import { truncateText } from '../../../../src/domain/entities/Publishing';

describe('truncateText', () => {
    it('should leave short text alone', () => {
        expect(truncateText('Widget', 10)).toBe('Widget');
    });

    it('should cut long text to the limit', () => {
        expect(truncateText('Meet the Widget', 8)).toBe('Meet the');
    });

    it('should count an emoji as one character', () => {
        expect(truncateText('Sale 🎉🎉 today', 6)).toBe('Sale 🎉');
        expect(truncateText('🎉🎉🎉', 3)).toBe('🎉🎉🎉');
    });
});
