import {
    buildPublishMetadata,
    getProductField,
    getProductName,
    getProductTags,
} from '../../../../src/domain/entities/Product';

describe('Product', () => {
    describe('getProductField', () => {
        it('should resolve fields regardless of header casing', () => {
            expect(getProductField({ Name: 'Widget' }, 'name')).toBe('Widget');
            expect(getProductField({ DESCRIPTION: 'Shiny' }, 'description')).toBe('Shiny');
        });

        it('should skip empty values and keep looking', () => {
            expect(getProductField({ name: '', NAME: 'Gadget' }, 'name')).toBe('Gadget');
        });

        it('should stringify numbers and trim strings', () => {
            expect(getProductField({ price: 19.99 }, 'price')).toBe('19.99');
            expect(getProductField({ tagline: '  Bold  ' }, 'tagline')).toBe('Bold');
        });

        it('should return undefined for missing or null fields', () => {
            expect(getProductField({ price: null }, 'price')).toBeUndefined();
            expect(getProductField({}, 'name')).toBeUndefined();
        });
    });

    describe('getProductName', () => {
        it('should fall back to the row index', () => {
            expect(getProductName({}, 3)).toBe('Product 3');
            expect(getProductName({})).toBe('Product');
        });
    });

    describe('getProductTags', () => {
        it('should split comma separated tags', () => {
            expect(getProductTags({ tags: 'kitchen, steel,,gift ' })).toEqual(['kitchen', 'steel', 'gift']);
        });

        it('should fall back to the product name', () => {
            expect(getProductTags({ name: 'Widget' })).toEqual(['Widget']);
        });
    });

    describe('buildPublishMetadata', () => {
        const product = { name: 'Widget', description: 'A very useful widget', tagline: 'Built to last', tags: 'tools,home' };

        it('should build title from name and tagline', () => {
            expect(buildPublishMetadata(product, 'youtube')).toEqual({
                title: 'Widget - Built to last',
                description: 'A very useful widget',
                caption: 'A very useful widget',
                tags: ['tools', 'home'],
            });
        });

        it('should use the default tagline when none is set', () => {
            const metadata = buildPublishMetadata({ name: 'Widget' }, 'pinterest');
            expect(metadata.title).toBe('Widget - Amazing Product');
        });

        it('should apply per-platform overrides case-insensitively', () => {
            const metadata = buildPublishMetadata(
                { ...product, YouTube_Title: 'Custom title', instagram_caption: 'Only for IG' },
                'youtube'
            );
            expect(metadata.title).toBe('Custom title');
            expect(metadata.caption).toBe('A very useful widget');

            expect(buildPublishMetadata({ ...product, instagram_caption: 'Only for IG' }, 'instagram').caption)
                .toBe('Only for IG');
        });

        it('should ignore empty overrides', () => {
            expect(buildPublishMetadata({ ...product, youtube_title: '' }, 'youtube').title).toBe('Widget - Built to last');
        });

        it('should compose the twitter caption from title and description', () => {
            const metadata = buildPublishMetadata({ name: 'Widget', description: 'Short' }, 'twitter');
            expect(metadata.caption).toBe('Widget - Amazing Product\n\nShort...');
        });

        it('should cut the twitter description at 200 characters', () => {
            const metadata = buildPublishMetadata({ name: 'W', description: 'x'.repeat(250) }, 'twitter');
            expect(metadata.caption).toBe(`W - Amazing Product\n\n${'x'.repeat(200)}...`);
        });
    });
});
