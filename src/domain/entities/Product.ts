import { PlatformName, PublishMetadata } from './Publishing';

export type ProductFieldValue = string | number | boolean | null;

/**
 * One spreadsheet row keyed by its header names.
 * Header casing depends on whoever maintains the sheet, so lookups go through getProductField.
 */
export type ProductRecord = Readonly<Record<string, ProductFieldValue>>;

const DEFAULT_TAGLINE = 'Amazing Product';

/**
 * Resolves a field by exact name first, then case-insensitively.
 * Empty strings count as missing.
 */
export function getProductField(product: ProductRecord, field: string): string | undefined {
    const exact = product[field];
    if (exact !== undefined && exact !== null && String(exact).trim() !== '') {
        return String(exact).trim();
    }

    const wanted = field.toLowerCase();
    for (const [key, value] of Object.entries(product)) {
        if (key.trim().toLowerCase() !== wanted) continue;
        if (value === null || String(value).trim() === '') continue;
        return String(value).trim();
    }

    return undefined;
}

export function getProductName(product: ProductRecord, rowIndex?: number): string {
    return getProductField(product, 'name')
        ?? (rowIndex !== undefined ? `Product ${rowIndex}` : 'Product');
}

export function getProductDescription(product: ProductRecord): string {
    return getProductField(product, 'description') ?? '';
}

export function getProductPrice(product: ProductRecord): string {
    return getProductField(product, 'price') ?? '';
}

/**
 * Splits the comma separated `tags` column, falling back to the product name.
 */
export function getProductTags(product: ProductRecord): string[] {
    const raw = getProductField(product, 'tags');
    if (!raw) {
        return [getProductName(product)];
    }
    const tags = raw.split(',').map((tag) => tag.trim()).filter((tag) => tag.length > 0);
    return tags.length > 0 ? tags : [getProductName(product)];
}

function defaultCaption(platform: PlatformName, title: string, description: string): string {
    if (platform === 'twitter') {
        return `${title}\n\n${description.slice(0, 200)}...`;
    }
    return description;
}

/**
 * Builds the untruncated post metadata for a platform.
 * `<platform>_title`, `<platform>_description` and `<platform>_caption` columns override the generic values.
 */
export function buildPublishMetadata(product: ProductRecord, platform: PlatformName): PublishMetadata {
    const name = getProductName(product);
    const tagline = getProductField(product, 'tagline') ?? DEFAULT_TAGLINE;

    const title = getProductField(product, `${platform}_title`) ?? `${name} - ${tagline}`;
    const description = getProductField(product, `${platform}_description`) ?? getProductDescription(product);
    const caption = getProductField(product, `${platform}_caption`) ?? defaultCaption(platform, title, description);

    return {
        title,
        description,
        caption,
        tags: getProductTags(product),
    };
}
