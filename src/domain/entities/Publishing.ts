/**
 * Publishing targets the pipeline fans out to.
 */
export const PLATFORM_NAMES = ['youtube', 'instagram', 'pinterest', 'twitter'] as const;

export type PlatformName = (typeof PLATFORM_NAMES)[number];

/**
 * A generated video as publishers see it.
 * Upload-by-bytes platforms read `localPath`; upload-by-URL platforms use `remoteUrl`.
 */
export interface VideoRef {
    videoId: string;
    remoteUrl: string;
    localPath: string;
}

/**
 * Post text for one platform. Each publisher truncates to its own limits.
 */
export interface PublishMetadata {
    title: string;
    description: string;
    caption: string;
    tags: string[];
}

/**
 * What a publisher returns for a live post.
 */
export interface PublishedPost {
    id: string;
    url?: string;
}

export type PublishOutcome =
    | { status: 'success'; id: string; url?: string }
    | { status: 'failure'; reason: string };

export type PublishOutcomes = Partial<Record<PlatformName, PublishOutcome>>;

export function publishSuccess(post: PublishedPost): PublishOutcome {
    return post.url
        ? { status: 'success', id: post.id, url: post.url }
        : { status: 'success', id: post.id };
}

export function publishFailure(reason: string): PublishOutcome {
    return { status: 'failure', reason };
}

export function countOutcomes(outcomes: PublishOutcomes): { succeeded: number; failed: number } {
    const values = Object.values(outcomes);
    return {
        succeeded: values.filter((o) => o?.status === 'success').length,
        failed: values.filter((o) => o?.status === 'failure').length,
    };
}

/**
 * Cuts `text` to at most `maxLength` characters, counted in code points so an emoji
 * is never split in half.
 */
export function truncateText(text: string, maxLength: number): string {
    const chars = Array.from(text);
    return chars.length <= maxLength ? text : chars.slice(0, maxLength).join('');
}
