export type VideoStatus = 'pending' | 'completed' | 'failed';

/**
 * Result of a video generation request. Immutable once completed.
 */
export interface VideoResult {
    readonly videoId: string;
    readonly videoUrl: string;
    readonly status: VideoStatus;
}
