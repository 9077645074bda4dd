import { PlatformName, PublishedPost, PublishMetadata, VideoRef } from '../entities/Publishing';

/**
 * Port for one social publishing target.
 * Implementations truncate metadata to their platform's limits and throw on failure.
 */
export interface IPlatformPublisher {
    readonly platform: PlatformName;

    publish(video: VideoRef, metadata: PublishMetadata): Promise<PublishedPost>;
}
