import { PipelineStep, ProductContext } from '../PipelineInfrastructure';
import { IPlatformPublisher } from '../../../domain/ports/IPlatformPublisher';
import { buildPublishMetadata } from '../../../domain/entities/Product';
import {
    PublishOutcomes,
    VideoRef,
    publishFailure,
    publishSuccess,
} from '../../../domain/entities/Publishing';
import { getErrorMessage } from '../../../domain/errors';

/**
 * Fans the video out to every publisher at once.
 * A publisher failure is recorded in the outcome map; this step never throws because of one.
 */
export class PublishStep implements PipelineStep {
    readonly name = 'Publish';

    constructor(private readonly publishers: IPlatformPublisher[]) { }

    async execute(context: ProductContext): Promise<ProductContext> {
        const { video, localPath, product, productName } = context;
        if (!video) throw new Error('Video required for publishing');
        if (!localPath) throw new Error('Downloaded file required for publishing');

        const ref: VideoRef = {
            videoId: video.videoId,
            remoteUrl: video.videoUrl,
            localPath,
        };

        console.log(`[${productName}] Publishing to ${this.publishers.map(p => p.platform).join(', ')}...`);

        const settled = await Promise.allSettled(
            this.publishers.map(async publisher =>
                publisher.publish(ref, buildPublishMetadata(product, publisher.platform))
            )
        );

        const outcomes: PublishOutcomes = {};
        settled.forEach((result, index) => {
            const { platform } = this.publishers[index];
            if (result.status === 'fulfilled') {
                outcomes[platform] = publishSuccess(result.value);
            } else {
                const reason = getErrorMessage(result.reason);
                console.error(`[${productName}] ${platform} upload failed: ${reason}`);
                outcomes[platform] = publishFailure(reason);
            }
        });

        return { ...context, outcomes };
    }
}
