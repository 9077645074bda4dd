import { PipelineStep, ProductContext } from '../PipelineInfrastructure';
import { IVideoGenerator } from '../../../domain/ports/IVideoGenerator';
import { UpstreamRequestError } from '../../../domain/errors';

export class VideoStep implements PipelineStep {
    readonly name = 'Video';

    constructor(private readonly videoGenerator: IVideoGenerator) { }

    async execute(context: ProductContext): Promise<ProductContext> {
        const { script, product, productName } = context;
        if (!script) throw new Error('Script required for video generation');

        console.log(`[${productName}] Creating avatar video...`);
        const video = await this.videoGenerator.createVideo(script, product);

        if (video.status !== 'completed' || !video.videoUrl) {
            throw new UpstreamRequestError('VideoGenerator', `Video ${video.videoId} finished with status ${video.status}`);
        }
        return { ...context, video };
    }
}
