import path from 'path';
import { PipelineStep, ProductContext } from '../PipelineInfrastructure';
import { IMediaDownloader } from '../../../domain/ports/IMediaDownloader';

/**
 * Downloads the finished video so upload-by-bytes publishers can read it.
 */
export class MaterializeStep implements PipelineStep {
    readonly name = 'Materialize';

    constructor(
        private readonly downloader: IMediaDownloader,
        private readonly outputDir: string,
        private readonly now: () => Date = () => new Date()
    ) { }

    async execute(context: ProductContext): Promise<ProductContext> {
        const { video, rowIndex, productName } = context;
        if (!video) throw new Error('Video required for download');

        const epochSeconds = Math.floor(this.now().getTime() / 1000);
        const outputPath = path.join(this.outputDir, `video_${rowIndex}_${epochSeconds}.mp4`);

        console.log(`[${productName}] Downloading video ${video.videoId}...`);
        const localPath = await this.downloader.download(video.videoUrl, outputPath);
        return { ...context, localPath };
    }
}
