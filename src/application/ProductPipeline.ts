import { IScriptGenerator } from '../domain/ports/IScriptGenerator';
import { IVideoGenerator } from '../domain/ports/IVideoGenerator';
import { IMediaDownloader } from '../domain/ports/IMediaDownloader';
import { IPlatformPublisher } from '../domain/ports/IPlatformPublisher';
import { IProductSource } from '../domain/ports/IProductSource';
import { ProductRecord, getProductName } from '../domain/entities/Product';
import { PublishOutcomes, countOutcomes } from '../domain/entities/Publishing';
import { ProductRunResult } from '../domain/entities/AutomationJob';
import {
    BookkeepingStep,
    MaterializeStep,
    PipelineStep,
    PublishStep,
    ScriptStep,
    VideoStep,
    createProductContext,
    executePipeline,
} from './pipelines';

/**
 * Anything that can take one product through the full pipeline.
 */
export interface ProductProcessor {
    processProduct(product: ProductRecord, rowIndex: number): Promise<ProductRunResult>;
}

export interface ProductPipelineDeps {
    scriptGenerator: IScriptGenerator;
    videoGenerator: IVideoGenerator;
    downloader: IMediaDownloader;
    publishers: IPlatformPublisher[];
    productSource: IProductSource;
    videoOutputDir: string;
    now?: () => Date;
}

/**
 * Script -> video -> download -> publish fan-out -> bookkeeping for a single product.
 *
 * Failures in the first three stages propagate. Publisher failures end up in the
 * outcome map and bookkeeping failures are only logged.
 */
export class ProductPipeline implements ProductProcessor {
    private readonly steps: PipelineStep[];

    constructor(deps: ProductPipelineDeps) {
        const now = deps.now ?? (() => new Date());
        this.steps = [
            new ScriptStep(deps.scriptGenerator),
            new VideoStep(deps.videoGenerator),
            new MaterializeStep(deps.downloader, deps.videoOutputDir, now),
            new PublishStep(deps.publishers),
            new BookkeepingStep(deps.productSource, now),
        ];
    }

    /**
     * Returns one outcome per configured publisher.
     */
    async process(product: ProductRecord, rowIndex: number): Promise<PublishOutcomes> {
        const result = await this.processProduct(product, rowIndex);
        return result.outcomes;
    }

    async processProduct(product: ProductRecord, rowIndex: number): Promise<ProductRunResult> {
        const productName = getProductName(product, rowIndex);
        console.log(`[Pipeline] Processing product: ${productName} (row ${rowIndex})`);

        const context = await executePipeline(
            createProductContext(product, rowIndex, productName),
            this.steps
        );

        const outcomes = context.outcomes ?? {};
        const { succeeded, failed } = countOutcomes(outcomes);
        console.log(`[Pipeline] ${productName} processed: ${succeeded} published, ${failed} failed`);
        console.log(`[Pipeline] Results: ${JSON.stringify(outcomes, null, 2)}`);

        return {
            rowIndex,
            productName,
            videoId: context.video?.videoId ?? '',
            outcomes,
        };
    }
}
