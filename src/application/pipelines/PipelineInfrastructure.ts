/**
 * Pipeline infrastructure for the per-product stages.
 * Each step has a single responsibility.
 */

import { ProductRecord } from '../../domain/entities/Product';
import { PublishOutcomes } from '../../domain/entities/Publishing';
import { VideoResult } from '../../domain/entities/Video';

/**
 * ProductContext carries all state through the pipeline.
 * Immutable pattern: each step returns a new context.
 */
export interface ProductContext {
    readonly rowIndex: number;
    readonly product: ProductRecord;
    readonly productName: string;

    // Script
    readonly script?: string;

    // Video
    readonly video?: VideoResult;
    readonly localPath?: string;

    // Publish
    readonly outcomes?: PublishOutcomes;
}

/**
 * Pipeline step interface.
 * Each step has exactly one responsibility.
 */
export interface PipelineStep {
    readonly name: string;
    execute(context: ProductContext): Promise<ProductContext>;
}

export function createProductContext(product: ProductRecord, rowIndex: number, productName: string): ProductContext {
    return { rowIndex, product, productName };
}

/**
 * Executes a pipeline of steps sequentially. A throwing step stops the pipeline.
 */
export async function executePipeline(
    context: ProductContext,
    steps: PipelineStep[]
): Promise<ProductContext> {
    let currentContext = context;

    for (const step of steps) {
        console.log(`[Pipeline] Executing ${step.name} for row ${currentContext.rowIndex}...`);
        currentContext = await step.execute(currentContext);
    }

    return currentContext;
}
