import { PipelineStep, ProductContext } from '../PipelineInfrastructure';
import { IProductSource } from '../../../domain/ports/IProductSource';
import { getErrorMessage } from '../../../domain/errors';

/**
 * Stamps the processed row in the product source. Failures are logged only.
 */
export class BookkeepingStep implements PipelineStep {
    readonly name = 'Bookkeeping';

    constructor(
        private readonly productSource: IProductSource,
        private readonly now: () => Date = () => new Date()
    ) { }

    async execute(context: ProductContext): Promise<ProductContext> {
        try {
            await this.productSource.markProcessed(context.rowIndex, this.now().toISOString());
        } catch (error) {
            console.warn(`[${context.productName}] Could not mark row ${context.rowIndex} as processed: ${getErrorMessage(error)}`);
        }
        return context;
    }
}
