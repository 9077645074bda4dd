import { IProductSource } from '../domain/ports/IProductSource';
import { ICursorStore } from '../domain/ports/ICursorStore';
import { ProductRunResult } from '../domain/entities/AutomationJob';
import { wrapRow } from '../domain/entities/CursorState';
import { ConfigurationError } from '../domain/errors';
import { sleep } from '../infrastructure/http/RetryUtils';
import { ProductProcessor } from './ProductPipeline';

export interface RunSummary {
    productsProcessed: number;
    products: ProductRunResult[];
}

export interface RunExecutorDeps {
    productSource: IProductSource;
    cursorStore: ICursorStore;
    pipeline: ProductProcessor;
    /** Pause between products (default: 60000) */
    interProductDelayMs?: number;
    delay?: (ms: number) => Promise<void>;
}

/**
 * Walks the product list round-robin from the persisted cursor.
 *
 * The cursor moves past a product only after its pipeline finished. The first
 * failing product aborts the run and leaves the cursor on that product.
 * No lock is held across the pipeline: runs sharing a cursor may overlap and
 * process the same row twice.
 */
export class RunExecutor {
    private readonly interProductDelayMs: number;
    private readonly delay: (ms: number) => Promise<void>;

    constructor(private readonly deps: RunExecutorDeps) {
        this.interProductDelayMs = deps.interProductDelayMs ?? 60000;
        this.delay = deps.delay ?? sleep;
    }

    async run(processCount: number): Promise<RunSummary> {
        if (!Number.isInteger(processCount) || processCount < 1) {
            throw new ConfigurationError(`Products per run must be an integer >= 1, got: ${processCount}`);
        }

        const { productSource, cursorStore, pipeline } = this.deps;

        const products = await productSource.listProducts();
        const total = products.length;
        if (total === 0) {
            console.warn('[RunExecutor] No products found in sheet');
            return { productsProcessed: 0, products: [] };
        }

        const { currentRow } = await cursorStore.load();
        const startRow = wrapRow(currentRow, total);
        console.log(`[RunExecutor] Starting from row ${startRow + 1} of ${total}`);

        const results: ProductRunResult[] = [];
        for (let i = 0; i < processCount; i++) {
            const rowIndex = (startRow + i) % total;
            console.log(`[RunExecutor] Processing product ${rowIndex + 1}/${total}`);

            results.push(await pipeline.processProduct(products[rowIndex], rowIndex));
            await cursorStore.advance((rowIndex + 1) % total);

            if (i < processCount - 1 && this.interProductDelayMs > 0) {
                console.log(`[RunExecutor] Waiting ${Math.round(this.interProductDelayMs / 1000)}s before the next product...`);
                await this.delay(this.interProductDelayMs);
            }
        }

        console.log(`[RunExecutor] ✅ Run completed: ${results.length} product(s) processed`);
        return { productsProcessed: results.length, products: results };
    }
}
