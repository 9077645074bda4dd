import { ProductRecord } from '../entities/Product';

/**
 * Port for marketing script generation.
 */
export interface IScriptGenerator {
    /**
     * Writes a spoken video script for the product.
     */
    generateScript(product: ProductRecord): Promise<string>;
}
