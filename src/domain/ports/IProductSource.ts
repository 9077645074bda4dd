import { ProductRecord } from '../entities/Product';

/**
 * Port for the spreadsheet (or any ordered list) holding the products.
 */
export interface IProductSource {
    /**
     * Returns every product in sheet order. Index 0 is the first data row.
     */
    listProducts(): Promise<ProductRecord[]>;

    /**
     * Records that a row was processed.
     * @param rowIndex - Index into the list returned by listProducts
     * @param timestamp - ISO timestamp written into the sheet
     */
    markProcessed(rowIndex: number, timestamp: string): Promise<void>;
}
