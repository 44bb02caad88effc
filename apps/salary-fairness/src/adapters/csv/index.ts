/**
 * @fileoverview CSV adapter barrel exports
 *
 * @module adapters/csv
 */

export {
    parseCsv,
    loadDataset,
    type Dataset,
    type DatasetRow,
} from "./csvDataset.js";
