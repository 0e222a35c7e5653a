/**
 * Data Loading
 */

export { loadBarsFromCSV, parseCSVTimestamp, type CSVLoadOptions, type CSVTimestampFormat } from './csv-loader.js';
