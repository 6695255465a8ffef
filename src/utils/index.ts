export { logger, createLogger } from './logger.js';
export { fetchWithTimeout, createTimedFetch, RequestTimeoutError } from './http.js';
export { parseCsvLine, splitCsvLines, formatCsvField, formatCsvRow } from './csv.js';
