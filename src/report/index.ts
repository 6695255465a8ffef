export * from './csv-report-sink.js';
export * from './summary.js';
