/**
 * Library entry point
 */

export * from './contracts/tariff.contract.js';
export * from './engine/index.js';
export * from './api/client.js';
export * from './normalizers/product.normalizer.js';
export * from './workflow/orchestrator.js';
export * from './report/comparison.report.js';
export * from './report/product.report.js';
export * from './report/consumption.csv.js';
