/**
 * Data models
 *
 * Barrel export for all model interfaces.
 */

export * from './content-record.js';
export * from './storage.js';
export * from './dynamic-table.js';
export * from './performance.js';
export * from './maintenance.js';
