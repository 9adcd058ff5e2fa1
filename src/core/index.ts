export * from './metric-catalog.js';
export * from './lookup-tables.js';
export * from './field-normalizer.js';
export * from './parsers/status-page-parser.js';
export * from './parsers/json-payload-parser.js';
export * from './endpoint-table.js';
export * from './snapshot-aggregator.js';
export * from './modem-poller.js';
export * from './modem-monitor.js';
export * from './metric-surface.js';
