export { CsvEventSource } from './csv/csv-event-source.js';
export { CsvTransactionRowSchema, REQUIRED_COLUMNS, describeIssues, type CsvTransactionRow } from './csv/schemas.js';
export { MemoryEventSource } from './memory/memory-event-source.js';
