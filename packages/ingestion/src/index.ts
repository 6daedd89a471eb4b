export { BALANCE_REPORT_HEADER, formatBalanceRow, formatBalancesCsv, writeBalances } from './balance-report.js';
export { ingestTransactions, type IngestionSummary } from './ingest-transactions.js';
export { parseTransactionRecord, TransactionRecordSchema, type TransactionRecord } from './transaction-record.js';
