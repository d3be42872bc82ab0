export { loadHoldings, parseHoldingsCsv, portfolioNameFrom } from './loadHoldings.js';
export { createHoldingsTable, inferColumnKind } from './holdingsTable.js';
export type { RawRecord } from './holdingsTable.js';
export { toNumber, toDate, toLabel, isNumericText } from './parseUtils.js';
export { fetchWithRetry } from './httpClient.js';
