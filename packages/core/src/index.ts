// Corpus refresh
export * from './refresh/corpus-collector.js';
export * from './refresh/corpus-refresh.js';

// Transport glue
export * from './transport/masked-request.js';
export * from './transport/response-decoder.js';
export * from './transport/masked-fetcher.js';
