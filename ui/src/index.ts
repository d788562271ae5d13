export * from './lib/types';
export * from './lib/serverComm';
export * from './lib/progress-poller';
export * from './lib/query-narration';
export * from './lib/query-history';
export * from './lib/file-list';
