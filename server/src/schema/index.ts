export * from './app-schema';
export * from './knowledge-bases';
export * from './file-records';
