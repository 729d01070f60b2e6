export * from './db';
export * from './build';
export * from './diff';
export * from './verify';
