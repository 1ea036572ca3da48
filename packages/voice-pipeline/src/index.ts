export * from './recognition';
export * from './gate';
export * from './google';
export * from './mock';
