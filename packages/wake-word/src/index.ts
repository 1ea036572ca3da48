export * from './backend';
export * from './porcupine';
export * from './mock';
