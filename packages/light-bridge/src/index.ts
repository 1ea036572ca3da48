export * from './light';
export * from './mock';
export * from './hue';
