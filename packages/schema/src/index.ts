export * from './config';
export * from './json';
export * from './result';
