export * from './weather';
export * from './cache';
