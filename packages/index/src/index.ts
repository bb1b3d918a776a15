export const name = '@index-meta/index';

export * from './hash';
export * from './package';
export * from './tar/reader';
export type * from './tar/types';
export * from './indexing/types';
export * from './indexing/classify';
export * from './indexing/walker';
export * from './indexing/targets';
export * from './indexing/accumulator';
export * from './indexing/check';
export * from './cache/codec';
export * from './cache/locker';
export * from './cache/manager';
