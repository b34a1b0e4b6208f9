export * from './types';
export * from './timing';
export * from './srtParser';
export * from './overlapRepair';
export * from './lineMerge';
export * from './bilingual';
export * from './assRenderer';
