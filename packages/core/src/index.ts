export * from './constants';
export * from './errors';
export * from './schemas';
export * from './radix-parser';
export * from './try-parse';
export * from './numeral-schema';
