export * from './types/enums.js';
export * from './types/domain.js';
