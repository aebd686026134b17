// Zod schemas and inferred types
export * from './schemas/index.js';

// Pure utils (date, money, account masking, constants)
export * from './utils/index.js';
