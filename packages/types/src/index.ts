// Wire types
export * from './types/index.js';

// Zod schemas
export * from './schemas/index.js';

// Response contract validation (AJV)
export * from './validation/index.js';

// Pure utils (date, money, text, constants)
export * from './utils/index.js';

// Errors and logging
export * from './errors/index.js';
export * from './logging/index.js';
