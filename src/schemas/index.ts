// Drizzle tables and their zod schemas
export * from './fileKnowledge.js';

import { fileKnowledge } from './fileKnowledge.js';

export const allTables = {
  fileKnowledge,
} as const;
