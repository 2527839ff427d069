import { DatabaseManager } from '../database/index.js';
import type { FileRecordInput } from '../schemas/index.js';

export const START_TIME = '2026-01-01T00:00:00.000Z';

/** Clock that advances one second per reading, starting at START_TIME. */
export function steppingClock(start: string = START_TIME, stepMs = 1000): () => Date {
  let ticks = 0;
  const origin = new Date(start).getTime();
  return () => new Date(origin + stepMs * ticks++);
}

export function fixedClock(at: string = START_TIME): () => Date {
  return () => new Date(at);
}

/** ISO timestamp of the nth reading of a default stepping clock. */
export function tick(n: number): string {
  return new Date(new Date(START_TIME).getTime() + n * 1000).toISOString();
}

export async function createTestDatabase(path = ':memory:'): Promise<DatabaseManager> {
  const db = new DatabaseManager({ path });
  await db.initialize();
  return db;
}

export function makeRecordInput(overrides: Partial<FileRecordInput> = {}): FileRecordInput {
  return {
    path: 'infra/main.bicep',
    repo: 'platform',
    fileType: 'bicep',
    technology: 'infrastructure-as-code',
    summary: 'Main deployment template',
    keyElements: [],
    dependencies: [],
    tags: [],
    contentHash: 'hash-1',
    metadata: {},
    ...overrides,
  };
}

/** Tool-shaped (snake_case) input for index_file and the service facade. */
export function makeToolInput(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    path: 'infra/main.bicep',
    repo: 'platform',
    file_type: 'bicep',
    technology: 'infrastructure-as-code',
    summary: 'Main deployment template',
    content_hash: 'hash-1',
    ...overrides,
  };
}
