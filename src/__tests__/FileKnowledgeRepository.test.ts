/**
 * File knowledge store tests
 * Covers create / unchanged / replace outcomes, lookups, listing order and
 * insert validation against an in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DatabaseManager } from '../database/index.js';
import { FileKnowledgeRepository } from '../repositories/FileKnowledgeRepository.js';
import { ValidationError } from '../utils/errors.js';
import { createTestDatabase, fixedClock, makeRecordInput, steppingClock, tick } from './fixtures.js';

describe('FileKnowledgeRepository', () => {
  let db: DatabaseManager;
  let repository: FileKnowledgeRepository;

  beforeEach(async () => {
    db = await createTestDatabase();
    repository = new FileKnowledgeRepository(db, steppingClock());
  });

  afterEach(() => {
    db.close();
  });

  describe('upsert', () => {
    it('creates a record with both timestamps set to the indexing time', async () => {
      const result = await repository.upsert(
        makeRecordInput({ keyElements: ['storageAccount'], metadata: { owner: 'team-a', lines: 42 } })
      );

      expect(result.outcome).toBe('created');
      expect(result.record).toEqual({
        path: 'infra/main.bicep',
        repo: 'platform',
        fileType: 'bicep',
        technology: 'infrastructure-as-code',
        summary: 'Main deployment template',
        keyElements: ['storageAccount'],
        dependencies: [],
        tags: [],
        contentHash: 'hash-1',
        indexedAt: tick(0),
        firstIndexedAt: tick(0),
        metadata: { owner: 'team-a', lines: 42 },
      });
    });

    it('leaves the record untouched when the content hash is unchanged', async () => {
      await repository.upsert(makeRecordInput());
      const result = await repository.upsert(makeRecordInput({ summary: 'Different summary' }));

      expect(result.outcome).toBe('unchanged');
      expect(result.record.summary).toBe('Main deployment template');
      expect(result.record.indexedAt).toBe(tick(0));

      const stored = await repository.get('infra/main.bicep');
      expect(stored?.summary).toBe('Main deployment template');
    });

    it('replaces the record on a new hash and keeps the first indexing time', async () => {
      await repository.upsert(makeRecordInput({ tags: ['old'] }));
      const result = await repository.upsert(
        makeRecordInput({ contentHash: 'hash-2', summary: 'Updated template', tags: ['new'] })
      );

      expect(result.outcome).toBe('replaced');
      expect(result.record.summary).toBe('Updated template');
      expect(result.record.tags).toEqual(['new']);
      expect(result.record.contentHash).toBe('hash-2');
      expect(result.record.indexedAt).toBe(tick(1));
      expect(result.record.firstIndexedAt).toBe(tick(0));
      expect(await repository.count()).toBe(1);
    });

    it('rejects a content hash longer than 128 characters without writing', async () => {
      const error = await repository
        .upsert(makeRecordInput({ contentHash: 'x'.repeat(129) }))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError ? error.issues.map((issue) => issue.path) : []).toEqual(['contentHash']);
      expect(await repository.count()).toBe(0);
    });

    it('rejects a blank summary', async () => {
      await expect(repository.upsert(makeRecordInput({ summary: '   ' }))).rejects.toThrow(ValidationError);
      expect(await repository.get('infra/main.bicep')).toBeNull();
    });
  });

  describe('lookups', () => {
    beforeEach(async () => {
      await repository.upsert(makeRecordInput({ path: 'a.bicep', dependencies: ['b.bicep'] }));
      await repository.upsert(makeRecordInput({ path: 'b.bicep', repo: 'web', fileType: 'typescript', technology: 'frontend' }));
      await repository.upsert(makeRecordInput({ path: 'c.bicep', dependencies: ['a.bicep', 'z.bicep'] }));
    });

    it('returns null for an unknown path', async () => {
      expect(await repository.get('missing.bicep')).toBeNull();
    });

    it('matches paths exactly', async () => {
      expect(await repository.get('A.bicep')).toBeNull();
      expect((await repository.get('a.bicep'))?.path).toBe('a.bicep');
    });

    it('fetches several paths at once, skipping unknown ones', async () => {
      const found = await repository.getMany(['a.bicep', 'missing.bicep', 'a.bicep', 'c.bicep']);
      expect([...found.keys()].sort()).toEqual(['a.bicep', 'c.bicep']);
    });

    it('lists the most recently indexed first', async () => {
      const records = await repository.list();
      expect(records.map((record) => record.path)).toEqual(['c.bicep', 'b.bicep', 'a.bicep']);
    });

    it('applies filters and limit', async () => {
      expect((await repository.list({ repo: 'platform' })).map((r) => r.path)).toEqual(['c.bicep', 'a.bicep']);
      expect((await repository.list({ technology: 'frontend' })).map((r) => r.path)).toEqual(['b.bicep']);
      expect((await repository.list({ fileType: 'bicep', repo: 'web' }))).toEqual([]);
      expect((await repository.list({ limit: 2 })).map((r) => r.path)).toEqual(['c.bicep', 'b.bicep']);
    });

    it('returns declared dependency edges ordered by path', async () => {
      expect(await repository.dependencyEdges()).toEqual([
        { path: 'a.bicep', dependencies: ['b.bicep'] },
        { path: 'b.bicep', dependencies: [] },
        { path: 'c.bicep', dependencies: ['a.bicep', 'z.bicep'] },
      ]);
    });

    it('counts records per dimension', async () => {
      expect(await repository.countBy('repo')).toEqual([
        { key: 'platform', count: 2 },
        { key: 'web', count: 1 },
      ]);
    });
  });

  it('orders records indexed at the same instant by path', async () => {
    const sameTime = new FileKnowledgeRepository(db, fixedClock());
    await sameTime.upsert(makeRecordInput({ path: 'zeta.bicep' }));
    await sameTime.upsert(makeRecordInput({ path: 'alpha.bicep' }));
    await sameTime.upsert(makeRecordInput({ path: 'mid.bicep' }));

    const records = await sameTime.list();
    expect(records.map((record) => record.path)).toEqual(['alpha.bicep', 'mid.bicep', 'zeta.bicep']);
  });
});

describe('FileKnowledgeRepository on a shared database file', () => {
  let dir: string;
  let first: DatabaseManager;
  let second: DatabaseManager;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'repo-kb-test-'));
    const path = join(dir, 'nested', 'knowledge.db');
    first = await createTestDatabase(path);
    second = await createTestDatabase(path);
  });

  afterEach(() => {
    first.close();
    second.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('sees writes made through another connection', async () => {
    const writer = new FileKnowledgeRepository(first, steppingClock());
    const reader = new FileKnowledgeRepository(second, steppingClock());

    await writer.upsert(makeRecordInput());
    expect((await reader.get('infra/main.bicep'))?.contentHash).toBe('hash-1');

    const again = await reader.upsert(makeRecordInput());
    expect(again.outcome).toBe('unchanged');
  });

  it('creates a new path only once across connections', async () => {
    const left = new FileKnowledgeRepository(first, steppingClock());
    const right = new FileKnowledgeRepository(second, steppingClock());

    const outcomes = await Promise.all([
      left.upsert(makeRecordInput({ path: 'shared.bicep' })),
      right.upsert(makeRecordInput({ path: 'shared.bicep' })),
    ]);

    expect(outcomes.map((result) => result.outcome).sort()).toEqual(['created', 'unchanged']);
    expect(await left.count()).toBe(1);
    expect(await right.count()).toBe(1);
  });

  it('replaces rather than re-creates when the second connection brings a new hash', async () => {
    const left = new FileKnowledgeRepository(first, steppingClock());
    const right = new FileKnowledgeRepository(second, steppingClock());

    const outcomes = await Promise.all([
      left.upsert(makeRecordInput({ path: 'shared.bicep', contentHash: 'hash-left' })),
      right.upsert(makeRecordInput({ path: 'shared.bicep', contentHash: 'hash-right' })),
    ]);

    expect(outcomes.map((result) => result.outcome).sort()).toEqual(['created', 'replaced']);
    expect(await right.count()).toBe(1);
  });

  it('applies migrations once per database file', () => {
    expect(first.getAppliedMigrations()).toEqual(['001_file_knowledge']);
    expect(second.getAppliedMigrations()).toEqual(['001_file_knowledge']);
  });
});
