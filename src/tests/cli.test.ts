/**
 * CLI tests: import, search, context and stats against a temporary database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createProgram, type CliIO } from '../cli/index.js';
import { Logger } from '../utils/logger.js';

interface CapturedIO extends CliIO {
  out: string[];
  err: string[];
}

function captureIO(): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    env: { LOG_LEVEL: 'error' },
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    out,
    err,
  };
}

async function run(io: CliIO, args: string[]): Promise<void> {
  await createProgram(io).exitOverride().parseAsync(args, { from: 'user' });
}

const files = [
  {
    path: 'infra/storage.bicep',
    repo: 'platform',
    file_type: 'bicep',
    technology: 'infrastructure-as-code',
    summary: 'Creates the storage account',
    tags: ['storage'],
    dependencies: ['infra/vars.json'],
    content_hash: 'hash-storage',
  },
  {
    path: 'web/app.ts',
    repo: 'web',
    file_type: 'typescript',
    technology: 'frontend',
    summary: 'Single page app shell',
    dependencies: ['infra/storage.bicep'],
    content_hash: 'hash-app',
  },
];

describe('repo-kb CLI', () => {
  let dir: string;
  let dbPath: string;
  let io: CapturedIO;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'repo-kb-cli-'));
    dbPath = join(dir, 'kb.db');
    io = captureIO();
  });

  afterEach(() => {
    process.exitCode = undefined;
    Logger.reset();
    rmSync(dir, { recursive: true, force: true });
  });

  async function importFiles(content: unknown): Promise<void> {
    const file = join(dir, 'files.json');
    writeFileSync(file, JSON.stringify(content));
    await run(io, ['import', file, '--db', dbPath]);
  }

  it('imports a bare array of records', async () => {
    await importFiles(files);

    expect(io.err).toEqual([]);
    expect(JSON.parse(io.out.join(''))).toMatchObject({
      summary: { created: 2, unchanged: 0, replaced: 0, failed: 0 },
    });
  });

  it('imports a { files } envelope', async () => {
    await importFiles({ files: files.slice(0, 1) });
    expect(JSON.parse(io.out.join(''))).toMatchObject({ summary: { created: 1 } });
  });

  it('refuses an import file of the wrong shape', async () => {
    await importFiles({ records: files });

    expect(io.out).toEqual([]);
    expect(io.err.join('')).toContain('must contain an array of file records');
    expect(process.exitCode).toBe(1);
  });

  it('searches imported knowledge', async () => {
    await importFiles(files);
    io.out.length = 0;

    await run(io, ['search', 'storage', '--db', dbPath, '--limit', '5']);

    expect(JSON.parse(io.out.join(''))).toMatchObject({
      count: 1,
      results: [{ record: { path: 'infra/storage.bicep' }, score: 6 }],
    });
  });

  it('shows a file with its dependents', async () => {
    await importFiles(files);
    io.out.length = 0;

    await run(io, ['context', 'infra/storage.bicep', '--db', dbPath]);

    expect(JSON.parse(io.out.join(''))).toMatchObject({
      record: { path: 'infra/storage.bicep' },
      dependents: ['web/app.ts'],
    });
  });

  it('analyzes dependencies with a depth bound', async () => {
    await importFiles(files);
    io.out.length = 0;

    await run(io, ['deps', 'web/app.ts', '--db', dbPath, '--max-depth', '1']);

    expect(JSON.parse(io.out.join(''))).toMatchObject({
      dependency_depth_map: { 'web/app.ts': 0, 'infra/storage.bicep': 1 },
      depth: 1,
    });
  });

  it('prints stats', async () => {
    await importFiles(files);
    io.out.length = 0;

    await run(io, ['stats', '--db', dbPath]);

    expect(JSON.parse(io.out.join(''))).toMatchObject({ total_count: 2, total_dependencies: 2 });
  });

  it('reports tool errors on stderr with a failing exit code', async () => {
    await run(io, ['context', 'missing.ts', '--db', dbPath]);

    expect(io.out).toEqual([]);
    expect(io.err.join('')).toContain('No knowledge indexed for path: missing.ts');
    expect(process.exitCode).toBe(1);
  });
});
