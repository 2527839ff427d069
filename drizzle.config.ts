import { defineConfig } from 'drizzle-kit';
import { join } from 'path';

const projectRoot = process.cwd();

// Same default location as the runtime (KB_DATABASE_PATH)
const dbPath = process.env.KB_DATABASE_PATH ?? join(projectRoot, 'var', 'db', 'knowledge_base.db');

export default defineConfig({
  schema: join(projectRoot, 'src', 'schemas', 'fileKnowledge.ts'),
  out: join(projectRoot, 'drizzle'),
  dialect: 'sqlite',
  dbCredentials: {
    url: dbPath,
  },
  verbose: true,
  strict: true,
});
