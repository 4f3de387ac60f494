/**
 * Usage: npm run generate-embeddings -- [tests.json]
 *
 * Reads a plain catalog (no embeddings needed), encodes every test name and
 * synonym with the configured encoder, and writes the result to the catalog
 * location the matcher reads from (CATALOG_SOURCE).
 */
import fs from 'fs/promises';
import { loadConfig } from './config';
import { loadEnv } from './env';
import { parseCatalog, saveCatalog } from './services/catalog';
import { embedCatalog } from './services/catalogEmbeddings';
import { errorMessage, isPipelineStageError } from './services/errors';
import { catalogTarget, createEncoder } from './services/runtime';

async function main(argv: string[]): Promise<void> {
  loadEnv();
  const config = loadConfig();
  const sourcePath = argv[0] ?? 'tests.json';

  const tests = parseCatalog(JSON.parse(await fs.readFile(sourcePath, 'utf-8')));
  console.log(`\nEmbedding ${tests.length} tests from ${sourcePath}...`);

  const embedded = await embedCatalog(tests, createEncoder(config));
  const location = await saveCatalog(catalogTarget(config), embedded);
  console.log(`   Saved catalog to ${location}`);

  console.log(JSON.stringify({ status: 'ok', tests_count: embedded.length }));
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(`generate-embeddings failed: ${isPipelineStageError(err) ? `[${err.code}] ` : ''}${errorMessage(err)}`);
  process.exit(1);
});
