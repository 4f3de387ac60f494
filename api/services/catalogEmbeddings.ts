import type { Logger, TestRecord } from '../types/matching';
import type { EmbeddingEncoder } from './encoder';

/**
 * Attach embeddings to every record: the name first, then one per synonym in
 * synonym order. Existing embeddings are replaced.
 */
export async function embedCatalog(
  tests: readonly TestRecord[],
  encoder: EmbeddingEncoder,
  logger: Logger = console
): Promise<TestRecord[]> {
  const t0 = Date.now();
  const embedded: TestRecord[] = [];

  for (const test of tests) {
    const embeddings: number[][] = [];
    for (const phrase of [test.name, ...test.synonyms]) {
      embeddings.push(await encoder.encode(phrase));
    }
    embedded.push({ ...test, embeddings });
  }

  logger.log(`   Embedded ${embedded.length} tests with ${encoder.model} (${Date.now() - t0}ms)`);
  return embedded;
}

export default { embedCatalog };
