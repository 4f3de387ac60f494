/**
 * api/services/catalog.ts
 *
 * Test catalog stores. The matcher only reads a snapshot through
 * `listTestsWithEmbeddings`; nothing here writes back except the
 * embedding generator's `saveCatalog`.
 *
 * Stored shape (JSON array):
 *   { id?, name, category?, synonyms?: string[], embeddings?: number[][] }
 */
import fs from 'fs/promises';
import { z } from 'zod';
import type { TestRecord } from '../types/matching';
import { ConfigurationError, errorMessage } from './errors';
import { getJson, uploadJson } from './gcloud';

export interface CatalogStore {
  /** Empty array, not an error, when no catalog has been loaded yet. */
  listTestsWithEmbeddings(): Promise<TestRecord[]>;
}

const storedTestSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().trim().min(1),
  category: z.string().optional(),
  synonyms: z.array(z.string()).default([]),
  embeddings: z.array(z.array(z.number()).min(1)).default([]),
});

const storedCatalogSchema = z.array(storedTestSchema);

/** "Lipid Profile (Fasting)" -> "lipid-profile-fasting" */
export function createTestId(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^\w\s-]/g, '')
    .replace(/[-\s]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Validate raw catalog JSON into TestRecords. Throws ConfigurationError when
 * the shape is wrong, a record's embedding count breaks the
 * 1 + synonyms invariant, or vector dimensions disagree across the catalog.
 */
export function parseCatalog(raw: unknown): TestRecord[] {
  const result = storedCatalogSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(`Invalid test catalog: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape'}`);
  }

  let dimension: number | null = null;

  return result.data.map(stored => {
    const { embeddings, synonyms } = stored;

    if (embeddings.length > 0 && embeddings.length !== synonyms.length + 1) {
      throw new ConfigurationError(
        `Test "${stored.name}" has ${embeddings.length} embeddings for ${synonyms.length} synonyms (expected ${synonyms.length + 1})`,
        { test: stored.name }
      );
    }

    for (const vector of embeddings) {
      dimension ??= vector.length;
      if (vector.length !== dimension) {
        throw new ConfigurationError(
          `Test "${stored.name}" has a ${vector.length}-dimension embedding; catalog uses ${dimension}`,
          { test: stored.name }
        );
      }
    }

    return {
      id: stored.id ?? createTestId(stored.name),
      name: stored.name,
      category: stored.category ?? 'lab',
      synonyms,
      embeddings,
    };
  });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function createFileCatalogStore(filePath: string): CatalogStore {
  return {
    async listTestsWithEmbeddings() {
      let contents: string;
      try {
        contents = await fs.readFile(filePath, 'utf-8');
      } catch (err) {
        if (isMissingFile(err)) return [];
        throw err;
      }
      let raw: unknown;
      try {
        raw = JSON.parse(contents);
      } catch (err) {
        throw new ConfigurationError(`Catalog ${filePath} is not valid JSON: ${errorMessage(err)}`, { path: filePath });
      }
      return parseCatalog(raw);
    },
  };
}

export function createGcsCatalogStore(bucketName: string, objectPath: string): CatalogStore {
  if (!bucketName) throw new ConfigurationError('GCS_BUCKET_NAME is required for the gcs catalog source');
  return {
    async listTestsWithEmbeddings() {
      const data = await getJson(bucketName, objectPath);
      return data === null ? [] : parseCatalog(data);
    },
  };
}

/** Snapshot of an in-memory catalog; the array is copied so later edits are not seen. */
export function createStaticCatalogStore(tests: readonly TestRecord[]): CatalogStore {
  const snapshot = [...tests];
  return { listTestsWithEmbeddings: async () => snapshot };
}

export type CatalogTarget =
  | { kind: 'file'; path: string }
  | { kind: 'gcs'; bucketName: string; objectPath: string };

export async function saveCatalog(target: CatalogTarget, tests: readonly TestRecord[]): Promise<string> {
  if (target.kind === 'gcs') {
    return uploadJson(target.bucketName, target.objectPath, tests);
  }
  await fs.writeFile(target.path, JSON.stringify(tests, null, 2), 'utf-8');
  return target.path;
}

export default { parseCatalog, createFileCatalogStore, createGcsCatalogStore, createStaticCatalogStore, saveCatalog };
