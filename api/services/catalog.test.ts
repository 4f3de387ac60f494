import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import {
  createFileCatalogStore,
  createGcsCatalogStore,
  createTestId,
  parseCatalog,
  saveCatalog,
} from './catalog';
import { ConfigurationError } from './errors';

const { exists, download, save } = vi.hoisted(() => ({
  exists: vi.fn(),
  download: vi.fn(),
  save: vi.fn(),
}));

vi.mock('@google-cloud/storage', () => ({
  Storage: class {
    bucket() {
      return { file: () => ({ exists, download, save }) };
    }
  },
}));

describe('createTestId', () => {
  it('slugifies the test name', () => {
    expect(createTestId('Chest X-Ray PA')).toBe('chest-x-ray-pa');
    expect(createTestId('Lipid Profile (Fasting)')).toBe('lipid-profile-fasting');
  });
});

describe('parseCatalog', () => {
  it('fills in id and category', () => {
    expect(parseCatalog([{ name: 'Serum Creatinine', synonyms: ['creatinine'] }])).toEqual([
      { id: 'serum-creatinine', name: 'Serum Creatinine', category: 'lab', synonyms: ['creatinine'], embeddings: [] },
    ]);
  });

  it('keeps stored embeddings that satisfy the name + synonyms invariant', () => {
    const [test] = parseCatalog([
      { id: 'cbc', name: 'CBC', category: 'Hematology', synonyms: ['blood count'], embeddings: [[1, 0], [0, 1]] },
    ]);
    expect(test?.embeddings).toEqual([[1, 0], [0, 1]]);
  });

  it('rejects an embedding count that does not match the synonyms', () => {
    expect(() => parseCatalog([{ name: 'CBC', synonyms: ['blood count'], embeddings: [[1, 0]] }]))
      .toThrow('Test "CBC" has 1 embeddings for 1 synonyms (expected 2)');
  });

  it('rejects mixed vector dimensions', () => {
    expect(() => parseCatalog([
      { name: 'CBC', synonyms: [], embeddings: [[1, 0]] },
      { name: 'RBS', synonyms: [], embeddings: [[1, 0, 0]] },
    ])).toThrow(ConfigurationError);
  });

  it('rejects records without a name', () => {
    expect(() => parseCatalog([{ name: '  ' }])).toThrow(ConfigurationError);
    expect(() => parseCatalog({ tests: [] })).toThrow(ConfigurationError);
  });
});

describe('file catalog store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'catalog-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns an empty catalog when the file does not exist', async () => {
    const store = createFileCatalogStore(path.join(dir, 'missing.json'));
    await expect(store.listTestsWithEmbeddings()).resolves.toEqual([]);
  });

  it('reports a file that is not JSON as a configuration error', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '[{"name": "CBC"', 'utf-8');
    await expect(createFileCatalogStore(file).listTestsWithEmbeddings()).rejects.toThrow(ConfigurationError);
  });

  it('round-trips a saved catalog', async () => {
    const file = path.join(dir, 'tests_with_embeddings.json');
    const tests = parseCatalog([{ id: 'rbs', name: 'RBS', category: 'Biochemistry', synonyms: ['sugar'], embeddings: [[1], [2]] }]);

    await expect(saveCatalog({ kind: 'file', path: file }, tests)).resolves.toBe(file);
    await expect(createFileCatalogStore(file).listTestsWithEmbeddings()).resolves.toEqual(tests);
  });
});

describe('gcs catalog store', () => {
  beforeEach(() => {
    exists.mockReset();
    download.mockReset();
    save.mockReset();
  });

  it('requires a bucket', () => {
    expect(() => createGcsCatalogStore('', 'catalog/tests.json')).toThrow(ConfigurationError);
  });

  it('returns an empty catalog when the object is missing', async () => {
    exists.mockResolvedValue([false]);
    await expect(createGcsCatalogStore('test-bucket', 'catalog/tests.json').listTestsWithEmbeddings()).resolves.toEqual([]);
    expect(download).not.toHaveBeenCalled();
  });

  it('parses the stored object', async () => {
    exists.mockResolvedValue([true]);
    download.mockResolvedValue([Buffer.from(JSON.stringify([{ name: 'TSH', category: 'Endocrinology' }]))]);

    await expect(createGcsCatalogStore('test-bucket', 'catalog/tests.json').listTestsWithEmbeddings()).resolves.toEqual([
      { id: 'tsh', name: 'TSH', category: 'Endocrinology', synonyms: [], embeddings: [] },
    ]);
  });

  it('uploads a catalog as JSON', async () => {
    save.mockResolvedValue(undefined);
    const location = await saveCatalog({ kind: 'gcs', bucketName: 'test-bucket', objectPath: 'catalog/tests.json' }, []);

    expect(location).toBe('gs://test-bucket/catalog/tests.json');
    expect(save).toHaveBeenCalledWith('[]', { contentType: 'application/json' });
  });
});
