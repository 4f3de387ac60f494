/**
 * api/services/gcloud.ts
 *
 * Small helper for reading and writing JSON objects to Google Cloud Storage.
 * - uploadJson(bucketName, path, payload): saves JSON to bucket under `path`
 * - getJson(bucketName, path): returns parsed JSON or null if not found
 */
import { Storage } from '@google-cloud/storage';

let storage: Storage | null = null;

function getStorage(): Storage {
  if (!storage) storage = new Storage();
  return storage;
}

export async function uploadJson(bucketName: string, path: string, payload: unknown): Promise<string> {
  const file = getStorage().bucket(bucketName).file(path);
  await file.save(JSON.stringify(payload, null, 2), { contentType: 'application/json' });
  return `gs://${bucketName}/${path}`;
}

export async function getJson(bucketName: string, path: string): Promise<unknown> {
  const file = getStorage().bucket(bucketName).file(path);
  const [exists] = await file.exists();
  if (!exists) return null;
  const [contents] = await file.download();
  return JSON.parse(contents.toString('utf-8'));
}

export default { uploadJson, getJson };
