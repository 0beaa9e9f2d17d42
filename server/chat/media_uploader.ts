// media_uploader.ts - Push a local attachment into the media bucket

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { extensionOf, mimeTypeFor } from './file_classifier.ts';
import type { BlobStore } from './storage_backend.ts';
import { errorMessage, failure, type Outcome, success } from './types.ts';

export interface StorageLocator {
  scheme: string;
  bucket: string;
  key: string;
}

export function formatLocator(scheme: string, bucket: string, key: string): string {
  return `${scheme}://${bucket}/${key}`;
}

export function parseLocator(locator: string): StorageLocator | null {
  const match = /^([a-z][a-z0-9+.-]*):\/\/([^/]+)\/(.+)$/i.exec(locator);
  if (!match) return null;
  const [, scheme, bucket, key] = match;
  if (!scheme || !bucket || !key) return null;
  return { scheme, bucket, key };
}

/**
 * Uploads the file under its base filename, replacing any object with the
 * same name, and returns `scheme://bucket/key`.
 */
export async function uploadMedia(
  store: BlobStore,
  bucket: string,
  localPath: string,
): Promise<Outcome<string>> {
  const key = basename(localPath);
  try {
    const bytes = new Uint8Array(await readFile(localPath));
    const extension = extensionOf(localPath);
    const contentType = extension.ok ? mimeTypeFor(extension.value) : null;
    await store.put(bucket, key, bytes, contentType ? { contentType } : {});
    return success(formatLocator(store.scheme, bucket, key));
  } catch (err) {
    console.error('[Storage] Media upload failed:', { bucket, key, error: errorMessage(err) });
    return failure('upload_failed', `Upload of ${key} failed: ${errorMessage(err)}`);
  }
}
