// storage_backend.ts - Object storage for uploaded media and usage logs (Supabase Storage)

import { createClient } from '@supabase/supabase-js';

export type BlobBody = Uint8Array | string;

export interface PutOptions {
  contentType?: string;
}

export interface BlobStore {
  readonly scheme: string;
  put(bucket: string, key: string, body: BlobBody, options?: PutOptions): Promise<void>;
  get(bucket: string, key: string): Promise<Uint8Array>;
}

interface StorageErrorLike {
  message: string;
}

// The subset of the Supabase Storage bucket API this server calls.
export interface StorageBucketApi {
  upload(
    path: string,
    body: BlobBody,
    options?: { contentType?: string; upsert?: boolean },
  ): PromiseLike<{ error: StorageErrorLike | null }>;
  download(path: string): PromiseLike<{ data: Blob | null; error: StorageErrorLike | null }>;
}

export interface StorageApi {
  from(bucket: string): StorageBucketApi;
}

export class SupabaseBlobStore implements BlobStore {
  readonly scheme = 'supabase';

  constructor(private readonly storage: StorageApi) {}

  async put(bucket: string, key: string, body: BlobBody, options: PutOptions = {}): Promise<void> {
    const { error } = await this.storage.from(bucket).upload(key, body, {
      contentType: options.contentType ?? 'application/octet-stream',
      upsert: true,
    });
    if (error) {
      throw new Error(`Upload to ${bucket}/${key} failed: ${error.message}`);
    }
  }

  async get(bucket: string, key: string): Promise<Uint8Array> {
    const { data, error } = await this.storage.from(bucket).download(key);
    if (error || !data) {
      throw new Error(`Download of ${bucket}/${key} failed: ${error?.message ?? 'empty body'}`);
    }
    return new Uint8Array(await data.arrayBuffer());
  }
}

export function createServiceClient(supabaseUrl: string, serviceRoleKey: string) {
  return createClient(supabaseUrl, serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
      detectSessionInUrl: false,
    },
  });
}
