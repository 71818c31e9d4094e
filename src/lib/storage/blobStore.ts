// src/lib/storage/blobStore.ts
import crypto from "node:crypto";

import type { SupabaseClient } from "@supabase/supabase-js";

import { StoreError } from "@/lib/fill/errors";

export function sha256(bytes: Uint8Array | string): string {
  return crypto.createHash("sha256").update(bytes).digest("hex");
}

/** Opaque byte storage for template files and cached renders. */
export interface BlobStore {
  put(key: string, bytes: Buffer, contentType: string): Promise<void>;
  get(key: string): Promise<Buffer | null>;
}

export function createMemoryBlobStore(): BlobStore {
  const objects = new Map<string, Buffer>();
  return {
    async put(key, bytes) {
      objects.set(key, Buffer.from(bytes));
    },
    async get(key) {
      const hit = objects.get(key);
      return hit ? Buffer.from(hit) : null;
    },
  };
}

function isNotFound(error: { message: string }): boolean {
  return /not\s*found|does not exist|404/i.test(error.message);
}

export function createSupabaseBlobStore(sb: SupabaseClient, bucket: string): BlobStore {
  return {
    async put(key, bytes, contentType) {
      const { error } = await sb.storage.from(bucket).upload(key, bytes, {
        contentType,
        upsert: true,
      });
      if (error) {
        console.error("[BlobStore] upload failed", { bucket, key, message: error.message });
        throw new StoreError(`upload ${key} failed: ${error.message}`, error);
      }
    },

    async get(key) {
      const { data, error } = await sb.storage.from(bucket).download(key);
      if (error) {
        if (isNotFound(error)) return null;
        console.error("[BlobStore] download failed", { bucket, key, message: error.message });
        throw new StoreError(`download ${key} failed: ${error.message}`, error);
      }
      return Buffer.from(await data.arrayBuffer());
    },
  };
}
