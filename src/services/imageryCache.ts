/**
 * Imagery Cache
 * Content-addressed on-disk store for fetched rasters, keyed by
 * (layer, bounding box rounded to 4 decimals, requested date).
 * Location: src/services/imageryCache.ts
 */

import { createHash, randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { ImageryArtifact, ImageryProvenance, ImageryRequest } from '../types/satellite';
import { LAYER_KEYS } from './datasets/gibsLayers';
import { isErrnoException } from './errors';

const KEY_PRECISION = 4;

const BoundingBoxSchema = z.object({
  minLat: z.number(),
  minLon: z.number(),
  maxLat: z.number(),
  maxLon: z.number(),
});

const CacheMetadataSchema = z.object({
  version: z.literal(1),
  key: z.string(),
  provenance: z.object({
    layer: z.enum(['landsat', 'sentinel', 'viirs_day', 'modis_terra', 'modis_aqua']),
    layerId: z.string(),
    requestedDate: z.string(),
    servedDate: z.string(),
    boundingBox: BoundingBoxSchema,
    byteSize: z.number().int().nonnegative(),
    contentType: z.string(),
    fetchedAt: z.string().datetime(),
    fromCache: z.boolean(),
  }),
});

type CacheMetadata = z.infer<typeof CacheMetadataSchema>;

export interface ImageryCacheOptions {
  cacheDir: string;
  // Entries older than this are treated as a miss and removed
  maxAgeMs?: number;
  now?: () => number;
}

/**
 * Deterministic cache key for a request
 */
export function cacheKey(request: ImageryRequest): string {
  const { minLat, minLon, maxLat, maxLon } = request.boundingBox;
  const bbox = [minLat, minLon, maxLat, maxLon].map((value) => value.toFixed(KEY_PRECISION));
  return createHash('sha256')
    .update(JSON.stringify([request.layer, ...bbox, request.date]))
    .digest('hex');
}

async function removeIfPresent(file: string): Promise<void> {
  try {
    await fs.unlink(file);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') throw error;
  }
}

async function writeAtomically(file: string, data: Buffer | string): Promise<void> {
  const temp = `${file}.${process.pid}.${randomUUID()}.tmp`;
  try {
    await fs.writeFile(temp, data);
    await fs.rename(temp, file);
  } catch (error) {
    await removeIfPresent(temp);
    throw error;
  }
}

// Handle to the cache-owned payload; the Buffer itself is never copied
function asCachedHandle(owned: ImageryArtifact): ImageryArtifact {
  return {
    payload: owned.payload,
    provenance: Object.freeze({ ...owned.provenance, fromCache: true }),
  };
}

export class ImageryCache {
  private readonly cacheDir: string;
  private readonly maxAgeMs?: number;
  private readonly now: () => number;
  private readonly entries = new Map<string, ImageryArtifact>();
  private readonly locks = new Map<string, Promise<void>>();

  constructor(options: ImageryCacheOptions) {
    this.cacheDir = options.cacheDir;
    this.maxAgeMs = options.maxAgeMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Pure storage query; never touches the network.
   */
  async lookup(request: ImageryRequest): Promise<ImageryArtifact | undefined> {
    const key = cacheKey(request);

    const inMemory = this.entries.get(key);
    if (inMemory) {
      if (!this.isExpired(inMemory.provenance)) return asCachedHandle(inMemory);
      await this.evict(request, key);
      return undefined;
    }

    const metadata = await this.readMetadata(request, key);
    if (!metadata) return undefined;

    if (this.isExpired(metadata.provenance)) {
      console.log(`[Cache] Entry for ${request.layer} ${request.date} expired, removing`);
      await this.evict(request, key);
      return undefined;
    }

    let payload: Buffer;
    try {
      payload = await fs.readFile(this.payloadPath(request, key));
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        await this.evict(request, key);
        return undefined;
      }
      throw error;
    }

    if (payload.length !== metadata.provenance.byteSize) {
      console.warn(`[Cache] ⚠️ Size mismatch for ${key}, discarding entry`);
      await this.evict(request, key);
      return undefined;
    }

    const owned: ImageryArtifact = Object.freeze({
      payload,
      provenance: Object.freeze({ ...metadata.provenance, fromCache: false }),
    });
    this.entries.set(key, owned);
    return asCachedHandle(owned);
  }

  /**
   * Take ownership of an artifact. Payload and metadata are written to
   * temporary files and renamed into place, metadata last, so readers never
   * observe a partial entry.
   */
  async store(request: ImageryRequest, artifact: ImageryArtifact): Promise<ImageryArtifact> {
    const key = cacheKey(request);
    const provenance: ImageryProvenance = {
      ...artifact.provenance,
      byteSize: artifact.payload.length,
      fromCache: false,
    };
    const metadata: CacheMetadata = { version: 1, key, provenance };

    await fs.mkdir(this.layerDir(request), { recursive: true });
    await writeAtomically(this.payloadPath(request, key), artifact.payload);
    await writeAtomically(this.metadataPath(request, key), JSON.stringify(metadata, null, 2));

    const owned: ImageryArtifact = Object.freeze({
      payload: artifact.payload,
      provenance: Object.freeze(provenance),
    });
    this.entries.set(key, owned);
    return owned;
  }

  /**
   * Run `task` while holding the lock for this request's key.
   * Tasks for the same key run one after another; other keys are unaffected.
   */
  async withKeyLock<T>(request: ImageryRequest, task: () => Promise<T>): Promise<T> {
    const key = cacheKey(request);
    const previous = this.locks.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    }
  }

  /**
   * Remove every cached entry; returns the number of entries removed
   */
  async clear(): Promise<number> {
    let removed = 0;
    for (const layer of LAYER_KEYS) {
      const dir = path.join(this.cacheDir, layer);
      let files: string[];
      try {
        files = await fs.readdir(dir);
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') continue;
        throw error;
      }
      removed += files.filter((file) => file.endsWith('.json')).length;
      await fs.rm(dir, { recursive: true, force: true });
    }
    this.entries.clear();
    console.log(`[Cache] 🗑️ Cleared ${removed} cached images`);
    return removed;
  }

  private isExpired(provenance: Readonly<ImageryProvenance>): boolean {
    if (this.maxAgeMs === undefined) return false;
    return this.now() - Date.parse(provenance.fetchedAt) > this.maxAgeMs;
  }

  private async readMetadata(request: ImageryRequest, key: string): Promise<CacheMetadata | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.metadataPath(request, key), 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return undefined;
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      console.warn(`[Cache] ⚠️ Unreadable metadata for ${key}:`, error instanceof Error ? error.message : error);
      await this.evict(request, key);
      return undefined;
    }

    const parsed = CacheMetadataSchema.safeParse(json);
    if (!parsed.success || parsed.data.key !== key) {
      console.warn(`[Cache] ⚠️ Invalid metadata for ${key}, discarding entry`);
      await this.evict(request, key);
      return undefined;
    }
    return parsed.data;
  }

  private async evict(request: ImageryRequest, key: string): Promise<void> {
    this.entries.delete(key);
    await removeIfPresent(this.metadataPath(request, key));
    await removeIfPresent(this.payloadPath(request, key));
  }

  private layerDir(request: ImageryRequest): string {
    return path.join(this.cacheDir, request.layer);
  }

  private payloadPath(request: ImageryRequest, key: string): string {
    return path.join(this.layerDir(request), `${key}.bin`);
  }

  private metadataPath(request: ImageryRequest, key: string): string {
    return path.join(this.layerDir(request), `${key}.json`);
  }
}
