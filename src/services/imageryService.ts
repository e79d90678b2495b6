/**
 * Imagery Service
 * Fetches rasters from the NASA GIBS WMS endpoint with date fallback,
 * retry/backoff and content validation. Results are stored in ImageryCache.
 * Location: src/services/imageryService.ts
 */

import axios, { AxiosAdapter, AxiosError, AxiosInstance } from 'axios';
import { GIBS_WMS_BASE } from '../config';
import type { CalendarDate, ImageryArtifact, ImageryPair, ImageryRequest } from '../types/satellite';
import { daysBetween, fallbackDates } from '../utils/dates';
import { getLayerInfo } from './datasets/gibsLayers';
import { AnalysisCancelledError, ImageryUnavailableError, TransientFetchError } from './errors';
import type { ImageryCache } from './imageryCache';

const DEFAULT_MIN_RASTER_BYTES = 512;

const SIGNATURES: Array<{ contentType: string; bytes: number[] }> = [
  { contentType: 'image/png', bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  { contentType: 'image/jpeg', bytes: [0xff, 0xd8, 0xff] },
  { contentType: 'image/tiff', bytes: [0x49, 0x49, 0x2a, 0x00] },
  { contentType: 'image/tiff', bytes: [0x4d, 0x4d, 0x00, 0x2a] },
];

export type ResponseClassification =
  | { kind: 'raster'; contentType: string }
  | { kind: 'no_data'; reason: string }
  | { kind: 'transient'; reason: string };

/**
 * Identify a raster by its leading bytes
 */
export function detectRasterType(payload: Buffer): string | undefined {
  const match = SIGNATURES.find(({ bytes }) =>
    payload.length >= bytes.length && bytes.every((byte, index) => payload[index] === byte)
  );
  return match?.contentType;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    return undefined;
  }
}

function describeErrorPayload(payload: Buffer): string {
  const text = payload.subarray(0, 4096).toString('utf8').trim();

  if (text.startsWith('<')) {
    const exception = /<ServiceException(?:\s[^>]*)?>([\s\S]*?)<\/ServiceException>/i.exec(text);
    if (exception) return `service exception: ${exception[1].trim()}`;
    return 'XML/HTML error payload';
  }

  const body = text.startsWith('{') ? parseJson(text) : undefined;
  if (body && typeof body === 'object') {
    const message = 'message' in body ? body.message : 'error' in body ? body.error : undefined;
    if (typeof message === 'string') return `error payload: ${message}`;
  }

  return `non-image payload: ${text.slice(0, 120)}`;
}

/**
 * Decide what an upstream response means from its bytes.
 * Only 429/5xx are judged by status; everything else by content.
 */
export function classifyResponse(
  status: number,
  payload: Buffer,
  minRasterBytes = DEFAULT_MIN_RASTER_BYTES
): ResponseClassification {
  if (status === 429 || status >= 500) {
    return { kind: 'transient', reason: `HTTP ${status}` };
  }
  if (payload.length === 0) {
    return { kind: 'no_data', reason: `HTTP ${status}: empty response` };
  }
  const contentType = detectRasterType(payload);
  if (contentType && payload.length >= minRasterBytes) {
    return { kind: 'raster', contentType };
  }
  if (contentType) {
    return { kind: 'no_data', reason: `HTTP ${status}: raster too small (${payload.length} bytes)` };
  }
  return { kind: 'no_data', reason: `HTTP ${status}: ${describeErrorPayload(payload)}` };
}

/**
 * WMS 1.3.0 GetMap parameters (EPSG:4326 axis order is lat,lon)
 */
export function buildGetMapParams(request: ImageryRequest, date: CalendarDate): Record<string, string | number> {
  const info = getLayerInfo(request.layer);
  const { minLat, minLon, maxLat, maxLon } = request.boundingBox;
  return {
    SERVICE: 'WMS',
    REQUEST: 'GetMap',
    VERSION: '1.3.0',
    LAYERS: info.layerId,
    STYLES: '',
    CRS: 'EPSG:4326',
    BBOX: `${minLat},${minLon},${maxLat},${maxLon}`,
    WIDTH: request.width,
    HEIGHT: request.height,
    FORMAT: info.format,
    TIME: date,
  };
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new AnalysisCancelledError();
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AnalysisCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AnalysisCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function describeRequestError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return `${error.code ?? 'ERR_NETWORK'}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

type AttemptOutcome =
  | { kind: 'raster'; payload: Buffer; contentType: string }
  | { kind: 'failed'; error: Error };

export interface ImageryFetcherOptions {
  cache: ImageryCache;
  baseURL?: string;
  timeoutMs?: number;
  maxRetries?: number;
  backoffMs?: number;
  minRasterBytes?: number;
  adapter?: AxiosAdapter;
  now?: () => Date;
}

export interface FetchOptions {
  signal?: AbortSignal;
}

export class ImageryFetcher {
  private readonly client: AxiosInstance;
  private readonly cache: ImageryCache;
  private readonly baseURL: string;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly minRasterBytes: number;
  private readonly now: () => Date;

  constructor(options: ImageryFetcherOptions) {
    this.cache = options.cache;
    this.baseURL = options.baseURL ?? GIBS_WMS_BASE;
    this.maxRetries = options.maxRetries ?? 3;
    this.backoffMs = options.backoffMs ?? 500;
    this.minRasterBytes = options.minRasterBytes ?? DEFAULT_MIN_RASTER_BYTES;
    this.now = options.now ?? (() => new Date());

    this.client = axios.create({
      timeout: options.timeoutMs ?? 30000,
      responseType: 'arraybuffer',
      // Status codes are interpreted together with the body in classifyResponse
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });

    this.client.interceptors.request.use(
      (config) => {
        console.log(`[Imagery] ${config.method?.toUpperCase()} ${config.params?.LAYERS} @ ${config.params?.TIME}`);
        return config;
      },
      (error) => Promise.reject(error)
    );

    this.client.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => {
        if (!axios.isCancel(error)) {
          console.error('[Imagery Error]', error.code ?? '', error.message);
        }
        return Promise.reject(error);
      }
    );
  }

  /**
   * Fetch imagery for a request: cache first, then the requested date and
   * its neighbours (closest first, earlier on ties) until a raster is found.
   */
  async fetch(request: ImageryRequest, options: FetchOptions = {}): Promise<ImageryArtifact> {
    const { signal } = options;
    throwIfAborted(signal);

    return this.cache.withKeyLock(request, async () => {
      throwIfAborted(signal);

      const cached = await this.cache.lookup(request);
      // Entries found under a wider fallback window may lie outside this one
      if (cached && Math.abs(daysBetween(request.date, cached.provenance.servedDate)) <= request.fallbackWindowDays) {
        console.log(`[Imagery] ✅ Cache hit: ${request.layer} ${request.date} (served ${cached.provenance.servedDate})`);
        return cached;
      }
      if (cached) {
        console.warn(
          `[Imagery] ⚠️ Cached ${cached.provenance.servedDate} is outside ±${request.fallbackWindowDays} days of ${request.date}; refetching`
        );
      }

      const datesTried: CalendarDate[] = [];
      let lastError: Error | undefined;

      for (const date of fallbackDates(request.date, request.fallbackWindowDays)) {
        datesTried.push(date);
        const outcome = await this.attemptDate(request, date, signal);

        if (outcome.kind === 'failed') {
          lastError = outcome.error;
          continue;
        }

        // A cancelled run must not leave an entry behind
        throwIfAborted(signal);

        if (date !== request.date) {
          console.warn(`[Imagery] ⚠️ No data for ${request.date}, using ${date} instead`);
        }

        const info = getLayerInfo(request.layer);
        return this.cache.store(request, {
          payload: outcome.payload,
          provenance: {
            layer: request.layer,
            layerId: info.layerId,
            requestedDate: request.date,
            servedDate: date,
            boundingBox: request.boundingBox,
            byteSize: outcome.payload.length,
            contentType: outcome.contentType,
            fetchedAt: this.now().toISOString(),
            fromCache: false,
          },
        });
      }

      console.error(`[Imagery] ❌ No usable imagery after ${datesTried.length} dates`);
      throw new ImageryUnavailableError(request, datesTried, { cause: lastError });
    });
  }

  /**
   * Fetch before and after imagery concurrently. When one leg fails the
   * other is aborted.
   */
  async fetchPair(before: ImageryRequest, after: ImageryRequest, options: FetchOptions = {}): Promise<ImageryPair> {
    const { signal } = options;
    throwIfAborted(signal);

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const leg = (request: ImageryRequest) =>
      this.fetch(request, { signal: controller.signal }).catch((error: unknown) => {
        controller.abort();
        throw error;
      });

    try {
      const [beforeArtifact, afterArtifact] = await Promise.all([leg(before), leg(after)]);
      return { before: beforeArtifact, after: afterArtifact };
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * One date, retried on transient failures with exponential backoff
   */
  private async attemptDate(
    request: ImageryRequest,
    date: CalendarDate,
    signal?: AbortSignal
  ): Promise<AttemptOutcome> {
    let lastError: Error = new TransientFetchError(`No attempt made for ${date}`);

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      throwIfAborted(signal);

      try {
        const response = await this.client.get<ArrayBuffer>(this.baseURL, {
          params: buildGetMapParams(request, date),
          signal,
        });
        const payload = response.data ? Buffer.from(response.data) : Buffer.alloc(0);
        const classification = classifyResponse(response.status, payload, this.minRasterBytes);

        if (classification.kind === 'raster') {
          return { kind: 'raster', payload, contentType: classification.contentType };
        }
        if (classification.kind === 'no_data') {
          console.log(`[Imagery] No data for ${date}: ${classification.reason}`);
          return { kind: 'failed', error: new Error(classification.reason) };
        }
        lastError = new TransientFetchError(`${date}: ${classification.reason}`);
      } catch (error) {
        if (signal?.aborted || axios.isCancel(error)) {
          throw new AnalysisCancelledError();
        }
        lastError = new TransientFetchError(`${date}: ${describeRequestError(error)}`, { cause: error });
      }

      if (attempt < this.maxRetries) {
        const delay = this.backoffMs * 2 ** attempt;
        console.warn(`[Imagery] ⚠️ ${lastError.message}; retrying in ${delay}ms`);
        await sleep(delay, signal);
      }
    }

    return { kind: 'failed', error: lastError };
  }
}
