/**
 * Geographic utilities
 * Coordinate validation, bounding boxes and area math for imagery requests
 * Location: src/utils/geo.ts
 */

import { getLayerInfo } from '../services/datasets/gibsLayers';
import { InvalidCoordinateError, InvalidInputError } from '../services/errors';
import type { BoundingBox, CalendarDate, ImageryRequest, LayerKey, Location } from '../types/satellite';
import { parseCalendarDate } from './dates';

// 1° of latitude is ~111 km everywhere; longitude shrinks with cos(lat)
export const KM_PER_DEGREE = 111.0;
const EARTH_RADIUS_KM = 6371.0;

const BBOX_PRECISION = 6;
const MIN_IMAGE_PX = 256;
const MAX_IMAGE_PX = 2048;

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function validateCoordinates(latitude: number, longitude: number): void {
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    throw new InvalidCoordinateError(latitude, longitude, 'coordinates must be finite numbers');
  }
  if (latitude < -90 || latitude > 90) {
    throw new InvalidCoordinateError(latitude, longitude, 'latitude must be between -90 and 90');
  }
  if (longitude < -180 || longitude > 180) {
    throw new InvalidCoordinateError(latitude, longitude, 'longitude must be between -180 and 180');
  }
}

/**
 * Format as degrees/minutes, e.g. "3°27'S, 62°12'W"
 */
export function formatCoordinates(latitude: number, longitude: number): string {
  const part = (value: number, positive: string, negative: string) => {
    const abs = Math.abs(value);
    const degrees = Math.floor(abs);
    const minutes = Math.floor((abs - degrees) * 60);
    return `${degrees}°${minutes}'${value >= 0 ? positive : negative}`;
  };
  return `${part(latitude, 'N', 'S')}, ${part(longitude, 'E', 'W')}`;
}

export function createLocation(name: string, latitude: number, longitude: number): Location {
  validateCoordinates(latitude, longitude);
  const trimmed = name.trim();
  return Object.freeze({
    name: trimmed || formatCoordinates(latitude, longitude),
    latitude,
    longitude,
  });
}

/**
 * Approximate ground area of a bounding box in km²
 */
export function boundingBoxAreaKm2(bbox: BoundingBox): number {
  const centerLat = (bbox.minLat + bbox.maxLat) / 2;
  const heightKm = (bbox.maxLat - bbox.minLat) * KM_PER_DEGREE;
  const widthKm = (bbox.maxLon - bbox.minLon) * KM_PER_DEGREE * Math.cos(toRadians(centerLat));
  return Math.max(0, heightKm * widthKm);
}

export function boundingBoxCenter(bbox: BoundingBox): { latitude: number; longitude: number } {
  return {
    latitude: (bbox.minLat + bbox.maxLat) / 2,
    longitude: (bbox.minLon + bbox.maxLon) / 2,
  };
}

export function sameBoundingBox(a: BoundingBox, b: BoundingBox): boolean {
  return a.minLat === b.minLat && a.minLon === b.minLon && a.maxLat === b.maxLat && a.maxLon === b.maxLon;
}

/**
 * Great-circle distance (Haversine)
 */
export function haversineKm(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(a));
}

export interface ResolveOptions {
  fallbackWindowDays?: number;
}

/**
 * Build the imagery request for a point: a square of `windowSizeKm` per side
 * centred on the location. Boxes that would cross the poles or the
 * antimeridian are clipped to the valid range and flagged.
 */
export function resolveRequest(
  location: Location,
  date: CalendarDate,
  layer: LayerKey,
  windowSizeKm: number,
  options: ResolveOptions = {}
): ImageryRequest {
  const { latitude, longitude } = location;
  validateCoordinates(latitude, longitude);
  parseCalendarDate(date);

  if (!Number.isFinite(windowSizeKm) || windowSizeKm <= 0) {
    throw new InvalidInputError(`Window size must be a positive number of km (got ${windowSizeKm})`);
  }

  const info = getLayerInfo(layer);
  const fallbackWindowDays = options.fallbackWindowDays ?? info.defaultFallbackDays;
  if (!Number.isInteger(fallbackWindowDays) || fallbackWindowDays < 0) {
    throw new InvalidInputError(`Fallback window must be a non-negative integer (got ${fallbackWindowDays})`);
  }

  const halfKm = windowSizeKm / 2;
  const halfLat = halfKm / KM_PER_DEGREE;
  const halfLon = halfKm / (KM_PER_DEGREE * Math.max(Math.cos(toRadians(latitude)), 1e-6));

  const raw = {
    minLat: latitude - halfLat,
    maxLat: latitude + halfLat,
    minLon: longitude - halfLon,
    maxLon: longitude + halfLon,
  };
  const boundingBox: BoundingBox = Object.freeze({
    minLat: round(Math.max(raw.minLat, -90), BBOX_PRECISION),
    maxLat: round(Math.min(raw.maxLat, 90), BBOX_PRECISION),
    minLon: round(Math.max(raw.minLon, -180), BBOX_PRECISION),
    maxLon: round(Math.min(raw.maxLon, 180), BBOX_PRECISION),
  });
  const clipped = raw.minLat < -90 || raw.maxLat > 90 || raw.minLon < -180 || raw.maxLon > 180;

  const pixels = Math.ceil((windowSizeKm * 1000) / info.resolutionMeters);
  const side = Math.min(MAX_IMAGE_PX, Math.max(MIN_IMAGE_PX, pixels));

  return Object.freeze({
    layer,
    boundingBox,
    date,
    fallbackWindowDays,
    width: side,
    height: side,
    clipped,
  });
}
