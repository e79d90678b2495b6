/**
 * NASA GIBS Imagery Products
 * Supported satellite layers and their acquisition characteristics
 * Location: src/services/datasets/gibsLayers.ts
 */

import type { ImageFormat, LayerKey } from '../../types/satellite';

export interface LayerInfo {
  key: LayerKey;
  layerId: string;
  name: string;
  resolutionMeters: number;
  revisitDays: number;
  format: ImageFormat;
  // Days either side of the requested date to search
  defaultFallbackDays: number;
}

export const LAYER_CATALOG: Record<LayerKey, LayerInfo> = {
  landsat: {
    key: 'landsat',
    layerId: 'HLS_L30_Nadir_BRDF_Adjusted_Reflectance',
    name: 'Harmonized Landsat 8/9 (HLS L30)',
    resolutionMeters: 30,
    revisitDays: 16,
    format: 'image/png',
    defaultFallbackDays: 8,
  },
  sentinel: {
    key: 'sentinel',
    layerId: 'HLS_S30_Nadir_BRDF_Adjusted_Reflectance',
    name: 'Harmonized Sentinel-2 (HLS S30)',
    resolutionMeters: 30,
    revisitDays: 5,
    format: 'image/png',
    defaultFallbackDays: 5,
  },
  viirs_day: {
    key: 'viirs_day',
    layerId: 'VIIRS_SNPP_CorrectedReflectance_TrueColor',
    name: 'VIIRS SNPP Corrected Reflectance',
    resolutionMeters: 250,
    revisitDays: 1,
    format: 'image/jpeg',
    defaultFallbackDays: 3,
  },
  modis_terra: {
    key: 'modis_terra',
    layerId: 'MODIS_Terra_CorrectedReflectance_TrueColor',
    name: 'MODIS Terra Corrected Reflectance',
    resolutionMeters: 250,
    revisitDays: 1,
    format: 'image/jpeg',
    defaultFallbackDays: 3,
  },
  modis_aqua: {
    key: 'modis_aqua',
    layerId: 'MODIS_Aqua_CorrectedReflectance_TrueColor',
    name: 'MODIS Aqua Corrected Reflectance',
    resolutionMeters: 250,
    revisitDays: 1,
    format: 'image/jpeg',
    defaultFallbackDays: 3,
  },
};

export const LAYER_KEYS: readonly LayerKey[] = ['landsat', 'sentinel', 'viirs_day', 'modis_terra', 'modis_aqua'];

// Daily coverage makes VIIRS the most reliable default
export const DEFAULT_LAYER: LayerKey = 'viirs_day';

export function isLayerKey(value: string): value is LayerKey {
  return LAYER_KEYS.some((key) => key === value);
}

/**
 * Get layer info by key
 */
export function getLayerInfo(layer: LayerKey): LayerInfo {
  return LAYER_CATALOG[layer];
}
