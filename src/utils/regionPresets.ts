/**
 * Region presets
 * Named monitoring hotspots with recommended before/after dates
 * Location: src/utils/regionPresets.ts
 */

import { UnknownRegionError } from '../services/errors';
import type { CalendarDate, ChangeType, LayerKey } from '../types/satellite';

export interface RegionPreset {
  name: string;
  lat: number;
  lon: number;
  type: ChangeType;
  description: string;
  dates: { before: CalendarDate; after: CalendarDate };
  layer?: LayerKey;
}

export const REGION_PRESETS: Record<string, RegionPreset> = {
  amazon_basin: {
    name: 'Amazon Rainforest, Brazil',
    lat: -3.4653,
    lon: -62.2159,
    type: 'deforestation',
    description: 'High deforestation area in Brazilian Amazon',
    dates: { before: '2023-06-15', after: '2024-06-15' }, // mid-year, fewer clouds
    layer: 'viirs_day',
  },
  amazon_rondonia: {
    name: 'Rondônia, Brazil',
    lat: -9.4281,
    lon: -63.0648,
    type: 'deforestation',
    description: 'One of the most deforested regions in the Amazon',
    dates: { before: '2022-01-01', after: '2024-01-01' },
  },
  arctic_greenland: {
    name: 'Greenland Ice Sheet',
    lat: 72.0,
    lon: -40.0,
    type: 'ice_melt',
    description: 'Arctic ice monitoring',
    dates: { before: '2023-07-01', after: '2024-07-01' }, // summer
  },
  las_vegas: {
    name: 'Las Vegas, Nevada, USA',
    lat: 36.1699,
    lon: -115.1398,
    type: 'urban_sprawl',
    description: 'Rapid urban expansion in desert',
    dates: { before: '2020-01-01', after: '2024-01-01' },
  },
  dubai: {
    name: 'Dubai, UAE',
    lat: 25.2048,
    lon: 55.2708,
    type: 'urban_sprawl',
    description: 'Rapid coastal development',
    dates: { before: '2018-01-01', after: '2024-01-01' },
  },
  california_forests: {
    name: 'Northern California Forests',
    lat: 40.0,
    lon: -121.0,
    type: 'general',
    description: 'Wildfire impact monitoring',
    dates: { before: '2023-06-01', after: '2023-09-01' }, // either side of fire season
  },
  congo_basin: {
    name: 'Congo Rainforest, DRC',
    lat: -0.5,
    lon: 25.0,
    type: 'deforestation',
    description: 'Second largest rainforest',
    dates: { before: '2022-01-01', after: '2024-01-01' },
  },
  test_location: {
    name: 'Test Location (Amazon)',
    lat: -3.0,
    lon: -60.0,
    type: 'general',
    description: 'Quick test location',
    dates: { before: '2024-01-01', after: '2024-06-01' },
  },
};

export function isRegionKey(key: string): boolean {
  return Object.prototype.hasOwnProperty.call(REGION_PRESETS, key);
}

export function getRegionPreset(key: string): RegionPreset {
  const preset = isRegionKey(key) ? REGION_PRESETS[key] : undefined;
  if (!preset) {
    throw new UnknownRegionError(key, Object.keys(REGION_PRESETS));
  }
  return preset;
}

/**
 * Find the preset whose centre is within `thresholdDeg` of a point
 */
export function findNearestPreset(
  lat: number,
  lon: number,
  thresholdDeg = 1.0
): { key: string; preset: RegionPreset } | undefined {
  let best: { key: string; preset: RegionPreset; distance: number } | undefined;
  for (const [key, preset] of Object.entries(REGION_PRESETS)) {
    const distance = Math.hypot(lat - preset.lat, lon - preset.lon);
    if (distance < thresholdDeg && (!best || distance < best.distance)) {
      best = { key, preset, distance };
    }
  }
  return best && { key: best.key, preset: best.preset };
}
