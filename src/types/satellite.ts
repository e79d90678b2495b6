/**
 * TypeScript types for satellite imagery acquisition and change analysis
 * Location: src/types/satellite.ts
 */

// ============================================================================
// GEOGRAPHY
// ============================================================================

export interface Location {
  readonly name: string;
  readonly latitude: number;
  readonly longitude: number;
}

// Degrees, EPSG:4326
export interface BoundingBox {
  readonly minLat: number;
  readonly minLon: number;
  readonly maxLat: number;
  readonly maxLon: number;
}

/** Calendar date in `YYYY-MM-DD` form */
export type CalendarDate = string;

export interface TimeWindow {
  readonly before: CalendarDate;
  readonly after: CalendarDate;
  readonly elapsedDays: number;
}

// ============================================================================
// IMAGERY
// ============================================================================

export type LayerKey = 'landsat' | 'sentinel' | 'viirs_day' | 'modis_terra' | 'modis_aqua';

export type ImageFormat = 'image/png' | 'image/jpeg';

export interface ImageryRequest {
  readonly layer: LayerKey;
  readonly boundingBox: BoundingBox;
  readonly date: CalendarDate;
  readonly fallbackWindowDays: number;
  readonly width: number;
  readonly height: number;
  readonly clipped: boolean;
}

export interface ImageryProvenance {
  layer: LayerKey;
  layerId: string;
  requestedDate: CalendarDate;
  servedDate: CalendarDate;
  boundingBox: BoundingBox;
  byteSize: number;
  contentType: string;
  fetchedAt: string;
  fromCache: boolean;
}

export interface ImageryArtifact {
  readonly payload: Buffer;
  readonly provenance: Readonly<ImageryProvenance>;
}

export interface ImageryPair {
  before: ImageryArtifact;
  after: ImageryArtifact;
}

// ============================================================================
// ASSESSMENT
// ============================================================================

export const CHANGE_TYPES = ['deforestation', 'ice_melt', 'urban_sprawl', 'general', 'none'] as const;
export type ChangeType = (typeof CHANGE_TYPES)[number];

export const SEVERITY_LABELS = ['none', 'low', 'moderate', 'high', 'severe'] as const;
export type SeverityLabel = (typeof SEVERITY_LABELS)[number];

export const CONFIDENCE_LEVELS = ['high', 'medium', 'low'] as const;
export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

// Out-of-set values from the vision capability land here
export type Unknown = 'unknown';

export interface QualitativeAssessment {
  changeDetected: boolean;
  changeType: ChangeType | Unknown;
  severity: SeverityLabel | Unknown;
  confidence: ConfidenceLevel | Unknown;
  rationale: string;
  newFeatures: string[];
  lostFeatures: string[];
}

export interface AssessmentWarning {
  field: string;
  received: string;
  coercedTo: string;
}

// ============================================================================
// METRICS
// ============================================================================

export type Trend = 'accelerating' | 'stable' | 'slowing';

export type Biome = 'tropical_forest' | 'temperate_forest' | 'boreal_forest' | 'savanna';

export interface ChangeMetrics {
  changeType: ChangeType;
  severityScore: number;
  severityRecognized: boolean;
  boundingBoxAreaKm2: number;
  areaFraction: number;
  affectedAreaKm2: number;
  affectedAreaPct: number;
  affectedKm2PerDay: number;
  carbonEmissionTons?: number;  // deforestation only
  trend: Trend;
  warnings: string[];
}

// ============================================================================
// COST
// ============================================================================

export interface CostEntry {
  callId: string;
  inputUnits: number;
  outputUnits: number;
  cost: number;
}

export interface CostSnapshot {
  totalCost: number;
  totalInputUnits: number;
  totalOutputUnits: number;
  callCount: number;
}

export interface UnitRates {
  inputPerMillion: number;
  outputPerMillion: number;
}
