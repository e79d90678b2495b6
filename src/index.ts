export * from './types/satellite';
export * from './types/report';
export * from './services/errors';
export { loadConfig, type SatelliteConfig } from './config';
export { LAYER_CATALOG, LAYER_KEYS, DEFAULT_LAYER, getLayerInfo, isLayerKey } from './services/datasets/gibsLayers';
export {
  resolveRequest,
  boundingBoxAreaKm2,
  createLocation,
  formatCoordinates,
  haversineKm,
  validateCoordinates,
} from './utils/geo';
export { createTimeWindow, fallbackDates, parseCalendarDate } from './utils/dates';
export { REGION_PRESETS, getRegionPreset, findNearestPreset, type RegionPreset } from './utils/regionPresets';
export { ImageryCache, cacheKey } from './services/imageryCache';
export { ImageryFetcher, classifyResponse } from './services/imageryService';
export { parseAssessment, formatWarning } from './services/assessmentParser';
export { ChangeQuantifier, AREA_FRACTION_STEPS, CARBON_EMISSION_FACTORS, SEVERITY_SCORES } from './services/changeQuantifier';
export { CostLedger, costForUsage } from './services/costLedger';
export { buildComparisonPrompt } from './services/prompts';
export {
  AnthropicVisionClient,
  type VisionCapability,
  type VisionInput,
  type VisionResult,
} from './services/visionService';
export { assembleReport, renderReport, reportFileName, writeReports } from './services/reportService';
export {
  SatelliteAnalyzer,
  createSatelliteAnalyzer,
  type AnalysisTarget,
  type AnalysisOutcome,
  type BatchResult,
  type ExplicitTarget,
} from './services/satelliteAnalyzer';
