/**
 * Change Quantifier
 * Turns a qualitative assessment plus imagery geometry into numeric metrics:
 * severity score, affected area, percentage, rate and carbon emissions.
 * Location: src/services/changeQuantifier.ts
 */

import type {
  Biome,
  ChangeMetrics,
  ChangeType,
  ImageryProvenance,
  QualitativeAssessment,
  SeverityLabel,
  Trend,
  Unknown,
} from '../types/satellite';
import { CHANGE_TYPES } from '../types/satellite';
import { boundingBoxAreaKm2, sameBoundingBox } from '../utils/geo';
import { UnsupportedChangeTypeError } from './errors';

export const SEVERITY_SCORES: Record<SeverityLabel, number> = {
  none: 0,
  low: 2,
  moderate: 5,
  high: 8,
  severe: 10,
};

export interface AreaFractionStep {
  minScore: number;
  fraction: number;
}

/**
 * Share of the monitored box considered affected, by severity score.
 * Steps are checked from the highest threshold down.
 */
export const AREA_FRACTION_STEPS: Record<ChangeType, AreaFractionStep[]> = {
  deforestation: [
    { minScore: 10, fraction: 0.95 },
    { minScore: 8, fraction: 0.8 },
    { minScore: 5, fraction: 0.45 },
    { minScore: 2, fraction: 0.15 },
    { minScore: 0, fraction: 0 },
  ],
  ice_melt: [
    { minScore: 10, fraction: 0.85 },
    { minScore: 8, fraction: 0.6 },
    { minScore: 5, fraction: 0.35 },
    { minScore: 2, fraction: 0.1 },
    { minScore: 0, fraction: 0 },
  ],
  urban_sprawl: [
    { minScore: 10, fraction: 0.5 },
    { minScore: 8, fraction: 0.3 },
    { minScore: 5, fraction: 0.15 },
    { minScore: 2, fraction: 0.05 },
    { minScore: 0, fraction: 0 },
  ],
  general: [
    { minScore: 10, fraction: 0.7 },
    { minScore: 8, fraction: 0.5 },
    { minScore: 5, fraction: 0.25 },
    { minScore: 2, fraction: 0.08 },
    { minScore: 0, fraction: 0 },
  ],
  none: [{ minScore: 0, fraction: 0 }],
};

// Tons CO2 released per km² of cleared above-ground biomass
export const CARBON_EMISSION_FACTORS: Record<Biome, number> = {
  tropical_forest: 200,
  temperate_forest: 150,
  boreal_forest: 100,
  savanna: 50,
};

const ACCELERATING_KEYWORDS = ['rapid', 'accelerat', 'increasing', 'growing', 'expanding'];
const SLOWING_KEYWORDS = ['slow', 'decreas', 'declining', 'reducing'];

const round = (value: number, digits: number) => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

export function severityScore(severity: SeverityLabel | Unknown): { score: number; recognized: boolean } {
  if (severity === 'unknown') return { score: 0, recognized: false };
  return { score: SEVERITY_SCORES[severity], recognized: true };
}

export function resolveChangeType(changeType: ChangeType | Unknown): ChangeType {
  const match = CHANGE_TYPES.find((candidate) => candidate === changeType);
  if (!match) {
    throw new UnsupportedChangeTypeError(changeType);
  }
  return match;
}

export function determineTrend(rationale: string): Trend {
  const text = rationale.toLowerCase();
  if (ACCELERATING_KEYWORDS.some((keyword) => text.includes(keyword))) return 'accelerating';
  if (SLOWING_KEYWORDS.some((keyword) => text.includes(keyword))) return 'slowing';
  return 'stable';
}

export interface ChangeQuantifierOptions {
  biome?: Biome;
  areaFractions?: Partial<Record<ChangeType, AreaFractionStep[]>>;
}

export interface QuantifyOptions {
  elapsedDays?: number;
}

type ImageryGeometry = Pick<ImageryProvenance, 'boundingBox'>;

export class ChangeQuantifier {
  private readonly biome: Biome;
  private readonly steps: Record<ChangeType, AreaFractionStep[]>;

  constructor(options: ChangeQuantifierOptions = {}) {
    this.biome = options.biome ?? 'tropical_forest';
    const merged = { ...AREA_FRACTION_STEPS, ...options.areaFractions };
    this.steps = {
      deforestation: [...merged.deforestation].sort((a, b) => b.minScore - a.minScore),
      ice_melt: [...merged.ice_melt].sort((a, b) => b.minScore - a.minScore),
      urban_sprawl: [...merged.urban_sprawl].sort((a, b) => b.minScore - a.minScore),
      general: [...merged.general].sort((a, b) => b.minScore - a.minScore),
      none: [...merged.none].sort((a, b) => b.minScore - a.minScore),
    };
  }

  areaFraction(changeType: ChangeType, score: number): number {
    const step = this.steps[changeType].find((candidate) => score >= candidate.minScore);
    return step ? Math.min(1, Math.max(0, step.fraction)) : 0;
  }

  quantify(
    before: ImageryGeometry,
    after: ImageryGeometry,
    assessment: QualitativeAssessment,
    options: QuantifyOptions = {}
  ): ChangeMetrics {
    const warnings: string[] = [];

    if (!sameBoundingBox(before.boundingBox, after.boundingBox)) {
      warnings.push('Before and after imagery cover different extents; areas use the before extent');
    }
    const boxAreaKm2 = boundingBoxAreaKm2(before.boundingBox);

    const { score, recognized } = severityScore(assessment.severity);
    if (!recognized) {
      warnings.push('Severity unrecognized; scored as 0');
    }

    let changeType: ChangeType;
    try {
      changeType = resolveChangeType(assessment.changeType);
    } catch (error) {
      if (!(error instanceof UnsupportedChangeTypeError)) throw error;
      console.warn(`[Quantifier] ⚠️ ${error.message}; classifying as general`);
      warnings.push(`Change type "${error.changeType}" unsupported; classified as general`);
      changeType = 'general';
    }

    const areaFraction = assessment.changeDetected ? this.areaFraction(changeType, score) : 0;
    const affectedAreaKm2 = boxAreaKm2 * areaFraction;
    const affectedAreaPct = boxAreaKm2 > 0 ? Math.min(100, Math.max(0, (affectedAreaKm2 / boxAreaKm2) * 100)) : 0;
    const elapsedDays = options.elapsedDays ?? 0;

    const metrics: ChangeMetrics = {
      changeType,
      severityScore: score,
      severityRecognized: recognized,
      boundingBoxAreaKm2: round(boxAreaKm2, 2),
      areaFraction,
      affectedAreaKm2: round(affectedAreaKm2, 2),
      affectedAreaPct: round(affectedAreaPct, 1),
      affectedKm2PerDay: elapsedDays > 0 ? round(affectedAreaKm2 / elapsedDays, 4) : 0,
      trend: determineTrend(assessment.rationale),
      warnings,
    };

    if (changeType === 'deforestation') {
      metrics.carbonEmissionTons = round(affectedAreaKm2 * CARBON_EMISSION_FACTORS[this.biome], 0);
    }

    console.log(
      `[Quantifier] ${changeType}: severity ${score}/10, ${metrics.affectedAreaKm2} km² ` +
        `(${metrics.affectedAreaPct}%) of ${metrics.boundingBoxAreaKm2} km²`
    );
    return metrics;
  }
}
