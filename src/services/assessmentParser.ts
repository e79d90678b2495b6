/**
 * Assessment Parser
 * Validates the vision capability's loosely typed output and coerces every
 * enumerated field into its closed set. Nothing open-ended gets past here.
 * Location: src/services/assessmentParser.ts
 */

import { z } from 'zod';
import {
  CHANGE_TYPES,
  CONFIDENCE_LEVELS,
  SEVERITY_LABELS,
  type AssessmentWarning,
  type QualitativeAssessment,
} from '../types/satellite';

const ChangeTypeSchema = z.enum(CHANGE_TYPES);
const SeveritySchema = z.enum(SEVERITY_LABELS);
const ConfidenceSchema = z.enum(CONFIDENCE_LEVELS);

const ALIASES: Record<string, string> = {
  urban: 'urban_sprawl',
  urbanization: 'urban_sprawl',
  ice: 'ice_melt',
  critical: 'severe',
  extreme: 'severe',
  medium: 'moderate',
  no_change: 'none',
};

const ConfidenceAliases: Record<string, string> = {
  moderate: 'medium',
};

const looseText = z
  .union([z.string(), z.number(), z.boolean()])
  .transform(String)
  .optional()
  .catch(undefined);
const featureList = z
  .array(z.unknown())
  .transform((items) =>
    items.filter((item): item is string => typeof item === 'string' && item.trim() !== '').map((item) => item.trim())
  )
  .optional()
  .catch(undefined);

// Field names vary between prompt revisions; accept the known spellings.
// Each field is checked on its own.
const RawAssessmentSchema = z
  .object({
    change_detected: z.unknown(),
    changes_detected: z.unknown(),
    change_type: z.unknown(),
    primary_change_type: z.unknown(),
    severity: z.unknown(),
    severity_label: z.unknown(),
    confidence: z.unknown(),
    rationale: looseText,
    change_summary: looseText,
    new_features: featureList,
    lost_features: featureList,
  })
  .passthrough();

export interface ParsedAssessment {
  assessment: QualitativeAssessment;
  warnings: AssessmentWarning[];
}

function normalize(value: string): string {
  return value.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

function present(value: unknown): boolean {
  return value !== undefined && value !== null;
}

function firstPresent(...values: unknown[]): unknown {
  return values.find(present);
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value) ?? typeof value;
}

function coerceEnum<T extends string>(
  schema: z.ZodType<T>,
  field: string,
  value: unknown,
  warnings: AssessmentWarning[],
  aliases: Record<string, string> = ALIASES
): T | 'unknown' {
  if (!present(value)) {
    warnings.push({ field, received: '(missing)', coercedTo: 'unknown' });
    return 'unknown';
  }
  const received = describeValue(value);
  if (typeof value === 'string') {
    const normalized = normalize(value);
    const parsed = schema.safeParse(aliases[normalized] ?? normalized);
    if (parsed.success) return parsed.data;
  }
  warnings.push({ field, received, coercedTo: 'unknown' });
  return 'unknown';
}

function coerceBoolean(value: unknown, field: string, warnings: AssessmentWarning[]): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = normalize(value);
    if (['true', 'yes', '1'].includes(normalized)) return true;
    if (['false', 'no', '0'].includes(normalized)) return false;
  }
  if (present(value)) {
    warnings.push({ field, received: describeValue(value), coercedTo: 'inferred' });
  }
  return undefined;
}

/**
 * Remove ```json fences the model sometimes wraps around its answer
 */
export function stripMarkdownJson(text: string): string {
  return text.replace(/```(?:json)?\s*/gi, '').replace(/```/g, '').trim();
}

function toObject(raw: unknown): unknown {
  if (typeof raw !== 'string') return raw;
  try {
    return JSON.parse(stripMarkdownJson(raw));
  } catch (error) {
    return raw;
  }
}

export function unknownAssessment(rationale = ''): QualitativeAssessment {
  return {
    changeDetected: false,
    changeType: 'unknown',
    severity: 'unknown',
    confidence: 'unknown',
    rationale,
    newFeatures: [],
    lostFeatures: [],
  };
}

/**
 * Parse untrusted vision output into a QualitativeAssessment.
 * Never throws: structural problems produce an all-unknown assessment,
 * out-of-set values become 'unknown', and each coercion is reported.
 */
export function parseAssessment(raw: unknown): ParsedAssessment {
  const warnings: AssessmentWarning[] = [];
  const parsed = RawAssessmentSchema.safeParse(toObject(raw));

  if (!parsed.success) {
    const received = typeof raw === 'string' ? raw.slice(0, 80) : typeof raw;
    warnings.push({ field: 'assessment', received, coercedTo: 'unknown' });
    console.warn('[Vision] ⚠️ Assessment is not a JSON object; treating every field as unknown');
    return { assessment: unknownAssessment(), warnings };
  }

  const data = parsed.data;
  const changeType = coerceEnum(
    ChangeTypeSchema,
    'change_type',
    firstPresent(data.change_type, data.primary_change_type),
    warnings
  );
  const severity = coerceEnum(SeveritySchema, 'severity', firstPresent(data.severity, data.severity_label), warnings);
  const confidence = present(data.confidence)
    ? coerceEnum(ConfidenceSchema, 'confidence', data.confidence, warnings, ConfidenceAliases)
    : 'unknown';

  const detected = coerceBoolean(
    firstPresent(data.change_detected, data.changes_detected),
    'change_detected',
    warnings
  );
  // Without an explicit flag, a recognised change type other than 'none' implies change
  const changeDetected = detected ?? (changeType !== 'unknown' && changeType !== 'none');

  if (warnings.length > 0) {
    console.warn(`[Vision] ⚠️ ${warnings.length} assessment field(s) coerced`);
  }

  return {
    assessment: {
      changeDetected,
      changeType,
      severity,
      confidence,
      rationale: (data.rationale ?? data.change_summary ?? '').trim(),
      newFeatures: data.new_features ?? [],
      lostFeatures: data.lost_features ?? [],
    },
    warnings,
  };
}

export function formatWarning(warning: AssessmentWarning): string {
  return `Assessment field "${warning.field}" had unrecognized value "${warning.received}"; recorded as ${warning.coercedTo}`;
}
