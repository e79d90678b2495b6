/**
 * Satellite Analyzer
 * Runs the full pipeline for a location: imagery → vision → assessment →
 * metrics → report. One CostLedger per run.
 * Location: src/services/satelliteAnalyzer.ts
 */

import { randomUUID } from 'crypto';
import type { SatelliteConfig } from '../config';
import type { AnalysisReport, ReportFiles } from '../types/report';
import type { CalendarDate, ChangeType, ImageryArtifact, LayerKey, Location, UnitRates } from '../types/satellite';
import { createTimeWindow } from '../utils/dates';
import { createLocation, resolveRequest } from '../utils/geo';
import { getRegionPreset } from '../utils/regionPresets';
import { formatWarning, parseAssessment } from './assessmentParser';
import { ChangeQuantifier } from './changeQuantifier';
import { CostLedger, costForUsage } from './costLedger';
import { DEFAULT_LAYER } from './datasets/gibsLayers';
import { AnalysisCancelledError, IncompleteReportError, InvalidInputError, SatelliteError } from './errors';
import { ImageryCache } from './imageryCache';
import { ImageryFetcher } from './imageryService';
import { assembleReport, writeReports } from './reportService';
import { AnthropicVisionClient, type VisionCapability } from './visionService';

const DEFAULT_CONCURRENCY = 2;

// ============================================================================
// TYPES
// ============================================================================

export interface ExplicitTarget {
  name?: string;
  latitude: number;
  longitude: number;
  before: CalendarDate;
  after: CalendarDate;
  layer?: LayerKey;
  changeType?: ChangeType;
  windowSizeKm?: number;
  fallbackWindowDays?: number;
}

// A region preset key or an explicit location
export type AnalysisTarget = string | ExplicitTarget;

export interface AnalyzeOptions {
  signal?: AbortSignal;
}

export interface BatchOptions extends AnalyzeOptions {
  concurrency?: number;
}

export interface AnalysisOutcome {
  report: AnalysisReport;
  files?: ReportFiles;
}

export type BatchResult =
  | { target: AnalysisTarget; status: 'completed'; outcome: AnalysisOutcome }
  | { target: AnalysisTarget; status: 'failed'; error: SatelliteError };

export interface SatelliteAnalyzerOptions {
  fetcher: ImageryFetcher;
  vision: VisionCapability;
  rates: UnitRates;
  quantifier?: ChangeQuantifier;
  // Reports are only written when set
  resultsDir?: string;
  windowSizeKm: number;
  now?: () => Date;
  generateRunId?: () => string;
}

interface ResolvedTarget {
  location: Location;
  before: CalendarDate;
  after: CalendarDate;
  layer: LayerKey;
  changeType: ChangeType;
  windowSizeKm: number;
  fallbackWindowDays?: number;
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new AnalysisCancelledError();
}

function describeTarget(target: AnalysisTarget): string {
  return typeof target === 'string' ? target : target.name || `${target.latitude}, ${target.longitude}`;
}

function servedDateWarning(label: string, artifact: ImageryArtifact): string | undefined {
  const { requestedDate, servedDate } = artifact.provenance;
  if (requestedDate === servedDate) return undefined;
  return `${label} imagery served from ${servedDate} (requested ${requestedDate})`;
}

/**
 * Batch failures that belong to one location; anything else stops the batch
 */
function isRecoverable(error: unknown): error is SatelliteError {
  return (
    error instanceof SatelliteError &&
    !(error instanceof IncompleteReportError) &&
    !(error instanceof AnalysisCancelledError)
  );
}

// ============================================================================
// ANALYZER
// ============================================================================

export class SatelliteAnalyzer {
  private readonly fetcher: ImageryFetcher;
  private readonly vision: VisionCapability;
  private readonly quantifier: ChangeQuantifier;
  private readonly rates: UnitRates;
  private readonly resultsDir?: string;
  private readonly windowSizeKm: number;
  private readonly now: () => Date;
  private readonly generateRunId: () => string;

  constructor(options: SatelliteAnalyzerOptions) {
    this.fetcher = options.fetcher;
    this.vision = options.vision;
    this.quantifier = options.quantifier ?? new ChangeQuantifier();
    this.rates = options.rates;
    this.resultsDir = options.resultsDir;
    this.windowSizeKm = options.windowSizeKm;
    this.now = options.now ?? (() => new Date());
    this.generateRunId = options.generateRunId ?? randomUUID;
  }

  /**
   * Analyze one location between two dates
   */
  async analyze(target: AnalysisTarget, options: AnalyzeOptions = {}): Promise<AnalysisOutcome> {
    const { signal } = options;
    throwIfAborted(signal);

    const resolved = this.resolveTarget(target);
    const timeWindow = createTimeWindow(resolved.before, resolved.after);
    const requestOptions = { fallbackWindowDays: resolved.fallbackWindowDays };
    const beforeRequest = resolveRequest(
      resolved.location,
      resolved.before,
      resolved.layer,
      resolved.windowSizeKm,
      requestOptions
    );
    const afterRequest = resolveRequest(
      resolved.location,
      resolved.after,
      resolved.layer,
      resolved.windowSizeKm,
      requestOptions
    );

    const runId = this.generateRunId();
    const ledger = new CostLedger();
    const warnings: string[] = [];

    console.log(
      `[Analyzer] 🛰️ ${resolved.location.name}: ${resolved.changeType} ` +
        `${timeWindow.before} → ${timeWindow.after} (${timeWindow.elapsedDays} days, ${resolved.layer})`
    );

    if (beforeRequest.clipped) {
      warnings.push('Bounding box was clipped at the edge of the valid coordinate range');
    }

    const imagery = await this.fetcher.fetchPair(beforeRequest, afterRequest, { signal });
    for (const warning of [servedDateWarning('Before', imagery.before), servedDateWarning('After', imagery.after)]) {
      if (warning) warnings.push(warning);
    }

    throwIfAborted(signal);
    const vision = await this.vision.compare(
      {
        before: imagery.before,
        after: imagery.after,
        location: resolved.location,
        timeWindow,
        analysisType: resolved.changeType,
      },
      signal
    );
    ledger.record({
      callId: vision.callId,
      inputUnits: vision.usage.inputUnits,
      outputUnits: vision.usage.outputUnits,
      cost: costForUsage(vision.usage, this.rates),
    });

    const { assessment, warnings: assessmentWarnings } = parseAssessment(vision.raw);
    warnings.push(...assessmentWarnings.map(formatWarning));

    const metrics = this.quantifier.quantify(imagery.before.provenance, imagery.after.provenance, assessment, {
      elapsedDays: timeWindow.elapsedDays,
    });

    throwIfAborted(signal);
    const report = assembleReport({
      runId,
      generatedAt: this.now(),
      location: resolved.location,
      timeWindow,
      analysisType: resolved.changeType,
      imagery,
      assessment,
      metrics,
      warnings,
      cost: ledger.snapshot(),
    });

    const files = this.resultsDir ? await writeReports(report, this.resultsDir) : undefined;

    console.log(
      `[Analyzer] ✅ ${resolved.location.name}: ${metrics.changeType}, severity ${metrics.severityScore}/10, ` +
        `${metrics.affectedAreaKm2} km² affected, cost $${report.cost.totalCost.toFixed(4)}`
    );
    return { report, files };
  }

  /**
   * Analyze several targets with bounded concurrency. Per-location failures
   * are collected; a defect or cancellation stops the batch and is rethrown.
   */
  async analyzeBatch(targets: AnalysisTarget[], options: BatchOptions = {}): Promise<BatchResult[]> {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new InvalidInputError(`Batch concurrency must be a positive integer (got ${concurrency})`);
    }
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (options.signal?.aborted) controller.abort();

    const results: BatchResult[] = new Array(targets.length);
    let nextIndex = 0;

    const worker = async () => {
      while (nextIndex < targets.length) {
        const index = nextIndex;
        nextIndex += 1;
        const target = targets[index];
        try {
          const outcome = await this.analyze(target, { signal: controller.signal });
          results[index] = { target, status: 'completed', outcome };
        } catch (error) {
          if (!isRecoverable(error)) {
            controller.abort();
            throw error;
          }
          console.warn(`[Analyzer] ⚠️ ${describeTarget(target)} failed: ${error.message}`);
          results[index] = { target, status: 'failed', error };
        }
      }
    };

    try {
      const settled = await Promise.allSettled(
        Array.from({ length: Math.min(concurrency, targets.length) }, () => worker())
      );
      const fatal = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
      if (fatal) throw fatal.reason;
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }

    const failed = results.filter((result) => result.status === 'failed').length;
    console.log(`[Analyzer] Batch complete: ${results.length - failed} succeeded, ${failed} failed`);
    return results;
  }

  private resolveTarget(target: AnalysisTarget): ResolvedTarget {
    if (typeof target === 'string') {
      const preset = getRegionPreset(target);
      return {
        location: createLocation(preset.name, preset.lat, preset.lon),
        before: preset.dates.before,
        after: preset.dates.after,
        layer: preset.layer ?? DEFAULT_LAYER,
        changeType: preset.type,
        windowSizeKm: this.windowSizeKm,
      };
    }
    return {
      location: createLocation(target.name ?? '', target.latitude, target.longitude),
      before: target.before,
      after: target.after,
      layer: target.layer ?? DEFAULT_LAYER,
      changeType: target.changeType ?? 'general',
      windowSizeKm: target.windowSizeKm ?? this.windowSizeKm,
      fallbackWindowDays: target.fallbackWindowDays,
    };
  }
}

/**
 * Wire the analyzer from configuration
 */
export function createSatelliteAnalyzer(config: SatelliteConfig, vision?: VisionCapability): SatelliteAnalyzer {
  const cache = new ImageryCache({ cacheDir: config.cacheDir, maxAgeMs: config.cacheMaxAgeMs });
  const fetcher = new ImageryFetcher({
    cache,
    baseURL: config.wmsBaseUrl,
    timeoutMs: config.imagery.timeoutMs,
    maxRetries: config.imagery.maxRetries,
    backoffMs: config.imagery.backoffMs,
  });

  return new SatelliteAnalyzer({
    fetcher,
    vision: vision ?? new AnthropicVisionClient(config.vision),
    rates: config.rates,
    quantifier: new ChangeQuantifier({ biome: config.biome }),
    resultsDir: config.resultsDir,
    windowSizeKm: config.windowSizeKm,
  });
}
