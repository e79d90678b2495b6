/**
 * Report Service
 * Assembles the immutable analysis report and renders it as JSON,
 * Markdown and CSV. Rendering is pure: the same report always produces
 * the same bytes.
 * Location: src/services/reportService.ts
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { AnalysisReport, ReportFiles, ReportFormat } from '../types/report';
import type {
  ChangeMetrics,
  ChangeType,
  CostSnapshot,
  ImageryArtifact,
  ImageryProvenance,
  Location,
  QualitativeAssessment,
  TimeWindow,
} from '../types/satellite';
import { formatCoordinates } from '../utils/geo';
import { IncompleteReportError, isErrnoException } from './errors';

// ============================================================================
// ASSEMBLY
// ============================================================================

export interface ReportInput {
  runId: string;
  generatedAt: Date;
  location: Location;
  timeWindow: TimeWindow;
  analysisType: ChangeType;
  imagery: { before?: ImageryArtifact; after?: ImageryArtifact };
  assessment: QualitativeAssessment;
  metrics: ChangeMetrics;
  warnings: string[];
  cost: CostSnapshot;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function copyProvenance(provenance: Readonly<ImageryProvenance>): ImageryProvenance {
  return { ...provenance, boundingBox: { ...provenance.boundingBox } };
}

/**
 * Build the report from the run's parts. Every part is required; the
 * result is deep-frozen and shares no mutable state with the inputs.
 */
export function assembleReport(input: Partial<ReportInput>): AnalysisReport {
  const { runId, generatedAt, location, timeWindow, analysisType, imagery, assessment, metrics, cost } = input;

  if (
    !runId ||
    !generatedAt ||
    !location ||
    !timeWindow ||
    !analysisType ||
    !imagery?.before ||
    !imagery.after ||
    !assessment ||
    !metrics ||
    !cost
  ) {
    const missing = Object.entries({
      runId,
      generatedAt,
      location,
      timeWindow,
      analysisType,
      'imagery.before': imagery?.before,
      'imagery.after': imagery?.after,
      assessment,
      metrics,
      cost,
    })
      .filter(([, value]) => !value)
      .map(([name]) => name);
    throw new IncompleteReportError(missing);
  }

  const warnings = [...(input.warnings ?? [])];
  for (const warning of metrics.warnings) {
    if (!warnings.includes(warning)) warnings.push(warning);
  }

  const report: AnalysisReport = {
    runId,
    generatedAt: generatedAt.toISOString(),
    location: {
      name: location.name,
      latitude: location.latitude,
      longitude: location.longitude,
      formatted: formatCoordinates(location.latitude, location.longitude),
    },
    timeWindow: { ...timeWindow },
    analysisType,
    imagery: {
      before: copyProvenance(imagery.before.provenance),
      after: copyProvenance(imagery.after.provenance),
    },
    assessment: {
      ...assessment,
      newFeatures: [...assessment.newFeatures],
      lostFeatures: [...assessment.lostFeatures],
    },
    metrics: { ...metrics, warnings: [...metrics.warnings] },
    warnings,
    cost: { ...cost },
  };

  return deepFreeze(report);
}

// ============================================================================
// RENDERING
// ============================================================================

const title = (value: string) => value.replace(/_/g, ' ').replace(/\b\w/g, (char) => char.toUpperCase());
const cell = (value: string) => value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');

function renderMarkdown(report: AnalysisReport): string {
  const { location, timeWindow, imagery, assessment, metrics, cost } = report;
  const lines: string[] = [
    `# Satellite Change Analysis: ${location.name}`,
    '',
    '## Location',
    '',
    `**Location**: ${location.name}  `,
    `**Coordinates**: ${location.formatted} (${location.latitude}, ${location.longitude})  `,
    `**Area Monitored**: ${metrics.boundingBoxAreaKm2.toFixed(2)} km²`,
    '',
    '## Time Period',
    '',
    `**Before**: ${timeWindow.before}  `,
    `**After**: ${timeWindow.after}  `,
    `**Time Span**: ${timeWindow.elapsedDays} days`,
    '',
    '## Assessment',
    '',
    `**Analysis Type**: ${title(report.analysisType)}  `,
    `**Change Detected**: ${assessment.changeDetected ? 'Yes ⚠️' : 'No'}  `,
    `**Change Type**: ${title(metrics.changeType)}  `,
    `**Severity**: ${assessment.severity.toUpperCase()} (${metrics.severityScore}/10)  `,
    `**Confidence**: ${title(assessment.confidence)}  `,
    `**Trend**: ${title(metrics.trend)}`,
  ];

  if (assessment.rationale) {
    lines.push('', assessment.rationale);
  }
  if (assessment.newFeatures.length > 0) {
    lines.push('', '### New Features', '', ...assessment.newFeatures.map((feature) => `- ${feature}`));
  }
  if (assessment.lostFeatures.length > 0) {
    lines.push('', '### Features Lost', '', ...assessment.lostFeatures.map((feature) => `- ${feature}`));
  }

  lines.push(
    '',
    '## Quantified Change',
    '',
    '| Metric | Value |',
    '| --- | --- |',
    `| Affected area | ${metrics.affectedAreaKm2.toFixed(2)} km² |`,
    `| Affected share | ${metrics.affectedAreaPct.toFixed(1)}% |`,
    `| Rate | ${metrics.affectedKm2PerDay.toFixed(4)} km²/day |`
  );
  if (metrics.carbonEmissionTons !== undefined) {
    lines.push(`| Carbon emissions | ${metrics.carbonEmissionTons.toFixed(0)} t CO₂ |`);
  }

  lines.push(
    '',
    '## Imagery',
    '',
    '| Image | Layer | Requested | Served | Bytes | Source |',
    '| --- | --- | --- | --- | --- | --- |'
  );
  for (const [label, provenance] of [
    ['Before', imagery.before],
    ['After', imagery.after],
  ] as const) {
    lines.push(
      `| ${label} | ${cell(provenance.layerId)} | ${provenance.requestedDate} | ${provenance.servedDate} | ` +
        `${provenance.byteSize} | ${provenance.fromCache ? 'cache' : 'network'} |`
    );
  }

  if (report.warnings.length > 0) {
    lines.push('', '## Warnings', '', ...report.warnings.map((warning) => `- ${warning}`));
  }

  lines.push(
    '',
    '## Cost',
    '',
    `**Vision Calls**: ${cost.callCount}  `,
    `**Tokens**: ${cost.totalInputUnits} in / ${cost.totalOutputUnits} out  `,
    `**Estimated Cost**: $${cost.totalCost.toFixed(4)}`,
    '',
    '---',
    '',
    `*Run ${report.runId}, generated ${report.generatedAt}*`,
    ''
  );

  return lines.join('\n');
}

const CSV_COLUMNS = [
  'location_name',
  'latitude',
  'longitude',
  'before_date',
  'after_date',
  'days_elapsed',
  'layer',
  'before_served',
  'after_served',
  'change_detected',
  'change_type',
  'severity',
  'severity_score',
  'confidence',
  'trend',
  'bbox_area_km2',
  'affected_area_km2',
  'affected_area_pct',
  'affected_km2_per_day',
  'carbon_emission_tons',
  'total_cost_usd',
  'warning_count',
] as const;

type CsvRow = Record<(typeof CSV_COLUMNS)[number], string | number | boolean | undefined>;

export function escapeCsv(value: string | number | boolean | undefined): string {
  if (value === undefined) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function renderCsv(report: AnalysisReport): string {
  const { location, timeWindow, imagery, assessment, metrics, cost } = report;
  const row: CsvRow = {
    location_name: location.name,
    latitude: location.latitude,
    longitude: location.longitude,
    before_date: timeWindow.before,
    after_date: timeWindow.after,
    days_elapsed: timeWindow.elapsedDays,
    layer: imagery.before.layer,
    before_served: imagery.before.servedDate,
    after_served: imagery.after.servedDate,
    change_detected: assessment.changeDetected,
    change_type: metrics.changeType,
    severity: assessment.severity,
    severity_score: metrics.severityScore,
    confidence: assessment.confidence,
    trend: metrics.trend,
    bbox_area_km2: metrics.boundingBoxAreaKm2,
    affected_area_km2: metrics.affectedAreaKm2,
    affected_area_pct: metrics.affectedAreaPct,
    affected_km2_per_day: metrics.affectedKm2PerDay,
    carbon_emission_tons: metrics.carbonEmissionTons,
    total_cost_usd: cost.totalCost.toFixed(6),
    warning_count: report.warnings.length,
  };

  return [CSV_COLUMNS.join(','), CSV_COLUMNS.map((column) => escapeCsv(row[column])).join(','), ''].join('\n');
}

export function renderReport(report: AnalysisReport, format: ReportFormat): string {
  switch (format) {
    case 'json':
      return `${JSON.stringify(report, null, 2)}\n`;
    case 'markdown':
      return renderMarkdown(report);
    case 'csv':
      return renderCsv(report);
  }
}

// ============================================================================
// FILES
// ============================================================================

const FILE_KINDS: Record<ReportFormat, { kind: string; extension: string }> = {
  json: { kind: 'analysis', extension: 'json' },
  markdown: { kind: 'report', extension: 'md' },
  csv: { kind: 'metrics', extension: 'csv' },
};

export function slugify(name: string): string {
  const slug = name
    .replace(/[^A-Za-z0-9_-]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase()
    .slice(0, 50);
  return slug || 'location';
}

/**
 * `<slug>_<YYYY-MM-DD_HHmmss>_<run id prefix>_<kind>.<ext>` (UTC)
 */
export function reportFileName(report: AnalysisReport, format: ReportFormat): string {
  const iso = report.generatedAt;
  const timestamp = `${iso.slice(0, 10)}_${iso.slice(11, 19).replace(/:/g, '')}`;
  const { kind, extension } = FILE_KINDS[format];
  return `${slugify(report.location.name)}_${timestamp}_${report.runId.slice(0, 8)}_${kind}.${extension}`;
}

async function writeExclusive(file: string, content: string): Promise<void> {
  try {
    await fs.writeFile(file, content, { encoding: 'utf8', flag: 'wx' });
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EEXIST') throw error;
    // Re-writing the same report is a no-op; anything else must not be overwritten
    const existing = await fs.readFile(file, 'utf8');
    if (existing !== content) throw error;
    console.log(`[Report] ${path.basename(file)} already written`);
  }
}

/**
 * Write all three renderings to `dir`, never overwriting a different file
 */
export async function writeReports(report: AnalysisReport, dir: string): Promise<ReportFiles> {
  await fs.mkdir(dir, { recursive: true });

  const files: ReportFiles = {
    json: path.join(dir, reportFileName(report, 'json')),
    markdown: path.join(dir, reportFileName(report, 'markdown')),
    csv: path.join(dir, reportFileName(report, 'csv')),
  };

  await writeExclusive(files.json, renderReport(report, 'json'));
  await writeExclusive(files.markdown, renderReport(report, 'markdown'));
  await writeExclusive(files.csv, renderReport(report, 'csv'));

  console.log(`[Report] ✅ Saved ${path.basename(files.json)}, ${path.basename(files.markdown)}, ${path.basename(files.csv)}`);
  return files;
}
