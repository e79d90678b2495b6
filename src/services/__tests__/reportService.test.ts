import { promises as fs } from 'fs';
import path from 'path';
import { fakePng, makeTempDir, removeDir, silenceConsole } from '../../__tests__/helpers';
import type { BoundingBox, ImageryArtifact } from '../../types/satellite';
import { createTimeWindow } from '../../utils/dates';
import { createLocation } from '../../utils/geo';
import { IncompleteReportError } from '../errors';
import {
  assembleReport,
  escapeCsv,
  renderReport,
  reportFileName,
  slugify,
  writeReports,
  type ReportInput,
} from '../reportService';

const BOX: BoundingBox = { minLat: -3.5153, minLon: -62.265992, maxLat: -3.4153, maxLon: -62.165808 };

function artifact(requestedDate: string, servedDate: string): ImageryArtifact {
  const payload = fakePng();
  return {
    payload,
    provenance: {
      layer: 'viirs_day',
      layerId: 'VIIRS_SNPP_CorrectedReflectance_TrueColor',
      requestedDate,
      servedDate,
      boundingBox: BOX,
      byteSize: payload.length,
      contentType: 'image/png',
      fetchedAt: '2024-07-01T12:00:00.000Z',
      fromCache: false,
    },
  };
}

function reportInput(): ReportInput {
  return {
    runId: 'abcdef12-3456-7890-abcd-ef1234567890',
    generatedAt: new Date('2024-07-01T12:34:56.789Z'),
    location: createLocation('Amazon Rainforest, Brazil', -3.4653, -62.2159),
    timeWindow: createTimeWindow('2023-06-15', '2024-06-15'),
    analysisType: 'deforestation',
    imagery: {
      before: artifact('2023-06-15', '2023-06-15'),
      after: artifact('2024-06-15', '2024-06-17'),
    },
    assessment: {
      changeDetected: true,
      changeType: 'deforestation',
      severity: 'high',
      confidence: 'high',
      rationale: 'Rapid clearing along new roads',
      newFeatures: ['logging roads'],
      lostFeatures: ['forest canopy'],
    },
    metrics: {
      changeType: 'deforestation',
      severityScore: 8,
      severityRecognized: true,
      boundingBoxAreaKm2: 123.21,
      areaFraction: 0.8,
      affectedAreaKm2: 98.57,
      affectedAreaPct: 80,
      affectedKm2PerDay: 0.2693,
      carbonEmissionTons: 19714,
      trend: 'accelerating',
      warnings: [],
    },
    warnings: ['After imagery served from 2024-06-17 (requested 2024-06-15)'],
    cost: { totalCost: 0.0135, totalInputUnits: 2000, totalOutputUnits: 500, callCount: 1 },
  };
}

describe('assembleReport', () => {
  it('builds a deep-frozen report', () => {
    const report = assembleReport(reportInput());

    expect(report.generatedAt).toBe('2024-07-01T12:34:56.789Z');
    expect(report.location.formatted).toBe("3°27'S, 62°12'W");
    expect(report.timeWindow.elapsedDays).toBe(366);
    expect(report.imagery.after.servedDate).toBe('2024-06-17');
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.metrics.warnings)).toBe(true);
    expect(Object.isFrozen(report.imagery.before.boundingBox)).toBe(true);
    expect(Object.isFrozen(report.assessment.newFeatures)).toBe(true);
  });

  it('shares no mutable state with its inputs', () => {
    const input = reportInput();
    const report = assembleReport(input);
    input.assessment.newFeatures.push('mine');
    input.warnings.push('late');

    expect(report.assessment.newFeatures).toEqual(['logging roads']);
    expect(report.warnings).toEqual(['After imagery served from 2024-06-17 (requested 2024-06-15)']);
  });

  it('merges metric warnings without duplicates', () => {
    const input = reportInput();
    input.warnings = ['a'];
    input.metrics.warnings = ['b', 'a'];

    expect(assembleReport(input).warnings).toEqual(['a', 'b']);
  });

  it('names every missing part', () => {
    expect(() => assembleReport({ ...reportInput(), metrics: undefined })).toThrow(IncompleteReportError);

    const input = reportInput();
    const error = (() => {
      try {
        assembleReport({ ...input, runId: '', imagery: { before: input.imagery.before } });
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();
    expect(error).toBeInstanceOf(IncompleteReportError);
    if (!(error instanceof IncompleteReportError)) throw error;
    expect(error.missing).toEqual(['runId', 'imagery.after']);
    expect(error.message).toBe('Report is missing required fields: runId, imagery.after');
  });
});

describe('renderReport', () => {
  const report = assembleReport(reportInput());

  it('renders identical bytes every time', () => {
    for (const format of ['json', 'markdown', 'csv'] as const) {
      expect(renderReport(report, format)).toBe(renderReport(report, format));
    }
  });

  it('round-trips the JSON rendering', () => {
    expect(JSON.parse(renderReport(report, 'json'))).toEqual(report);
  });

  it('renders one CSV row under a fixed header', () => {
    const [header, row, trailing] = renderReport(report, 'csv').split('\n');

    expect(header).toBe(
      'location_name,latitude,longitude,before_date,after_date,days_elapsed,layer,before_served,after_served,' +
        'change_detected,change_type,severity,severity_score,confidence,trend,bbox_area_km2,affected_area_km2,' +
        'affected_area_pct,affected_km2_per_day,carbon_emission_tons,total_cost_usd,warning_count'
    );
    expect(row).toBe(
      '"Amazon Rainforest, Brazil",-3.4653,-62.2159,2023-06-15,2024-06-15,366,viirs_day,2023-06-15,2024-06-17,' +
        'true,deforestation,high,8,high,accelerating,123.21,98.57,80,0.2693,19714,0.013500,1'
    );
    expect(trailing).toBe('');
  });

  it('leaves carbon empty when it does not apply', () => {
    const input = reportInput();
    const { carbonEmissionTons, ...metrics } = input.metrics;
    expect(carbonEmissionTons).toBe(19714);
    const row = renderReport(assembleReport({ ...input, metrics }), 'csv').split('\n')[1];
    expect(row.split(',').slice(-3)).toEqual(['', '0.013500', '1']);
  });

  it('renders the markdown summary', () => {
    const lines = renderReport(report, 'markdown').split('\n');

    expect(lines[0]).toBe('# Satellite Change Analysis: Amazon Rainforest, Brazil');
    expect(lines).toContain("**Coordinates**: 3°27'S, 62°12'W (-3.4653, -62.2159)  ");
    expect(lines).toContain('**Time Span**: 366 days');
    expect(lines).toContain('**Severity**: HIGH (8/10)  ');
    expect(lines).toContain('| Carbon emissions | 19714 t CO₂ |');
    expect(lines).toContain(
      '| After | VIIRS_SNPP_CorrectedReflectance_TrueColor | 2024-06-15 | 2024-06-17 | 1024 | network |'
    );
    expect(lines).toContain('- After imagery served from 2024-06-17 (requested 2024-06-15)');
    expect(lines).toContain('**Estimated Cost**: $0.0135');
  });
});

describe('file naming', () => {
  const report = assembleReport(reportInput());

  it('builds names from location, time, run id and kind', () => {
    expect(reportFileName(report, 'json')).toBe('amazon_rainforest_brazil_2024-07-01_123456_abcdef12_analysis.json');
    expect(reportFileName(report, 'markdown')).toBe('amazon_rainforest_brazil_2024-07-01_123456_abcdef12_report.md');
    expect(reportFileName(report, 'csv')).toBe('amazon_rainforest_brazil_2024-07-01_123456_abcdef12_metrics.csv');
  });

  it('slugifies location names', () => {
    expect(slugify('  Ñoño / Test  ')).toBe('o_o_test');
    expect(slugify('!!!')).toBe('location');
    expect(slugify('x'.repeat(80))).toHaveLength(50);
  });

  it('escapes CSV values', () => {
    expect(escapeCsv('plain')).toBe('plain');
    expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsv('two\nlines')).toBe('"two\nlines"');
    expect(escapeCsv(undefined)).toBe('');
    expect(escapeCsv(false)).toBe('false');
  });
});

describe('writeReports', () => {
  const report = assembleReport(reportInput());
  let dir: string;

  beforeEach(async () => {
    silenceConsole();
    dir = await makeTempDir('reports-');
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeDir(dir);
  });

  it('writes all three renderings', async () => {
    const files = await writeReports(report, path.join(dir, 'results'));

    expect(path.basename(files.json)).toBe(reportFileName(report, 'json'));
    await expect(fs.readFile(files.json, 'utf8')).resolves.toBe(renderReport(report, 'json'));
    await expect(fs.readFile(files.markdown, 'utf8')).resolves.toBe(renderReport(report, 'markdown'));
    await expect(fs.readFile(files.csv, 'utf8')).resolves.toBe(renderReport(report, 'csv'));
  });

  it('accepts rewriting the same report', async () => {
    const first = await writeReports(report, dir);
    await expect(writeReports(report, dir)).resolves.toEqual(first);
    await expect(fs.readdir(dir)).resolves.toHaveLength(3);
  });

  it('never overwrites a different file', async () => {
    const files = await writeReports(report, dir);
    await fs.writeFile(files.csv, 'edited by hand\n');

    await expect(writeReports(report, dir)).rejects.toMatchObject({ code: 'EEXIST' });
    await expect(fs.readFile(files.csv, 'utf8')).resolves.toBe('edited by hand\n');
  });
});
