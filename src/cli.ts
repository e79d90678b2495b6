#!/usr/bin/env node
/**
 * Command line entry point
 *
 *   satellite-monitor amazon_basin [las_vegas ...]
 *   satellite-monitor --lat=-3.4653 --lon=-62.2159 --before 2023-06-15 --after 2024-06-15 --type deforestation
 *   satellite-monitor --list
 *   satellite-monitor --clear-cache
 */

import { parseArgs } from 'util';
import { z } from 'zod';
import { loadConfig } from './config';
import { LAYER_KEYS, isLayerKey } from './services/datasets/gibsLayers';
import { InvalidInputError, SatelliteError } from './services/errors';
import { ImageryCache } from './services/imageryCache';
import { createSatelliteAnalyzer, type AnalysisTarget, type BatchResult } from './services/satelliteAnalyzer';
import { CHANGE_TYPES } from './types/satellite';
import { REGION_PRESETS } from './utils/regionPresets';

const USAGE = `Usage:
  satellite-monitor <region> [<region> ...] [--concurrency N]
  satellite-monitor --lat=<deg> --lon=<deg> --before YYYY-MM-DD --after YYYY-MM-DD
                    [--name <text>] [--layer <${LAYER_KEYS.join('|')}>]
                    [--type <${CHANGE_TYPES.join('|')}>] [--window-km <km>]
  satellite-monitor --list
  satellite-monitor --clear-cache`;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'list' }
  | { kind: 'clear-cache' }
  | { kind: 'analyze'; targets: AnalysisTarget[]; concurrency: number };

const ExplicitArgsSchema = z.object({
  lat: z.coerce.number().min(-90).max(90),
  lon: z.coerce.number().min(-180).max(180),
  before: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
  after: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
  name: z.string().optional(),
  layer: z
    .string()
    .refine(isLayerKey, { message: `expected one of ${LAYER_KEYS.join(', ')}` })
    .optional(),
  type: z.enum(CHANGE_TYPES).default('general'),
  'window-km': z.coerce.number().positive().optional(),
});

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      lat: { type: 'string' },
      lon: { type: 'string' },
      before: { type: 'string' },
      after: { type: 'string' },
      name: { type: 'string' },
      layer: { type: 'string' },
      type: { type: 'string' },
      'window-km': { type: 'string' },
      concurrency: { type: 'string' },
      list: { type: 'boolean' },
      'clear-cache': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) return { kind: 'help' };
  if (values.list) return { kind: 'list' };
  if (values['clear-cache']) return { kind: 'clear-cache' };

  const concurrency = values.concurrency === undefined ? 2 : Number(values.concurrency);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new InvalidInputError(`--concurrency must be a positive integer (got ${values.concurrency})`);
  }

  if (positionals.length > 0) {
    return { kind: 'analyze', targets: positionals, concurrency };
  }
  if (values.lat === undefined && values.lon === undefined) {
    return { kind: 'help' };
  }

  const parsed = ExplicitArgsSchema.safeParse(values);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new InvalidInputError(details);
  }
  const args = parsed.data;

  return {
    kind: 'analyze',
    targets: [
      {
        name: args.name,
        latitude: args.lat,
        longitude: args.lon,
        before: args.before,
        after: args.after,
        layer: args.layer,
        changeType: args.type,
        windowSizeKm: args['window-km'],
      },
    ],
    concurrency,
  };
}

function printRegions(): void {
  console.log('Available regions:\n');
  for (const [key, preset] of Object.entries(REGION_PRESETS)) {
    console.log(`  ${key.padEnd(20)} ${preset.name}`);
    console.log(`  ${''.padEnd(20)} ${preset.type}, ${preset.dates.before} → ${preset.dates.after}`);
    console.log(`  ${''.padEnd(20)} ${preset.description}\n`);
  }
}

function printResult(result: BatchResult): void {
  if (result.status === 'failed') {
    console.error(`❌ ${typeof result.target === 'string' ? result.target : result.target.name ?? 'location'}: ${result.error.message}`);
    return;
  }
  const { report, files } = result.outcome;
  console.log(`\n${report.location.name} (${report.location.formatted})`);
  console.log(`  Change:   ${report.metrics.changeType}, severity ${report.metrics.severityScore}/10, trend ${report.metrics.trend}`);
  console.log(`  Affected: ${report.metrics.affectedAreaKm2} km² (${report.metrics.affectedAreaPct}%)`);
  if (report.metrics.carbonEmissionTons !== undefined) {
    console.log(`  Carbon:   ${report.metrics.carbonEmissionTons} t CO₂`);
  }
  console.log(`  Cost:     $${report.cost.totalCost.toFixed(4)}`);
  for (const warning of report.warnings) {
    console.log(`  ⚠️ ${warning}`);
  }
  if (files) {
    console.log(`  Reports:  ${files.json}\n            ${files.markdown}\n            ${files.csv}`);
  }
}

export async function main(argv: string[]): Promise<number> {
  const command = parseCliArgs(argv);
  const config = loadConfig();

  switch (command.kind) {
    case 'help':
      console.log(USAGE);
      return 0;
    case 'list':
      printRegions();
      return 0;
    case 'clear-cache':
      await new ImageryCache({ cacheDir: config.cacheDir }).clear();
      return 0;
    case 'analyze': {
      const controller = new AbortController();
      const onSigint = () => controller.abort();
      process.once('SIGINT', onSigint);
      try {
        const analyzer = createSatelliteAnalyzer(config);
        const results = await analyzer.analyzeBatch(command.targets, {
          concurrency: command.concurrency,
          signal: controller.signal,
        });
        results.forEach(printResult);
        return results.every((result) => result.status === 'completed') ? 0 : 1;
      } finally {
        process.removeListener('SIGINT', onSigint);
      }
    }
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      if (error instanceof SatelliteError) {
        console.error(`❌ ${error.name}: ${error.message}`);
      } else {
        console.error('❌ Unexpected error:', error);
      }
      process.exitCode = 1;
    });
}
