/**
 * Report types
 * Location: src/types/report.ts
 */

import type {
  ChangeMetrics,
  ChangeType,
  CostSnapshot,
  ImageryProvenance,
  Location,
  QualitativeAssessment,
  TimeWindow,
} from './satellite';

export type ReportFormat = 'json' | 'markdown' | 'csv';

export interface ReportLocation extends Location {
  formatted: string;
}

export interface AnalysisReport {
  runId: string;
  generatedAt: string;
  location: ReportLocation;
  timeWindow: TimeWindow;
  analysisType: ChangeType;
  imagery: {
    before: ImageryProvenance;
    after: ImageryProvenance;
  };
  assessment: QualitativeAssessment;
  metrics: ChangeMetrics;
  warnings: string[];
  cost: CostSnapshot;
}

export interface ReportFiles {
  json: string;
  markdown: string;
  csv: string;
}
