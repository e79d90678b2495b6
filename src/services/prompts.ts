/**
 * Vision prompts for before/after imagery comparison
 * Location: src/services/prompts.ts
 */

import type { ChangeType, Location, TimeWindow } from '../types/satellite';
import { formatCoordinates } from '../utils/geo';

export interface ComparisonPromptInput {
  location: Location;
  timeWindow: TimeWindow;
  analysisType: ChangeType;
  // Dates actually served, when fallback moved them
  servedDates?: { before: string; after: string };
}

const FOCUS: Partial<Record<ChangeType, string>> = {
  deforestation: `DEFORESTATION FOCUS:
- Look for forest that became cleared land, roads or fields
- Identify clearing patterns (logging, agriculture, road building)
- Note signs of rapid or accelerating clearing`,
  ice_melt: `ICE MELT FOCUS:
- Compare ice and snow coverage between the images
- Identify newly exposed land or open water
- Note any signs of accelerating retreat`,
  urban_sprawl: `URBAN EXPANSION FOCUS:
- Look for new buildings, roads and developed land
- Identify growth patterns (sprawl, infill, planned districts)
- Note loss of natural or agricultural land at the urban edge`,
};

const RESPONSE_SHAPE = `{
  "change_detected": true,
  "change_type": "deforestation | ice_melt | urban_sprawl | general | none",
  "severity": "none | low | moderate | high | severe",
  "confidence": "high | medium | low",
  "rationale": "2-3 sentences describing what changed and whether it is speeding up or slowing down",
  "new_features": ["feature", "..."],
  "lost_features": ["feature", "..."]
}`;

/**
 * Prompt sent alongside the two images (before first, after second)
 */
export function buildComparisonPrompt(input: ComparisonPromptInput): string {
  const { location, timeWindow, analysisType, servedDates } = input;
  const before = servedDates?.before ?? timeWindow.before;
  const after = servedDates?.after ?? timeWindow.after;
  const focus = FOCUS[analysisType];

  const sections = [
    `You are comparing two satellite images of ${location.name} ` +
      `(${formatCoordinates(location.latitude, location.longitude)}).`,
    `The first image is from ${before}. The second image is from ${after}, ` +
      `${timeWindow.elapsedDays} days later.`,
    'Both images cover the same area at the same scale. Describe the visible ' +
      'differences in land cover between them and judge how severe the change is.',
  ];
  if (focus) sections.push(focus);
  sections.push(
    `Return your assessment as a JSON object with exactly these fields:\n${RESPONSE_SHAPE}`,
    'Use only the listed values for change_type, severity and confidence. ' +
      'Return ONLY the JSON object, no other text.'
  );

  return sections.join('\n\n');
}
