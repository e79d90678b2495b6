import { createTimeWindow } from '../../utils/dates';
import { createLocation } from '../../utils/geo';
import { buildComparisonPrompt } from '../prompts';

describe('buildComparisonPrompt', () => {
  const location = createLocation('Amazon Rainforest, Brazil', -3.4653, -62.2159);
  const timeWindow = createTimeWindow('2023-06-15', '2024-06-15');

  it('describes the place and both dates', () => {
    const prompt = buildComparisonPrompt({ location, timeWindow, analysisType: 'general' });

    expect(prompt.startsWith(
      "You are comparing two satellite images of Amazon Rainforest, Brazil (3°27'S, 62°12'W)."
    )).toBe(true);
    expect(prompt).toContain('The first image is from 2023-06-15. The second image is from 2024-06-15, 366 days later.');
    expect(prompt).not.toContain('FOCUS');
  });

  it('adds guidance for the analysis type', () => {
    expect(buildComparisonPrompt({ location, timeWindow, analysisType: 'deforestation' })).toContain(
      'DEFORESTATION FOCUS:'
    );
    expect(buildComparisonPrompt({ location, timeWindow, analysisType: 'ice_melt' })).toContain('ICE MELT FOCUS:');
  });

  it('uses served dates when fallback moved them', () => {
    const prompt = buildComparisonPrompt({
      location,
      timeWindow,
      analysisType: 'general',
      servedDates: { before: '2023-06-14', after: '2024-06-17' },
    });
    expect(prompt).toContain('The first image is from 2023-06-14. The second image is from 2024-06-17');
  });

  it('asks for the closed-set JSON shape', () => {
    const prompt = buildComparisonPrompt({ location, timeWindow, analysisType: 'general' });
    expect(prompt).toContain('"change_type": "deforestation | ice_melt | urban_sprawl | general | none"');
    expect(prompt).toContain('"severity": "none | low | moderate | high | severe"');
    expect(prompt.endsWith('Return ONLY the JSON object, no other text.')).toBe(true);
  });
});
