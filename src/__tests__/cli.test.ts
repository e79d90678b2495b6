import { parseCliArgs } from '../cli';
import { InvalidInputError } from '../services/errors';

describe('parseCliArgs', () => {
  it('shows usage without arguments', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'help' });
  });

  it('recognizes listing and cache commands', () => {
    expect(parseCliArgs(['--list'])).toEqual({ kind: 'list' });
    expect(parseCliArgs(['--clear-cache'])).toEqual({ kind: 'clear-cache' });
  });

  it('treats positionals as region presets', () => {
    expect(parseCliArgs(['amazon_basin', 'dubai', '--concurrency', '3'])).toEqual({
      kind: 'analyze',
      targets: ['amazon_basin', 'dubai'],
      concurrency: 3,
    });
  });

  it('builds an explicit target from flags', () => {
    const command = parseCliArgs([
      '--lat=-3.4653',
      '--lon=-62.2159',
      '--before',
      '2023-06-15',
      '--after',
      '2024-06-15',
      '--type',
      'deforestation',
      '--layer',
      'landsat',
      '--window-km',
      '20',
      '--name',
      'Amazon',
    ]);

    expect(command).toEqual({
      kind: 'analyze',
      targets: [
        {
          name: 'Amazon',
          latitude: -3.4653,
          longitude: -62.2159,
          before: '2023-06-15',
          after: '2024-06-15',
          layer: 'landsat',
          changeType: 'deforestation',
          windowSizeKm: 20,
        },
      ],
      concurrency: 2,
    });
  });

  it('defaults the change type to general', () => {
    const command = parseCliArgs(['--lat', '10', '--lon', '20', '--before', '2024-01-01', '--after', '2024-02-01']);
    expect(command.kind === 'analyze' && command.targets[0]).toMatchObject({ changeType: 'general' });
  });

  it('rejects invalid flag values', () => {
    const base = ['--lat', '10', '--lon', '20', '--before', '2024-01-01', '--after', '2024-02-01'];
    expect(() => parseCliArgs([...base, '--type', 'volcano'])).toThrow(InvalidInputError);
    expect(() => parseCliArgs([...base, '--layer', 'goes'])).toThrow(/--layer: expected one of landsat/);
    expect(() => parseCliArgs(['--lat', '100', '--lon', '20', '--before', '2024-01-01', '--after', '2024-02-01'])).toThrow(
      /--lat/
    );
    expect(() => parseCliArgs(['amazon_basin', '--concurrency', '0'])).toThrow(/--concurrency must be a positive integer/);
  });
});
