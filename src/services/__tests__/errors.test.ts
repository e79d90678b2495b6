import { promises as fs } from 'fs';
import path from 'path';
import vm from 'vm';
import { makeTempDir, removeDir } from '../../__tests__/helpers';
import { isErrnoException } from '../errors';

describe('isErrnoException', () => {
  it('recognizes errors built in another context', () => {
    const foreign: unknown = vm.runInNewContext('Object.assign(new Error("gone"), { code: "ENOENT" })');

    expect(foreign instanceof Error).toBe(false);
    expect(isErrnoException(foreign)).toBe(true);
  });

  it('recognizes errors raised by fs', async () => {
    const dir = await makeTempDir('errors-');
    try {
      const error = await fs.readFile(path.join(dir, 'missing.json')).catch((caught: unknown) => caught);
      expect(isErrnoException(error) && error.code).toBe('ENOENT');
    } finally {
      await removeDir(dir);
    }
  });

  it('rejects values without a code', () => {
    expect(isErrnoException(new Error('plain'))).toBe(false);
    expect(isErrnoException(null)).toBe(false);
    expect(isErrnoException('ENOENT')).toBe(false);
  });
});
