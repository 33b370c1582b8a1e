import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createTempDir,
  removeTempDir,
  writeFile,
} from '../../../test-config/mocks/test-helpers';
import { Verbosity } from '../../interfaces/logger';
import { LEDGER_FILE_NAME, createUploadLedger } from './upload-ledger';

const entry = (key: string) => ({
  key,
  fileName: path.posix.basename(key),
  uploadedAt: '2025-03-01T02:00:00.000Z',
});

describe('createUploadLedger', () => {
  let stateDir: string;

  beforeEach(async () => {
    stateDir = await createTempDir('dropshelf-ledger');
  });

  afterEach(async () => {
    await removeTempDir(stateDir);
  });

  it('should start empty when no ledger file exists', async () => {
    const ledger = createUploadLedger(stateDir, Verbosity.Quiet);

    expect(await ledger.entries()).toEqual([]);
    expect(await ledger.has('a/daily/x.zip')).toBe(false);
    expect(ledger.path).toBe(path.join(stateDir, LEDGER_FILE_NAME));
  });

  it('should persist recorded uploads for the next run', async () => {
    await createUploadLedger(stateDir, Verbosity.Quiet).record(entry('a/daily/x.zip'));

    const reopened = createUploadLedger(stateDir, Verbosity.Quiet);

    expect(await reopened.entries()).toEqual([entry('a/daily/x.zip')]);
    expect(JSON.parse(fs.readFileSync(reopened.path, 'utf8'))).toEqual({
      version: 1,
      uploads: { 'a/daily/x.zip': entry('a/daily/x.zip') },
    });
  });

  it('should forget removed keys', async () => {
    const ledger = createUploadLedger(stateDir, Verbosity.Quiet);
    await ledger.record(entry('a/daily/x.zip'));

    await ledger.remove('a/daily/x.zip');
    await ledger.remove('a/daily/never.zip');

    expect(await createUploadLedger(stateDir, Verbosity.Quiet).has('a/daily/x.zip')).toBe(
      false,
    );
  });

  it('should prune keys that are no longer live', async () => {
    const ledger = createUploadLedger(stateDir, Verbosity.Quiet);
    await ledger.record(entry('a/daily/x.zip'));
    await ledger.record(entry('a/daily/y.zip'));

    const stale = await ledger.prune(new Set(['a/daily/y.zip']));

    expect(stale).toEqual(['a/daily/x.zip']);
    expect((await ledger.entries()).map((item) => item.key)).toEqual(['a/daily/y.zip']);
  });

  it('should replace a ledger file it cannot read', async () => {
    await writeFile(path.join(stateDir, LEDGER_FILE_NAME), '{"version": 9}');
    expect(await createUploadLedger(stateDir, Verbosity.Quiet).entries()).toEqual([]);

    await writeFile(path.join(stateDir, LEDGER_FILE_NAME), '{"version": 1, "upl');
    const ledger = createUploadLedger(stateDir, Verbosity.Quiet);

    expect(await ledger.entries()).toEqual([]);
    await ledger.record(entry('a/daily/x.zip'));
    expect(await createUploadLedger(stateDir, Verbosity.Quiet).has('a/daily/x.zip')).toBe(
      true,
    );
  });
});
