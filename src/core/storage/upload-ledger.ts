import path from 'node:path';
import * as logger from '../../utils/logger';
import type { LedgerEntry, UploadLedgerData } from '../../interfaces/storage';
import { loadJsonFromFile, saveJsonToFile } from '../../utils/fs-utils';

export const LEDGER_FILE_NAME = 'upload-ledger.json';
const LEDGER_VERSION = 1;

const emptyLedger = (): UploadLedgerData => ({
  version: LEDGER_VERSION,
  uploads: {},
});

function isLedgerData(value: unknown): value is UploadLedgerData {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const uploads: unknown = Reflect.get(value, 'uploads');
  return (
    Reflect.get(value, 'version') === LEDGER_VERSION &&
    typeof uploads === 'object' &&
    uploads !== null &&
    !Array.isArray(uploads)
  );
}

/**
 * Which remote keys are known to hold an upload. Written through after every
 * change so a crash loses at most the entry being recorded, in which case the
 * next run finds the object remotely and records it without re-uploading.
 */
export function createUploadLedger(
  stateDir: string,
  verbosity: number = logger.Verbosity.Normal,
) {
  const ledgerPath = path.join(stateDir, LEDGER_FILE_NAME);
  let data: UploadLedgerData | null = null;

  const load = async (): Promise<UploadLedgerData> => {
    if (data) {
      return data;
    }
    let stored: unknown;
    try {
      stored = await loadJsonFromFile<unknown>(ledgerPath, emptyLedger());
    } catch (error) {
      if (!(error instanceof SyntaxError)) {
        throw error;
      }
      stored = null;
    }
    if (isLedgerData(stored)) {
      data = stored;
    } else {
      logger.warning(
        `Ignoring unreadable upload ledger at ${ledgerPath}`,
        verbosity,
      );
      data = emptyLedger();
    }
    logger.verbose(
      `Loaded upload ledger with ${Object.keys(data.uploads).length} entries`,
      verbosity,
    );
    return data;
  };

  const save = async (): Promise<void> => {
    await saveJsonToFile(ledgerPath, await load());
  };

  const has = async (key: string): Promise<boolean> =>
    key in (await load()).uploads;

  const record = async (entry: LedgerEntry): Promise<void> => {
    (await load()).uploads[entry.key] = entry;
    await save();
  };

  const remove = async (key: string): Promise<void> => {
    const ledger = await load();
    if (key in ledger.uploads) {
      delete ledger.uploads[key];
      await save();
    }
  };

  /**
   * Drops entries whose key is not in `liveKeys`. Returns the dropped keys.
   */
  const prune = async (liveKeys: ReadonlySet<string>): Promise<string[]> => {
    const ledger = await load();
    const stale = Object.keys(ledger.uploads).filter((key) => !liveKeys.has(key));
    if (stale.length > 0) {
      for (const key of stale) {
        delete ledger.uploads[key];
      }
      await save();
      logger.verbose(`Pruned ${stale.length} upload ledger entries`, verbosity);
    }
    return stale;
  };

  const entries = async (): Promise<LedgerEntry[]> =>
    Object.values((await load()).uploads);

  return {
    has,
    record,
    remove,
    prune,
    entries,
    get path() {
      return ledgerPath;
    },
  };
}

export type UploadLedger = ReturnType<typeof createUploadLedger>;
