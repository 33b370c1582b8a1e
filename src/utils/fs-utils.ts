import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import crypto from 'node:crypto';
import { pipeline } from 'node:stream/promises';
import { FileError } from './errors';

/**
 * MD5 of the file content as lowercase hex (128-bit fingerprint).
 */
export function calculateChecksum(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('md5');
    const stream = fs.createReadStream(filePath);

    stream.on('error', reject);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.promises.access(target);
    return true;
  } catch {
    return false;
  }
}

export function expandHome(target: string): string {
  if (target === '~') {
    return os.homedir();
  }
  if (target.startsWith('~/')) {
    return path.join(os.homedir(), target.slice(2));
  }
  return target;
}

/**
 * Hidden sibling path used while a file is being written.
 */
export function tempPathFor(finalPath: string): string {
  const suffix = crypto.randomBytes(4).toString('hex');
  return path.join(
    path.dirname(finalPath),
    `.${path.basename(finalPath)}.${suffix}.partial`,
  );
}

export async function loadJsonFromFile<T>(
  filePath: string,
  defaultValue: T,
): Promise<T> {
  try {
    const data = await fs.promises.readFile(filePath, 'utf8');
    return JSON.parse(data) as T;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return defaultValue;
    }
    throw error;
  }
}

/**
 * Writes JSON through a temp file and a rename so readers never see a
 * half-written document.
 */
export async function saveJsonToFile(
  filePath: string,
  data: unknown,
): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = tempPathFor(filePath);
  try {
    await fs.promises.writeFile(tempPath, JSON.stringify(data, null, 2), {
      mode: 0o600,
    });
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

export interface CopyOptions {
  /** Aborting stops the copy and leaves the destination untouched */
  signal?: AbortSignal;
}

/**
 * Copies `source` next to `destination` under a temp name, checks the copy
 * is complete, then renames it into place. The destination only ever holds
 * a complete file.
 */
export async function copyFileAtomic(
  source: string,
  destination: string,
  options: CopyOptions = {},
): Promise<void> {
  const tempPath = tempPathFor(destination);
  try {
    const handle = await fs.promises.open(tempPath, 'w');
    await pipeline(fs.createReadStream(source), handle.createWriteStream(), {
      signal: options.signal,
    });
    const [sourceStats, copyStats] = await Promise.all([
      fs.promises.stat(source),
      fs.promises.stat(tempPath),
    ]);
    if (sourceStats.size !== copyStats.size) {
      throw new FileError(
        'InvalidContent',
        `Copy of ${source} is ${copyStats.size} bytes, expected ${sourceStats.size}`,
      );
    }
    options.signal?.throwIfAborted();
    await fs.promises.rename(tempPath, destination);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Moves a file so that it is either fully at `destination` or untouched at
 * `source`. Same-device moves are a single rename; cross-device moves copy
 * through a temp file first and only remove the source once the copy is in
 * place.
 */
export async function moveFileAtomic(
  source: string,
  destination: string,
): Promise<void> {
  if (await pathExists(destination)) {
    throw new FileError('IOError', `Destination already exists: ${destination}`);
  }

  try {
    await fs.promises.rename(source, destination);
    return;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'EXDEV') {
      throw error;
    }
  }

  await copyFileAtomic(source, destination);
  await fs.promises.unlink(source);
}
