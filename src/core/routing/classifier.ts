/**
 * Maps drop-zone files to categories.
 *
 * The extension table comes from configuration; content sniffing only kicks
 * in for names whose extension is missing or not in the table.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { AppConfig, RoutingConfig } from '../config/config';
import type { Classification } from '../../interfaces/routing';

const SIGNATURES: ReadonlyArray<{ bytes: readonly number[]; extension: string }> = [
  { bytes: [0x25, 0x50, 0x44, 0x46], extension: '.pdf' },
  { bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], extension: '.png' },
  { bytes: [0xff, 0xd8, 0xff], extension: '.jpg' },
  { bytes: [0x47, 0x49, 0x46, 0x38], extension: '.gif' },
  { bytes: [0x49, 0x49, 0x2a, 0x00], extension: '.tif' },
  { bytes: [0x4d, 0x4d, 0x00, 0x2a], extension: '.tif' },
  { bytes: [0x50, 0x4b, 0x03, 0x04], extension: '.zip' },
];

const HEADER_BYTES = 8;

/**
 * Lower-cased extension including the dot ("" when there is none).
 */
export function extensionOf(fileName: string): string {
  return path.extname(fileName).toLowerCase();
}

export function sniffExtension(header: Uint8Array): string | null {
  const match = SIGNATURES.find(
    ({ bytes }) =>
      header.length >= bytes.length &&
      bytes.every((byte, index) => header[index] === byte),
  );
  return match?.extension ?? null;
}

export function classifyByExtension(
  extension: string,
  routing: RoutingConfig,
): Classification {
  const category = routing.extensions[extension.toLowerCase()];
  if (category !== undefined) {
    return { category, source: 'extension' };
  }
  return { category: routing.fallbackCategory, source: 'fallback' };
}

async function readHeader(filePath: string): Promise<Uint8Array> {
  const handle = await fs.promises.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(HEADER_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, HEADER_BYTES, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

export async function classifyFile(
  filePath: string,
  routing: RoutingConfig,
): Promise<Classification> {
  const byExtension = classifyByExtension(extensionOf(filePath), routing);
  if (byExtension.source === 'extension' || !routing.sniffContent) {
    return byExtension;
  }

  const sniffed = sniffExtension(await readHeader(filePath));
  if (sniffed === null) {
    return byExtension;
  }
  const byContent = classifyByExtension(sniffed, routing);
  if (byContent.source === 'fallback') {
    return byExtension;
  }
  return { category: byContent.category, source: 'content', sniffedExtension: sniffed };
}

/**
 * Absolute folder a category routes to; unknown categories use the fallback
 * folder.
 */
export function destinationFolder(category: string, config: AppConfig): string {
  return config.folders[category] ?? config.routing.fallbackFolder;
}
