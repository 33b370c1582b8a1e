import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { parseConfig, type AppConfig } from '../config/config';
import {
  classifyByExtension,
  classifyFile,
  destinationFolder,
  extensionOf,
  sniffExtension,
} from './classifier';

const PDF_HEADER = Buffer.from('%PDF-1.7\n');
const PNG_HEADER = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

describe('classifier', () => {
  let tempDir: string;
  let config: AppConfig;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dropshelf-classify-'));
    config = parseConfig({ baseDir: tempDir });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should extract lower-cased extensions', () => {
    expect(extensionOf('Report.PDF')).toBe('.pdf');
    expect(extensionOf('archive.tar.gz')).toBe('.gz');
    expect(extensionOf('README')).toBe('');
    expect(extensionOf('.hidden')).toBe('');
  });

  it('should classify by extension regardless of case', () => {
    expect(classifyByExtension('.TIF', config.routing)).toEqual({
      category: 'field_projects',
      source: 'extension',
    });
    expect(classifyByExtension('.pptx', config.routing).category).toBe('business');
  });

  it('should use the fallback category for unknown extensions', () => {
    expect(classifyByExtension('.xyz', config.routing)).toEqual({
      category: 'unclassified',
      source: 'fallback',
    });
  });

  it('should recognise magic bytes', () => {
    expect(sniffExtension(PDF_HEADER)).toBe('.pdf');
    expect(sniffExtension(PNG_HEADER)).toBe('.png');
    expect(sniffExtension(Buffer.from([0x49, 0x49, 0x2a, 0x00]))).toBe('.tif');
    expect(sniffExtension(Buffer.from('plain text'))).toBeNull();
    expect(sniffExtension(Buffer.from([0x25, 0x50]))).toBeNull();
  });

  it('should sniff files without a known extension', async () => {
    const filePath = path.join(tempDir, 'scan');
    fs.writeFileSync(filePath, Buffer.concat([PDF_HEADER, Buffer.from('body')]));

    expect(await classifyFile(filePath, config.routing)).toEqual({
      category: 'admin',
      source: 'content',
      sniffedExtension: '.pdf',
    });
  });

  it('should trust a known extension over the content', async () => {
    const filePath = path.join(tempDir, 'logo.tif');
    fs.writeFileSync(filePath, PNG_HEADER);

    expect((await classifyFile(filePath, config.routing)).category).toBe(
      'field_projects',
    );
  });

  it('should not sniff when sniffing is disabled', async () => {
    const noSniff = parseConfig({ baseDir: tempDir, routing: { sniffContent: false } });
    const filePath = path.join(tempDir, 'scan.bin');
    fs.writeFileSync(filePath, PDF_HEADER);

    expect(await classifyFile(filePath, noSniff.routing)).toEqual({
      category: 'unclassified',
      source: 'fallback',
    });
  });

  it('should map categories to folders and unknown ones to the fallback', () => {
    expect(destinationFolder('admin', config)).toBe(path.join(tempDir, '00_Admin'));
    expect(destinationFolder('unclassified', config)).toBe(
      path.join(tempDir, 'Z_Archive'),
    );
  });
});
