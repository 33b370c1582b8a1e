/**
 * Tests for Logger Utilities
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as logger from './logger';
import { Verbosity } from '../interfaces/logger';

describe('Logger Utilities', () => {
  let stderrOutput: string[];
  let stdoutOutput: string[];

  beforeEach(() => {
    stderrOutput = [];
    stdoutOutput = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderrOutput.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdoutOutput.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should define the verbosity levels in increasing order', () => {
    expect(Verbosity.Quiet).toBe(0);
    expect(Verbosity.Normal).toBe(1);
    expect(Verbosity.Verbose).toBe(2);
  });

  it('should write to stderr and keep stdout free', () => {
    logger.info('scanning inbox', Verbosity.Normal);
    expect(stderrOutput).toHaveLength(1);
    expect(stderrOutput[0]).toContain('scanning inbox');
    expect(stderrOutput[0].endsWith('\n')).toBe(true);
    expect(stdoutOutput).toEqual([]);
  });

  it('should hide normal messages in quiet mode', () => {
    logger.info('hidden info', Verbosity.Quiet);
    logger.success('hidden success', Verbosity.Quiet);
    logger.warning('hidden warning', Verbosity.Quiet);
    expect(stderrOutput).toEqual([]);
  });

  it('should show verbose messages only in verbose mode', () => {
    logger.verbose('detail one', Verbosity.Normal);
    expect(stderrOutput).toEqual([]);
    logger.verbose('detail two', Verbosity.Verbose);
    expect(stderrOutput).toEqual(['detail two\n']);
  });

  it('should always show errors, even in quiet mode', () => {
    logger.error('disk full');
    expect(stderrOutput).toHaveLength(1);
    expect(stderrOutput[0]).toContain('disk full');
  });

  it('should suppress a repeated warning within the duplicate window', () => {
    logger.warning('same warning text', Verbosity.Normal);
    logger.warning('same warning text', Verbosity.Normal);
    expect(stderrOutput).toHaveLength(1);
  });

  it('should allow repeated success messages', () => {
    logger.success('moved file', Verbosity.Normal);
    logger.success('moved file', Verbosity.Normal);
    expect(stderrOutput).toHaveLength(2);
  });

  it('should print always() output regardless of verbosity', () => {
    logger.always('report line');
    expect(stderrOutput).toEqual(['report line\n']);
  });

  it('should keep the text inside colour helpers', () => {
    expect(logger.red('error')).toContain('error');
    expect(logger.green('ok')).toContain('ok');
    expect(logger.bold('title')).toContain('title');
  });
});
