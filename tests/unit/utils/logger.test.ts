/**
 * Tests for the logger.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { logger, isLogLevel } from '../../../src/utils/logger.js';

describe('logger', () => {
  let lines: string[];
  let savedLevel: typeof chalk.level;

  beforeEach(() => {
    lines = [];
    savedLevel = chalk.level;
    chalk.level = 0;
    logger.setLevel('info');
    logger.setSink((line) => lines.push(line));
  });

  afterEach(() => {
    chalk.level = savedLevel;
    logger.setLevel('info');
    logger.setSink();
  });

  it('should write levelled lines with data', () => {
    logger.info('Checking', { files: 3, root: '/tmp/project' });
    logger.warn('Careful');
    expect(lines).toEqual([
      'INFO  Checking files=3 root=/tmp/project',
      'WARN  Careful',
    ]);
  });

  it('should drop messages below the level', () => {
    logger.debug('hidden');
    logger.setLevel('warn');
    logger.info('hidden');
    logger.error('shown');
    expect(lines).toEqual(['ERROR shown']);
  });

  it('should write nothing when silent', () => {
    logger.setLevel('silent');
    logger.error('hidden');
    logger.success('hidden');
    expect(lines).toEqual([]);
  });

  it('should summarize errors by message', () => {
    logger.error('Failed', new Error('boom'));
    expect(lines).toEqual(['ERROR Failed error=boom']);
  });

  it('should write success and failure marks', () => {
    logger.success('Created .tagcase.yaml');
    logger.fail('Nope');
    expect(lines).toEqual(['✓ Created .tagcase.yaml', '✗ Nope']);
  });

  it('should prefix child loggers and share the root level', () => {
    const child = logger.child('engine').child('go');
    child.info('parsed');
    logger.setLevel('silent');
    child.warn('hidden');
    expect(lines).toEqual(['INFO  [engine:go] parsed']);
  });

  it('should recognise level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
