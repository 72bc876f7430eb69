/**
 * Unit Tests for the loggers and progress output
 */

import { ConsoleLogger, MemoryLogger } from '../logger';
import { ProgressReporter } from '../progress-reporter';

describe('ConsoleLogger', () => {
  it('prefixes a timestamp and drops debug lines outside debug mode', () => {
    const lines: string[] = [];
    const logger = new ConsoleLogger(false, line => lines.push(line));

    logger.warn('Found 2 null values in company.geography');
    logger.debug('hidden');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] ⚠️ Found 2 null values in company\.geography$/);
  });

  it('writes debug lines in debug mode', () => {
    const lines: string[] = [];
    new ConsoleLogger(true, line => lines.push(line)).debug('ascor: INIT → DROP');
    expect(lines[0]).toMatch(/ 🐛 ascor: INIT → DROP$/);
  });
});

describe('MemoryLogger', () => {
  it('filters messages by level', () => {
    const logger = new MemoryLogger();
    logger.info('a');
    logger.error('b');
    logger.info('c');
    expect(logger.messages('info')).toEqual(['a', 'c']);
    expect(logger.messages()).toEqual(['a', 'b', 'c']);
  });
});

describe('ProgressReporter', () => {
  it('reports step progress and record counts', () => {
    const lines: string[] = [];
    const progress = new ProgressReporter(line => lines.push(line));

    progress.logStep('benchmarks', 3, 5);
    progress.logStepComplete('benchmarks', 1.25, 12345);

    expect(lines).toEqual(['  [3/5] benchmarks (60.0%)', '    ✅ benchmarks completed (12,345 records) in 1.3s']);
  });

  it('names the state a run failed in', () => {
    const lines: string[] = [];
    new ProgressReporter(line => lines.push(line)).logRunFailure('TPI', new Error('boom'), 'VALIDATE');
    expect(lines).toContain('  Error: boom');
    expect(lines).toContain('  Failed During: VALIDATE');
  });
});
