/**
 * Logger Tests
 *
 * @module core/__tests__/logger.test
 */

import { describe, it, expect } from 'vitest';
import { createLogger, type LogLevel } from '../logger.js';

function capture() {
  const lines: { level: LogLevel; line: string }[] = [];
  const sink = (level: LogLevel, line: string): void => {
    lines.push({ level, line });
  };
  return { lines, sink };
}

describe('createLogger', () => {
  it('writes scoped lines with their detail', () => {
    const { lines, sink } = capture();
    const logger = createLogger('navigator', { sink });

    logger.error('Module video failed', new Error('kaboom'));

    expect(lines).toHaveLength(1);
    expect(lines[0]?.level).toBe('error');
    expect(lines[0]?.line).toContain('[navigator]');
    expect(lines[0]?.line.endsWith('Module video failed: kaboom')).toBe(true);
  });

  it('serialises structured detail', () => {
    const { lines, sink } = capture();

    createLogger('navigator', { sink }).info('transition', { from: 'main_menu' });

    expect(lines[0]?.line.endsWith('transition: {"from":"main_menu"}')).toBe(true);
  });

  it('drops debug output unless verbose', () => {
    const { lines, sink } = capture();

    createLogger('quiet', { sink, verbose: false }).debug('hidden');
    createLogger('loud', { sink, verbose: true }).debug('shown');

    expect(lines.map((entry) => entry.line.endsWith('shown'))).toEqual([true]);
  });

  it('nests child scopes and keeps settings', () => {
    const { lines, sink } = capture();

    createLogger('tavus', { sink, verbose: true }).child('replicas').debug('refreshed');

    expect(lines[0]?.line).toContain('[tavus:replicas]');
  });
});
