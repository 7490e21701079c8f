import { describe, it, expect, afterEach } from 'vitest';
import { Logger } from './logger';
import { SafetensorsError } from './errors';

function capture(verbose: boolean): string[] {
  const lines: string[] = [];
  Logger.initialize({ verbose, sink: { write: (chunk: string) => lines.push(chunk) } });
  return lines;
}

afterEach(() => {
  Logger.initialize();
});

describe('Logger', () => {
  it('drops log lines unless verbose', () => {
    const lines = capture(false);
    Logger.log('hidden', 'read');
    expect(lines).toEqual([]);
  });

  it('prefixes the operation when verbose', () => {
    const lines = capture(true);
    Logger.log('opened', 'read');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z - \[read\] opened\n$/);
  });

  it('always writes errors with the error message', () => {
    const lines = capture(false);
    Logger.error('Analysis failed', new SafetensorsError('TRUNCATED_HEADER_LENGTH', 'File too short'));
    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith(' - [ERROR] Analysis failed File too short\n')).toBe(true);
  });
});
