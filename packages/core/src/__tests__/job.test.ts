import { describe, it, expect } from 'vitest';
import { parseJobConfiguration } from '../config/job.js';
import { ValidationError } from '../errors/index.js';
import { defaultWorkerCount, toStreamSpecifier } from '../types/job.js';

describe('parseJobConfiguration', () => {
  it('fills in defaults', () => {
    const config = parseJobConfiguration({ inputRoot: '/in', outputRoot: '/out' });

    expect(config).toEqual({
      inputRoot: '/in',
      outputRoot: '/out',
      recursive: false,
      preserveTree: true,
      mode: 'COPY',
      stream: { kind: 'index', index: 0 },
      loudnorm: false,
      useGpu: false,
      workers: defaultWorkerCount(),
    });
  });

  it('keeps explicit values', () => {
    const config = parseJobConfiguration({
      inputRoot: '/in',
      outputRoot: '/out',
      recursive: true,
      preserveTree: false,
      mode: 'AAC',
      stream: { kind: 'index', index: 2 },
      loudnorm: true,
      sampleRate: 48000,
      bitrate: 256,
      useGpu: true,
      workers: 3,
      timeoutMs: 0,
    });

    expect(config).toMatchObject({
      recursive: true,
      preserveTree: false,
      mode: 'AAC',
      stream: { kind: 'index', index: 2 },
      sampleRate: 48000,
      bitrate: 256,
      workers: 3,
      timeoutMs: 0,
    });
  });

  it('normalizes language tags', () => {
    const config = parseJobConfiguration({
      inputRoot: '/in',
      outputRoot: '/out',
      stream: { kind: 'language', language: ' ENG ' },
    });

    expect(config.stream).toEqual({ kind: 'language', language: 'eng' });
  });

  it('returns a frozen configuration', () => {
    const config = parseJobConfiguration({ inputRoot: '/in', outputRoot: '/out' });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.stream)).toBe(true);
  });

  it.each<[Record<string, unknown>, string]>([
    [{ workers: 0 }, 'workers'],
    [{ bitrate: -128 }, 'bitrate'],
    [{ sampleRate: 44.1 }, 'sampleRate'],
    [{ mode: 'FLAC' }, 'mode'],
    [{ stream: { kind: 'index', index: -1 } }, 'stream.index'],
    [{ stream: { kind: 'language', language: 'en' } }, 'stream.language'],
    [{ timeoutMs: -1 }, 'timeoutMs'],
    [{ inputRoot: '' }, 'inputRoot'],
  ])('rejects %o on %s', (override, field) => {
    const attempt = () => parseJobConfiguration({ inputRoot: '/in', outputRoot: '/out', ...override });

    expect(attempt).toThrow(ValidationError);
    expect(attempt).toThrow(`Validation failed for ${field}:`);
  });

  it('reports the language rule', () => {
    expect(() =>
      parseJobConfiguration({
        inputRoot: '/in',
        outputRoot: '/out',
        stream: { kind: 'language', language: 'english' },
      })
    ).toThrow('Validation failed for stream.language: must be a three-letter ISO 639-2 code');
  });

  it('names the whole job when the input is not an object', () => {
    expect(() => parseJobConfiguration(null)).toThrow(/^Validation failed for job: /);
  });
});

describe('toStreamSpecifier', () => {
  it('renders index and language selectors', () => {
    expect(toStreamSpecifier({ kind: 'index', index: 0 })).toBe('a:0');
    expect(toStreamSpecifier({ kind: 'language', language: 'ger' })).toBe('a:m:language:ger');
  });
});

describe('defaultWorkerCount', () => {
  it('is at least 2', () => {
    expect(defaultWorkerCount()).toBeGreaterThanOrEqual(2);
  });
});
