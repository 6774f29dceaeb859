import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PassThrough } from 'node:stream';
import { createInterface } from 'node:readline';
import { LineReader, parseOriginChoice } from './prompts.js';

describe('LineReader', () => {
  let input: PassThrough;
  let output: PassThrough;
  let reader: LineReader;

  beforeEach(() => {
    input = new PassThrough();
    output = new PassThrough();
    reader = new LineReader(createInterface({ input, output, terminal: false }));
  });

  afterEach(() => {
    reader.close();
  });

  it('should resolve a prompt with the next line', async () => {
    const answer = reader.prompt('> ');
    input.write('hello\n');

    expect(await answer).toBe('hello');
  });

  it('should hand out lines that arrived before the prompt in order', async () => {
    input.write('first\nsecond\n');
    await new Promise((resolve) => setImmediate(resolve));

    expect(await reader.prompt('> ')).toBe('first');
    expect(await reader.prompt('> ')).toBe('second');
  });

  it('should resolve with null once input ends', async () => {
    const answer = reader.prompt('> ');
    input.end();

    expect(await answer).toBeNull();
    expect(reader.isClosed).toBe(true);
    expect(await reader.prompt('> ')).toBeNull();
  });
});

describe('parseOriginChoice', () => {
  const origins = ['files', 'notes'];

  it('should accept a 1-based index', () => {
    expect(parseOriginChoice('2', origins)).toBe('notes');
  });

  it('should accept an origin name', () => {
    expect(parseOriginChoice(' notes ', origins)).toBe('notes');
  });

  it('should fall back to the first origin', () => {
    expect(parseOriginChoice('', origins)).toBe('files');
    expect(parseOriginChoice(null, origins)).toBe('files');
    expect(parseOriginChoice('7', origins)).toBe('files');
    expect(parseOriginChoice('archive', origins)).toBe('files');
  });

  it('should only take plain decimal digits as an index', () => {
    expect(parseOriginChoice('0x2', origins)).toBe('files');
    expect(parseOriginChoice('2e0', origins)).toBe('files');
    expect(parseOriginChoice('+2', origins)).toBe('files');
    expect(parseOriginChoice('2.0', origins)).toBe('files');
  });
});
