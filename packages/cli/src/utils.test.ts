import { parseConfig } from '@wdkeeper/core';
import { InvalidArgumentError } from 'commander';
import { describe, expect, it } from 'vitest';
import { generateDefaultConfig, parseTimeout } from './utils.js';

describe('generateDefaultConfig', () => {
  it('should produce a configuration that validates to the defaults', () => {
    const text = generateDefaultConfig();
    const config = parseConfig(JSON.parse(text));

    expect(text.endsWith('}\n')).toBe(true);
    expect(config).toEqual(parseConfig({}));
  });
});

describe('parseTimeout', () => {
  it('should accept positive integers', () => {
    expect(parseTimeout('30000')).toBe(30000);
  });

  it.each(['0', '-5', '1.5', 'soon', '600001'])('should reject %s', (value) => {
    expect(() => parseTimeout(value)).toThrow(InvalidArgumentError);
  });
});
