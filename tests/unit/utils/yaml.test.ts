/**
 * Tests for YAML parsing utilities.
 */
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, formatZodError } from '../../../src/utils/yaml.js';
import { SystemError, ErrorCodes } from '../../../src/utils/errors.js';

const Schema = z.object({
  name: z.string(),
  count: z.number().default(1),
});

describe('parseYaml', () => {
  it('should parse mappings', () => {
    expect(parseYaml('a: 1\nb: [x, y]\n')).toEqual({ a: 1, b: ['x', 'y'] });
  });

  it('should throw a parse error for malformed YAML', () => {
    let caught: unknown;
    try {
      parseYaml('a: [1, 2');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SystemError);
    expect(caught).toMatchObject({ code: ErrorCodes.PARSE_ERROR });
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('name: test\n', Schema)).toEqual({ name: 'test', count: 1 });
  });

  it('should report the failing path', () => {
    expect(() => parseYamlWithSchema('name: 5\n', Schema)).toThrow(/YAML validation failed: name:/);
  });
});

describe('formatZodError', () => {
  it('should join issues with their paths', () => {
    const result = Schema.safeParse({ name: 1, count: 'x' });
    if (result.success) {
      expect.fail('should not parse');
      return;
    }
    const message = formatZodError(result.error);
    expect(message.split('; ')).toHaveLength(2);
    expect(message).toMatch(/^name: /);
  });
});
