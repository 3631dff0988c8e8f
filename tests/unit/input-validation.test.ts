import { describe, expect, it } from 'vitest';
import { TagSchema, ValidationError } from '@zettl/core';
import { escapeLikePattern, parseInput } from '../../core/src/utils/input-validation.js';

describe('escapeLikePattern', () => {
  it('should escape LIKE wildcards and the escape character', () => {
    expect(escapeLikePattern('100%_\\')).toBe('100\\%\\_\\\\');
  });

  it('should leave plain text alone', () => {
    expect(escapeLikePattern('garden notes')).toBe('garden notes');
  });
});

describe('parseInput', () => {
  it('should return the parsed value', () => {
    expect(parseInput(TagSchema, ' Project ')).toBe('project');
  });

  it('should raise ValidationError for invalid input', () => {
    expect(() => parseInput(TagSchema, '   ')).toThrow(ValidationError);
  });
});
