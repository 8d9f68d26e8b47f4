import { describe, it, expect } from 'vitest';
import { isValidScore, validateGradebookData } from '../src/lib/validation';

describe('isValidScore', () => {
  it('accepts finite numbers only', () => {
    expect(isValidScore(0)).toBe(true);
    expect(isValidScore(-3.5)).toBe(true);
    expect(isValidScore(NaN)).toBe(false);
    expect(isValidScore(Infinity)).toBe(false);
    expect(isValidScore('90')).toBe(false);
    expect(isValidScore(null)).toBe(false);
  });
});

describe('validateGradebookData', () => {
  it('accepts a mapping of mappings of numbers', () => {
    const input = { Alice: { Math: 92, Science: 85 }, Bob: {} };
    const result = validateGradebookData(input);

    expect(result).toEqual({ valid: true, data: input });
  });

  it('returns a detached copy', () => {
    const input = { Alice: { Math: 92 } };
    const result = validateGradebookData(input);
    input.Alice.Math = 10;

    expect(result.valid && result.data.Alice.Math).toBe(92);
  });

  it('rejects a top-level array', () => {
    expect(validateGradebookData([{ Alice: {} }])).toEqual({
      valid: false,
      error: 'expected an object at the top level, got an array',
    });
  });

  it('rejects null and primitives at the top level', () => {
    expect(validateGradebookData(null)).toEqual({
      valid: false,
      error: 'expected an object at the top level, got null',
    });
    expect(validateGradebookData(42)).toEqual({
      valid: false,
      error: 'expected an object at the top level, got number',
    });
  });

  it('rejects a student that is not an object', () => {
    expect(validateGradebookData({ Alice: [92] })).toEqual({
      valid: false,
      error: "student 'Alice' should map to an object, got an array",
    });
  });

  it('rejects a non-numeric score', () => {
    expect(validateGradebookData({ Alice: { Math: '92' } })).toEqual({
      valid: false,
      error: "score for 'Alice' / 'Math' is not a number",
    });
  });

  it('rejects empty or whitespace-only student names', () => {
    expect(validateGradebookData({ '': {} })).toEqual({
      valid: false,
      error: 'student name cannot be empty',
    });
    expect(validateGradebookData({ Alice: {}, '  ': {} })).toEqual({
      valid: false,
      error: 'student name cannot be empty',
    });
  });

  it('rejects empty or whitespace-only subject names', () => {
    expect(validateGradebookData({ Alice: { ' ': 50 } })).toEqual({
      valid: false,
      error: "student 'Alice' has an empty subject name",
    });
  });

  it('keeps a "__proto__" student as plain data', () => {
    const parsed: unknown = JSON.parse('{"__proto__": {"Math": 50}}');
    const result = validateGradebookData(parsed);

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(Object.keys(result.data)).toEqual(['__proto__']);
      expect(Object.getPrototypeOf(result.data)).toBe(Object.prototype);
    }
  });
});
