import { describe, it, expect } from 'vitest';
import {
  PRICE_RANGE,
  SIZE_RANGE,
  isEmailFormat,
  parseEmail,
  parseImage,
  parseNumber,
  parsePassword,
  parseText,
  shoeFieldParsers,
} from '../fields.js';

describe('parseText', () => {
  const parse = parseText(100);

  it('should trim and accept non-empty text', () => {
    expect(parse('  Nike  ')).toEqual({ kind: 'valid', value: 'Nike' });
  });

  it('should reject empty and blank input', () => {
    const expected = { kind: 'retry', reason: 'Error: Input cannot be empty. Please try again.' };
    expect(parse('')).toEqual(expected);
    expect(parse('   ')).toEqual(expected);
  });

  it('should reject text over the maximum length', () => {
    expect(parse('a'.repeat(101))).toEqual({
      kind: 'retry',
      reason: 'Error: Input must be at most 100 character(s). Please try again.',
    });
    expect(parse('a'.repeat(100))).toEqual({ kind: 'valid', value: 'a'.repeat(100) });
  });

  it('should cap condition at 50 characters', () => {
    expect(shoeFieldParsers.condition('x'.repeat(51))).toEqual({
      kind: 'retry',
      reason: 'Error: Input must be at most 50 character(s). Please try again.',
    });
  });
});

describe('parseNumber', () => {
  const parseSize = parseNumber(SIZE_RANGE);
  const parsePrice = parseNumber(PRICE_RANGE);

  it('should accept fractional values in range', () => {
    expect(parseSize('9.5')).toEqual({ kind: 'valid', value: 9.5 });
    expect(parseSize(' 20 ')).toEqual({ kind: 'valid', value: 20 });
    expect(parsePrice('0.01')).toEqual({ kind: 'valid', value: 0.01 });
  });

  it('should reject empty input', () => {
    expect(parseSize('')).toEqual({
      kind: 'retry',
      reason: 'Error: Input cannot be empty. Please enter a number.',
    });
  });

  it('should reject text that is not a number', () => {
    expect(parseSize('abc')).toEqual({
      kind: 'retry',
      reason: "Error: 'abc' is not a valid number. Please try again.",
    });
  });

  it.each(['0x10', '0b101', '0o7', 'Infinity', '1_0', '9.5.1'])('should reject non-decimal %j', (text) => {
    expect(parseSize(text)).toEqual({
      kind: 'retry',
      reason: `Error: '${text}' is not a valid number. Please try again.`,
    });
  });

  it('should accept signs, leading dots and exponents', () => {
    expect(parseSize('+10')).toEqual({ kind: 'valid', value: 10 });
    expect(parsePrice('.5')).toEqual({ kind: 'valid', value: 0.5 });
    expect(parsePrice('1e3')).toEqual({ kind: 'valid', value: 1000 });
  });

  it('should enforce the range bounds', () => {
    expect(parseSize('0.5')).toEqual({
      kind: 'retry',
      reason: 'Error: Value must be at least 1. Please try again.',
    });
    expect(parseSize('21')).toEqual({
      kind: 'retry',
      reason: 'Error: Value must be at most 20. Please try again.',
    });
    expect(parsePrice('0')).toEqual({
      kind: 'retry',
      reason: 'Error: Value must be at least 0.01. Please try again.',
    });
  });
});

describe('parseImage', () => {
  it('should accept blank input as no image', () => {
    expect(parseImage('   ')).toEqual({ kind: 'valid', value: '' });
  });

  it('should trim a filename', () => {
    expect(parseImage(' bacon.jpg ')).toEqual({ kind: 'valid', value: 'bacon.jpg' });
  });
});

describe('email validation', () => {
  it('should accept a well-formed address', () => {
    expect(isEmailFormat('user@example.com')).toBe(true);
    expect(parseEmail(' user@example.com ')).toEqual({ kind: 'valid', value: 'user@example.com' });
  });

  it('should reject addresses without a local part or dotted domain', () => {
    expect(isEmailFormat('userexample.com')).toBe(false);
    expect(isEmailFormat('@example.com')).toBe(false);
    expect(isEmailFormat('user@localhost')).toBe(false);
  });

  it('should explain why an address was rejected', () => {
    expect(parseEmail('')).toEqual({
      kind: 'retry',
      reason: 'Error: Email cannot be empty. Please try again.',
    });
    expect(parseEmail('user@localhost')).toEqual({
      kind: 'retry',
      reason: 'Error: Invalid email format. Please enter a valid email address.',
    });
  });
});

describe('parsePassword', () => {
  it('should reject an empty password and keep spaces otherwise', () => {
    expect(parsePassword('')).toEqual({
      kind: 'retry',
      reason: 'Error: Password cannot be empty. Please try again.',
    });
    expect(parsePassword(' pass ')).toEqual({ kind: 'valid', value: ' pass ' });
  });
});
