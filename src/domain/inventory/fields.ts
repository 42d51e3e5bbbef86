import { z } from 'zod';
import type { ShoeAttributes, ShoeField } from './shoe.js';

/**
 * Outcome of checking one line of user input.
 * `retry` carries the message to show before asking again.
 */
export type InputResult<T> =
  | { kind: 'valid'; value: T }
  | { kind: 'retry'; reason: string };

export type InputParser<T> = (raw: string) => InputResult<T>;

export interface NumberRange {
  min: number;
  max: number;
}

export const TEXT_MAX_LENGTH = 100;
export const CONDITION_MAX_LENGTH = 50;
export const USERNAME_MAX_LENGTH = 50;
export const EMAIL_MAX_LENGTH = 255;
export const SIZE_RANGE: NumberRange = { min: 1, max: 20 };
export const PRICE_RANGE: NumberRange = { min: 0.01, max: 100000 };

export function valid<T>(value: T): InputResult<T> {
  return { kind: 'valid', value };
}

export function retry<T>(reason: string): InputResult<T> {
  return { kind: 'retry', reason };
}

function fromSchema<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): InputResult<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return valid(result.data);
  }
  return retry(result.error.issues[0]?.message ?? 'Error: Invalid input. Please try again.');
}

function textSchema(maxLength: number) {
  return z
    .string()
    .trim()
    .min(1, 'Error: Input cannot be empty. Please try again.')
    .max(maxLength, `Error: Input must be at most ${maxLength} character(s). Please try again.`);
}

export function parseText(maxLength: number): InputParser<string> {
  const schema = textSchema(maxLength);
  return (raw) => fromSchema(schema, raw);
}

// Plain decimal notation only; Number() would also take 0x10, 0b101 and Infinity.
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseNumber(range: NumberRange): InputParser<number> {
  const schema = z
    .number()
    .min(range.min, `Error: Value must be at least ${range.min}. Please try again.`)
    .max(range.max, `Error: Value must be at most ${range.max}. Please try again.`);

  return (raw) => {
    const text = raw.trim();
    if (text === '') {
      return retry('Error: Input cannot be empty. Please enter a number.');
    }
    const value = DECIMAL.test(text) ? Number(text) : NaN;
    if (!Number.isFinite(value)) {
      return retry(`Error: '${text}' is not a valid number. Please try again.`);
    }
    return fromSchema(schema, value);
  };
}

/**
 * Image is optional: blank input is accepted as '' and stored as no image.
 */
export const parseImage: InputParser<string> = (raw) => valid(raw.trim());

export function isEmailFormat(email: string): boolean {
  const at = email.lastIndexOf('@');
  if (at === -1) {
    return false;
  }
  const local = email.slice(0, at);
  const domain = email.slice(at + 1);
  return local.length > 0 && domain.includes('.');
}

const emailSchema = z
  .string()
  .trim()
  .min(1, 'Error: Email cannot be empty. Please try again.')
  .max(EMAIL_MAX_LENGTH, `Error: Email must be at most ${EMAIL_MAX_LENGTH} character(s). Please try again.`)
  .refine(isEmailFormat, 'Error: Invalid email format. Please enter a valid email address.');

export const parseEmail: InputParser<string> = (raw) => fromSchema(emailSchema, raw);

export const parseUsername: InputParser<string> = parseText(USERNAME_MAX_LENGTH);

export const parsePassword: InputParser<string> = (raw) =>
  raw.length === 0 ? retry('Error: Password cannot be empty. Please try again.') : valid(raw);

export type ShoeFieldParsers = { [F in ShoeField]: InputParser<ShoeAttributes[F]> };

export const shoeFieldParsers: ShoeFieldParsers = {
  brand: parseText(TEXT_MAX_LENGTH),
  model: parseText(TEXT_MAX_LENGTH),
  colorway: parseText(TEXT_MAX_LENGTH),
  size: parseNumber(SIZE_RANGE),
  price: parseNumber(PRICE_RANGE),
  image: parseImage,
  condition: parseText(CONDITION_MAX_LENGTH),
};
