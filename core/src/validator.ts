/**
 * Validators run on submission, in insertion order, stopping at the first
 * answer that is not valid.
 *
 * An invalid result keeps the prompt open and shows its message (or the
 * render config's default message when none is given). A validator that
 * throws aborts the prompt with CustomUserError.
 */

import { CustomUserError } from "./errors.js";
import { graphemeCount } from "./utils/graphemes.js";

export type Validation = { kind: "valid" } | { kind: "invalid"; message: string | null };

export type InvalidResult = Extract<Validation, { kind: "invalid" }>;

export const valid = (): Validation => ({ kind: "valid" });
export const invalid = (message: string | null = null): InvalidResult => ({
  kind: "invalid",
  message,
});

export type Validator<T> = (value: T) => Validation | Promise<Validation>;

export async function runValidators<T>(
  validators: readonly Validator<T>[],
  value: T,
): Promise<Validation> {
  for (const validator of validators) {
    let result: Validation;
    try {
      result = await validator(value);
    } catch (err) {
      throw new CustomUserError(err);
    }
    if (result.kind === "invalid") return result;
  }
  return valid();
}

// --- Built-in validators ------------------------------------------------------

type Measurable = string | readonly unknown[];

function lengthOf(value: Measurable): number {
  return typeof value === "string" ? graphemeCount(value) : value.length;
}

/** Rejects empty strings and empty lists. */
export function required<T extends Measurable>(message = "A response is required."): Validator<T> {
  return (value) => (lengthOf(value) === 0 ? invalid(message) : valid());
}

export function maxLength<T extends Measurable>(limit: number, message?: string): Validator<T> {
  const text = message ?? `The length of the response should be at most ${limit}`;
  return (value) => (lengthOf(value) > limit ? invalid(text) : valid());
}

export function minLength<T extends Measurable>(limit: number, message?: string): Validator<T> {
  const text = message ?? `The length of the response should be at least ${limit}`;
  return (value) => (lengthOf(value) < limit ? invalid(text) : valid());
}

export function exactLength<T extends Measurable>(length: number, message?: string): Validator<T> {
  const text = message ?? `The length of the response should be ${length}`;
  return (value) => (lengthOf(value) !== length ? invalid(text) : valid());
}
