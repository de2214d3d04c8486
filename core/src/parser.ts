/**
 * Parsers used by the custom-type prompt. A failed parse keeps the prompt
 * open and shows the prompt's error message.
 */

export type ParseResult<T> = { ok: true; value: T } | { ok: false };

export type Parser<T> = (text: string) => ParseResult<T>;

const ok = <T>(value: T): ParseResult<T> => ({ ok: true, value });
const failed = <T>(): ParseResult<T> => ({ ok: false });

/** Accepts y, yes, n and no in any case. */
export const boolParser: Parser<boolean> = (text) => {
  switch (text.toLowerCase()) {
    case "y":
    case "yes":
      return ok(true);
    case "n":
    case "no":
      return ok(false);
    default:
      return failed();
  }
};

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const INTEGER_PATTERN = /^[+-]?\d+$/;

export const numberParser: Parser<number> = (text) => {
  const trimmed = text.trim();
  if (!NUMBER_PATTERN.test(trimmed)) return failed();
  return ok(Number(trimmed));
};

export const integerParser: Parser<number> = (text) => {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return failed();
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? ok(value) : failed();
};
