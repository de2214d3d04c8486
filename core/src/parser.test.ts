import { describe, expect, it } from "vitest";
import { boolParser, integerParser, numberParser } from "./parser.js";

describe("boolParser", () => {
  it("accepts y, yes, n and no in any case", () => {
    expect(boolParser("Y")).toEqual({ ok: true, value: true });
    expect(boolParser("yes")).toEqual({ ok: true, value: true });
    expect(boolParser("N")).toEqual({ ok: true, value: false });
    expect(boolParser("NO")).toEqual({ ok: true, value: false });
  });

  it("rejects anything else", () => {
    expect(boolParser("yep")).toEqual({ ok: false });
    expect(boolParser("")).toEqual({ ok: false });
  });
});

describe("numberParser", () => {
  it("parses decimals and exponents", () => {
    expect(numberParser("1.5")).toEqual({ ok: true, value: 1.5 });
    expect(numberParser(".5")).toEqual({ ok: true, value: 0.5 });
    expect(numberParser("-2e3")).toEqual({ ok: true, value: -2000 });
    expect(numberParser(" 7 ")).toEqual({ ok: true, value: 7 });
  });

  it("rejects text that is not a plain number", () => {
    expect(numberParser("abc")).toEqual({ ok: false });
    expect(numberParser("")).toEqual({ ok: false });
    expect(numberParser("0x10")).toEqual({ ok: false });
    expect(numberParser("Infinity")).toEqual({ ok: false });
  });
});

describe("integerParser", () => {
  it("parses signed integers", () => {
    expect(integerParser("-3")).toEqual({ ok: true, value: -3 });
    expect(integerParser("+42")).toEqual({ ok: true, value: 42 });
  });

  it("rejects fractions and unsafe integers", () => {
    expect(integerParser("1.0")).toEqual({ ok: false });
    expect(integerParser("9007199254740993")).toEqual({ ok: false });
  });
});
