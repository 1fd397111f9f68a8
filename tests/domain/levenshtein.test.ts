import { describe, expect, it } from "vitest";
import {
  levenshteinDistance,
  normalizedLevenshteinDistance,
  symbolLength,
} from "../../src/domain/services/levenshtein";

const SAMPLE_PAIRS: [string, string][] = [
  ["tan", "ston"],
  ["yog", "y3i"],
  ["vatEn", "vOn"],
  ["wat3r", "wot3r"],
  ["fiS", "fisk"],
  ["", "mano"],
];

describe("levenshteinDistance", () => {
  it("returns 0 for identical forms", () => {
    for (const form of ["", "sten", "wat3r", 'k"a']) {
      expect(levenshteinDistance(form, form)).toBe(0);
    }
  });

  it("counts insertions from the empty string", () => {
    expect(levenshteinDistance("", "")).toBe(0);
    expect(levenshteinDistance("", "abc")).toBe(3);
    expect(levenshteinDistance("abc", "")).toBe(3);
  });

  it("treats missing input as the empty string", () => {
    expect(levenshteinDistance(null, "abc")).toBe(3);
    expect(levenshteinDistance("ab", undefined)).toBe(2);
    expect(levenshteinDistance(null, null)).toBe(0);
  });

  it("weights substitutions between vowels", () => {
    expect(levenshteinDistance("a", "e")).toBe(1);
    expect(levenshteinDistance("a", "e", 0.5)).toBe(0.5);
    expect(levenshteinDistance("3", "E", 0.25)).toBe(0.25);
    expect(levenshteinDistance("ston", "sten", 0.5)).toBe(0.5);
  });

  it("does not weight substitutions involving a consonant", () => {
    expect(levenshteinDistance("a", "t", 0.5)).toBe(1);
    expect(levenshteinDistance("O", "o", 0.5)).toBe(1);
  });

  it("prefers an insertion and deletion over a costly vowel substitution", () => {
    expect(levenshteinDistance("a", "e", 5)).toBe(2);
  });

  it("accepts a negative vowel weight as-is", () => {
    expect(levenshteinDistance("a", "e", -1)).toBe(-1);
  });

  it("aligns tan with ston through the table", () => {
    // insert s, keep t, a -> o, keep n
    expect(levenshteinDistance("tan", "ston")).toBe(2);
  });

  it("is symmetric", () => {
    for (const [a, b] of SAMPLE_PAIRS) {
      expect(levenshteinDistance(a, b)).toBe(levenshteinDistance(b, a));
      expect(levenshteinDistance(a, b, 0.3)).toBe(levenshteinDistance(b, a, 0.3));
    }
  });

  it("stays within the longer length", () => {
    for (const [a, b] of SAMPLE_PAIRS) {
      const distance = levenshteinDistance(a, b, 0.5);
      expect(distance).toBeGreaterThanOrEqual(0);
      expect(distance).toBeLessThanOrEqual(Math.max(a.length, b.length));
    }
  });

  it("stays within the longer length scaled by a heavy vowel weight", () => {
    expect(levenshteinDistance("a", "e", 1.5)).toBe(1.5);
    for (const [a, b] of SAMPLE_PAIRS) {
      const distance = levenshteinDistance(a, b, 1.5);
      expect(distance).toBeGreaterThanOrEqual(0);
      expect(distance).toBeLessThanOrEqual(Math.max(a.length, b.length) * 1.5);
    }
  });

  it("compares whole code points", () => {
    expect(levenshteinDistance("a\u{1F600}", "a\u{1F601}")).toBe(1);
  });
});

describe("normalizedLevenshteinDistance", () => {
  it("divides by the longer form", () => {
    expect(normalizedLevenshteinDistance("tan", "ston")).toBe(0.5);
    expect(normalizedLevenshteinDistance("fiS", "fisk")).toBe(0.5);
  });

  it("is 0 for two empty forms", () => {
    expect(normalizedLevenshteinDistance("", "")).toBe(0);
  });
});

describe("symbolLength", () => {
  it("counts code points", () => {
    expect(symbolLength("\u{1F600}x")).toBe(2);
    expect(symbolLength(undefined)).toBe(0);
  });
});
