import { describe, expect, it } from "vitest";
import {
  indelRatio,
  lcsLength,
  partialRatio,
  similarityScore,
  tokenSetRatio,
} from "../src/utils/similarity.js";

describe("similarityScore", () => {
  it("scores reordered titles as near duplicates", () => {
    expect(similarityScore("Dragons and magic swords", "Magic swords and dragons")).toBeGreaterThanOrEqual(0.8);
  });

  it("ignores case", () => {
    expect(similarityScore("DRAGON fire", "dragon FIRE")).toBe(1);
  });

  it("handles empty strings", () => {
    expect(similarityScore("", "")).toBe(1);
    expect(similarityScore("", "dragon")).toBe(0);
    expect(similarityScore("dragon", "")).toBe(0);
  });

  it("scores identical texts as 1, including whitespace-only ones", () => {
    expect(similarityScore(" ", " ")).toBe(1);
    expect(similarityScore("\n", "\n")).toBe(1);
    expect(similarityScore("A cursed crown wakes", "A cursed crown wakes")).toBe(1);
  });

  it("is symmetric and stays within [0, 1]", () => {
    const longText =
      "A disgraced knight guards the last dragon egg while the kingdom hunts them both through the frozen north.";
    const pairs: Array<[string, string]> = [
      ["night market", "the night market of lost names"],
      ["siren", "lighthouse keeper"],
      [longText, `${longText} Then spring arrives early and changes everything.`],
      ["glass forest", "forest of glass"],
    ];

    for (const [a, b] of pairs) {
      const forward = similarityScore(a, b);
      expect(forward).toBe(similarityScore(b, a));
      expect(forward).toBeGreaterThanOrEqual(0);
      expect(forward).toBeLessThanOrEqual(1);
    }
  });
});

describe("tokenSetRatio", () => {
  it("scores a contained token set as a full match", () => {
    expect(tokenSetRatio("the red fox", "the red fox jumps")).toBe(1);
  });

  it("compares disjoint token sets character-wise", () => {
    expect(tokenSetRatio("a b", "c d")).toBeCloseTo(1 / 3, 10);
  });

  it("returns 0 when one side has no tokens", () => {
    expect(tokenSetRatio("   ", "a")).toBe(0);
  });
});

describe("partialRatio", () => {
  it("finds the shorter text inside the longer one", () => {
    expect(partialRatio("abc", "xxabcxx")).toBe(1);
    expect(partialRatio("fox", "the red fox")).toBe(1);
  });

  it("handles empty strings", () => {
    expect(partialRatio("", "")).toBe(1);
    expect(partialRatio("", "abc")).toBe(0);
  });

  it("aligns long needles on matching blocks", () => {
    const needle = "a".repeat(40) + "b".repeat(40);

    expect(partialRatio(needle, `zzzz${needle}zzzz`)).toBe(1);
  });

  it("scores a long needle contained verbatim after a near copy as 1", () => {
    const needle = "abba".repeat(18);
    const nearCopy = "abab".repeat(18);

    expect(needle.length).toBeGreaterThan(64);
    expect(partialRatio(needle, `${nearCopy}b${needle}a${nearCopy}`)).toBe(1);
  });
});

describe("indelRatio", () => {
  it("normalizes the longest common subsequence", () => {
    expect(indelRatio("abc", "abd")).toBeCloseTo(2 / 3, 10);
    expect(indelRatio("", "")).toBe(1);
    expect(lcsLength("ABCBDAB", "BDCABA")).toBe(4);
    expect(lcsLength("", "abc")).toBe(0);
  });
});
