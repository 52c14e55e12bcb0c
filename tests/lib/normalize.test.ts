import { describe, expect, it } from "vitest";

import { normalizeEntityName } from "@/lib/normalize";

describe("normalizeEntityName", () => {
  it("lowercases and drops bracketed qualifiers", () => {
    expect(normalizeEntityName("Widget A (export)")).toBe("widget a");
    expect(normalizeEntityName("酱油（500ml）")).toBe("酱油");
  });

  it("drops every bracketed span", () => {
    expect(normalizeEntityName("Rice (long) grain (5 bags)")).toBe("rice grain");
  });

  it("removes standalone unit tokens only", () => {
    expect(normalizeEntityName("大米 5 kg")).toBe("大米 5");
    expect(normalizeEntityName("苹果 箱")).toBe("苹果");
    expect(normalizeEntityName("Rice 5kg")).toBe("rice 5kg");
    expect(normalizeEntityName("Egg")).toBe("egg");
  });

  it("replaces punctuation with spaces and collapses whitespace", () => {
    expect(normalizeEntityName("  Rice,  Premium! ")).toBe("rice premium");
    expect(normalizeEntityName("5-kg Flour")).toBe("5 flour");
  });

  it("returns an empty key for empty or fully stripped names", () => {
    expect(normalizeEntityName("")).toBe("");
    expect(normalizeEntityName(null)).toBe("");
    expect(normalizeEntityName("   ")).toBe("");
    expect(normalizeEntityName("(sample)")).toBe("");
    expect(normalizeEntityName("kg")).toBe("");
  });

  it("is a fixed point", () => {
    const samples = [
      "Widget A (export)",
      "a (b (c) d) e",
      "x ) (y",
      "kg (big)",
      "Olive Oil 1 L (glass) 箱",
      "  Rice,  Premium! ",
      "（特级）花生油 5 公斤",
    ];
    for (const sample of samples) {
      const once = normalizeEntityName(sample);
      expect(normalizeEntityName(once)).toBe(once);
    }
  });
});
