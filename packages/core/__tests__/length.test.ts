import { describe, expect, it } from "vitest";
import { formatLength, parseLength } from "../src/parser/length.js";

describe("parseLength", () => {
  it("treats bare numbers as millimeters", () => {
    expect(parseLength(12)).toBe(12);
    expect(parseLength("12")).toBe(12);
    expect(parseLength("12mm")).toBe(12);
  });

  it("converts other units", () => {
    expect(parseLength("1.5cm")).toBe(15);
    expect(parseLength("1in")).toBe(25.4);
    expect(parseLength("72pt")).toBeCloseTo(25.4, 9);
    expect(parseLength("-.5 CM")).toBe(-5);
  });

  it("rejects malformed strings", () => {
    expect(() => parseLength("")).toThrow("Empty length string");
    expect(() => parseLength("3ft")).toThrow('Invalid length string: "3ft"');
  });

  it("formats millimeters", () => {
    expect(formatLength(25.4)).toBe("25.4mm");
    expect(formatLength(1 / 3)).toBe("0.333mm");
  });
});
