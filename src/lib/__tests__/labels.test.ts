import { describe, it, expect } from "vitest";
import {
  ALL_LABELS,
  isLabel,
  isTrigFunction,
  isWatched,
  mapLabels,
  shouldFade,
  WATCHED_LABELS,
} from "../labels";

describe("labels", () => {
  it("has eight members", () => {
    expect(ALL_LABELS).toHaveLength(8);
  });

  it("watches exactly the labels that can fade", () => {
    expect(WATCHED_LABELS).toEqual(["sin", "cos", "sec", "theta", "unit"]);
    expect(isWatched("tan")).toBe(false);
    expect(isWatched("unit")).toBe(true);
  });

  it("encodes the fade-trigger table", () => {
    expect(shouldFade("sin", "tan")).toBe(true);
    expect(shouldFade("sin", "csc")).toBe(true);
    expect(shouldFade("cos", "sec")).toBe(true);
    expect(shouldFade("sec", "cot")).toBe(true);
    expect(shouldFade("theta", "sin")).toBe(true);
    expect(shouldFade("unit", "cos")).toBe(true);
    expect(shouldFade("unit", "sin")).toBe(true);
    expect(shouldFade("unit", "csc")).toBe(true);
  });

  it("is directional", () => {
    expect(shouldFade("tan", "sin")).toBe(false);
    expect(shouldFade("sin", "theta")).toBe(false);
    expect(shouldFade("sec", "cos")).toBe(false);
  });

  it("never fades a label against itself", () => {
    for (const label of ALL_LABELS) {
      expect(shouldFade(label, label)).toBe(false);
    }
  });

  it("narrows strings to labels", () => {
    expect(isLabel("theta")).toBe(true);
    expect(isLabel("arcsin")).toBe(false);
    expect(isTrigFunction("cot")).toBe(true);
    expect(isTrigFunction("unit")).toBe(false);
  });

  it("maps every label", () => {
    expect(Object.keys(mapLabels((label) => label.length))).toEqual([
      "sin", "cos", "tan", "cot", "sec", "csc", "theta", "unit",
    ]);
  });
});
