import { describe, it, expect } from "vitest";
import { colors, dimColor } from "../colors";

describe("colors", () => {
  it("gives each function its own hue", () => {
    expect(colors.trig.sin).toBe("#ff0000");
    expect(colors.trig.cos).toBe("#00ff00");
    expect(colors.trig.sec).toBe("#ff00ff");
    expect(new Set(Object.values(colors.trig)).size).toBe(6);
  });
});

describe("dimColor", () => {
  it("returns the color unchanged at amount 0", () => {
    expect(dimColor("#ff0000", 0)).toBe("#ff0000");
  });

  it("returns the background at amount 1", () => {
    expect(dimColor("#ff0000", 1)).toBe("#000000");
  });

  it("mixes toward a custom background", () => {
    expect(dimColor("#000000", 1, "#ffffff")).toBe("#ffffff");
  });
});
