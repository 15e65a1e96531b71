import { describe, it, expect } from "vitest";
import { BoundingBox } from "./boundingBox";

describe("BoundingBox", () => {
  const box = new BoundingBox(5, 6, 45, 46);

  it("exposes size and center", () => {
    expect(box.width).toBe(1);
    expect(box.height).toBe(1);
    expect(box.center).toEqual({ lon: 5.5, lat: 45.5 });
  });

  it("is frozen", () => {
    expect(Object.isFrozen(box)).toBe(true);
  });

  it("compares by value", () => {
    expect(box.equals(new BoundingBox(5, 6, 45, 46))).toBe(true);
    expect(box.equals(new BoundingBox(5, 6, 45, 47))).toBe(false);
    expect(box.equals(undefined)).toBe(false);
  });

  it("intersects overlapping boxes only", () => {
    expect(box.intersects(new BoundingBox(5.5, 7, 45.5, 47))).toBe(true);
    expect(box.intersects(new BoundingBox(5.2, 5.8, 45.2, 45.8))).toBe(true);
    // shared edge
    expect(box.intersects(new BoundingBox(6, 7, 45, 46))).toBe(false);
    expect(box.intersects(new BoundingBox(7, 8, 45, 46))).toBe(false);
  });

  it("contains points on its edges", () => {
    expect(box.containsPoint(5, 45)).toBe(true);
    expect(box.containsPoint(5.5, 45.5)).toBe(true);
    expect(box.containsPoint(6.5, 45.5)).toBe(false);
  });

  it("formats for logs and JSON", () => {
    expect(box.toString()).toBe("Xmin: 5, Xmax: 6, Ymin: 45, Ymax: 46");
    expect(JSON.stringify(box)).toBe('{"xMin":5,"xMax":6,"yMin":45,"yMax":46}');
  });
});
