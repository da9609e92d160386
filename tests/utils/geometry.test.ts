import { describe, it, expect } from "vitest";
import {
  intersectRects,
  intersectionArea,
  clampToCanvas,
  oobEdges,
  isInBounds,
  edgeDistances,
  rectGap,
  rectArea,
  rectsEqual,
  denormalize,
} from "../../src/utils/geometry.js";

const CANVAS = { w: 960, h: 540 };

describe("geometry utilities", () => {
  describe("intersectRects", () => {
    it("computes intersection of overlapping rects", () => {
      const inter = intersectRects(
        { x: 0, y: 0, w: 100, h: 100 },
        { x: 50, y: 50, w: 100, h: 100 }
      );
      expect(inter).toEqual({ x: 50, y: 50, w: 50, h: 50 });
    });

    it("returns null for non-overlapping rects", () => {
      const inter = intersectRects(
        { x: 0, y: 0, w: 50, h: 50 },
        { x: 100, y: 100, w: 50, h: 50 }
      );
      expect(inter).toBeNull();
    });

    it("returns null for edge-touching rects", () => {
      const inter = intersectRects(
        { x: 0, y: 0, w: 100, h: 100 },
        { x: 100, y: 0, w: 100, h: 100 }
      );
      expect(inter).toBeNull();
    });
  });

  describe("intersectionArea", () => {
    it("computes area of overlap", () => {
      const area = intersectionArea(
        { x: 0, y: 0, w: 100, h: 100 },
        { x: 50, y: 50, w: 100, h: 100 }
      );
      expect(area).toBe(2500);
    });

    it("returns 0 for disjoint rects", () => {
      expect(intersectionArea({ x: 0, y: 0, w: 10, h: 10 }, { x: 20, y: 20, w: 10, h: 10 })).toBe(0);
    });
  });

  describe("clampToCanvas", () => {
    it("moves a box back inside without resizing", () => {
      expect(clampToCanvas({ x: 900, y: -10, w: 100, h: 50 }, CANVAS)).toEqual({ x: 860, y: 0, w: 100, h: 50 });
    });

    it("shrinks a box wider than the canvas", () => {
      expect(clampToCanvas({ x: -20, y: 0, w: 1200, h: 50 }, CANVAS, 18)).toEqual({ x: 0, y: 0, w: 960, h: 50 });
    });

    it("never returns a box smaller than minSize", () => {
      expect(clampToCanvas({ x: 10, y: 10, w: 5, h: 5 }, CANVAS, 18)).toEqual({ x: 10, y: 10, w: 18, h: 18 });
    });
  });

  describe("oobEdges", () => {
    it("lists every edge past the canvas", () => {
      expect(oobEdges({ x: -10, y: 500, w: 100, h: 60 }, 0.5, CANVAS)).toEqual([
        { edge: "left", by_pt: 10 },
        { edge: "bottom", by_pt: 20 },
      ]);
    });

    it("ignores excess within tolerance", () => {
      expect(oobEdges({ x: -0.3, y: 0, w: 100, h: 60 }, 0.5, CANVAS)).toEqual([]);
    });
  });

  describe("isInBounds", () => {
    it("accepts a box flush with the canvas", () => {
      expect(isInBounds({ x: 0, y: 0, w: 960, h: 540 }, 0, CANVAS)).toBe(true);
    });

    it("rejects a box past the right edge", () => {
      expect(isInBounds({ x: 900, y: 0, w: 100, h: 10 }, 0, CANVAS)).toBe(false);
    });
  });

  describe("edgeDistances", () => {
    it("measures each edge to the canvas", () => {
      expect(edgeDistances({ x: 40, y: 30, w: 100, h: 100 }, CANVAS)).toEqual({
        left: 40,
        top: 30,
        right: 820,
        bottom: 410,
      });
    });
  });

  describe("rectGap", () => {
    const a = { x: 0, y: 0, w: 100, h: 100 };

    it("measures a horizontal gap", () => {
      expect(rectGap(a, { x: 110, y: 20, w: 100, h: 50 })).toBe(10);
    });

    it("measures a vertical gap", () => {
      expect(rectGap(a, { x: 0, y: 104, w: 100, h: 50 })).toBe(4);
    });

    it("returns null for diagonal rects", () => {
      expect(rectGap(a, { x: 200, y: 200, w: 10, h: 10 })).toBeNull();
    });

    it("returns null for intersecting rects", () => {
      expect(rectGap(a, { x: 50, y: 50, w: 100, h: 100 })).toBeNull();
    });
  });

  describe("rectArea and rectsEqual", () => {
    it("computes area", () => {
      expect(rectArea({ x: 0, y: 0, w: 200, h: 150 })).toBe(30000);
    });

    it("compares all four fields", () => {
      expect(rectsEqual({ x: 1, y: 2, w: 3, h: 4 }, { x: 1, y: 2, w: 3, h: 4 })).toBe(true);
      expect(rectsEqual({ x: 1, y: 2, w: 3, h: 4 }, { x: 1, y: 2, w: 3, h: 5 })).toBe(false);
    });
  });

  describe("denormalize", () => {
    it("scales to the canvas and rounds to 0.01pt", () => {
      expect(denormalize({ x: 0.05, y: 0.07, w: 0.9, h: 0.13 }, CANVAS)).toEqual({
        x: 48,
        y: 37.8,
        w: 864,
        h: 70.2,
      });
    });
  });
});
