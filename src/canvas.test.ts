import { describe, expect, it, vi } from "vitest";
import { getPixel, renderCanvas, sizeCanvas } from "./canvas";
import type { Color } from "./pixels";

describe("sizeCanvas", () => {
  it("rounds the square root for the width", () => {
    expect(sizeCanvas(1)).toEqual({ width: 1, height: 1 });
    expect(sizeCanvas(2)).toEqual({ width: 1, height: 2 });
    expect(sizeCanvas(3)).toEqual({ width: 2, height: 2 });
    expect(sizeCanvas(7)).toEqual({ width: 3, height: 3 });
    expect(sizeCanvas(16)).toEqual({ width: 4, height: 4 });
    expect(sizeCanvas(20)).toEqual({ width: 4, height: 5 });
  });

  it("always has room for every pixel", () => {
    for (let n = 1; n <= 500; n++) {
      const { width, height } = sizeCanvas(n);
      expect(width).toBe(Math.round(Math.sqrt(n)));
      expect(width * height).toBeGreaterThanOrEqual(n);
    }
  });

  it("gives a 0x0 canvas for zero pixels", () => {
    expect(sizeCanvas(0)).toEqual({ width: 0, height: 0 });
  });

  it("rejects negative and fractional counts", () => {
    expect(() => sizeCanvas(-1)).toThrow(RangeError);
    expect(() => sizeCanvas(1.5)).toThrow(RangeError);
  });
});

describe("renderCanvas", () => {
  it("stacks two pixels on a 1x2 canvas", () => {
    const canvas = renderCanvas(
      [
        [255, 0, 0],
        [0, 255, 0],
      ],
      { width: 1, height: 2 },
    );
    expect(canvas.width).toBe(1);
    expect(canvas.height).toBe(2);
    expect(getPixel(canvas, 0, 0)).toEqual([255, 0, 0]);
    expect(getPixel(canvas, 0, 1)).toEqual([0, 255, 0]);
  });

  it("places pixels row-major and fills the rest with black", () => {
    const pixels: Color[] = [
      [1, 2, 3],
      [4, 5, 6],
      [7, 8, 9],
    ];
    const canvas = renderCanvas(pixels, { width: 2, height: 2 });
    expect([...canvas.data]).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 0, 0, 0]);
    expect(getPixel(canvas, 1, 0)).toEqual([4, 5, 6]);
    expect(getPixel(canvas, 0, 1)).toEqual([7, 8, 9]);
    expect(getPixel(canvas, 1, 1)).toEqual([0, 0, 0]);
  });

  it("rejects a canvas too small for the pixels", () => {
    expect(() =>
      renderCanvas(
        [
          [1, 1, 1],
          [2, 2, 2],
        ],
        { width: 1, height: 1 },
      ),
    ).toThrow(RangeError);
  });

  it("reports progress against the full cell count", () => {
    const onProgress = vi.fn();
    renderCanvas([[1, 1, 1]], { width: 2, height: 1 }, onProgress);
    expect(onProgress.mock.calls).toEqual([
      [0, -1, 1],
      [1, 0, 1],
    ]);
  });

  it("refuses to read outside the canvas", () => {
    const canvas = renderCanvas([[1, 1, 1]], { width: 1, height: 1 });
    expect(() => getPixel(canvas, 1, 0)).toThrow(RangeError);
  });
});
