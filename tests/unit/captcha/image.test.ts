import { describe, it, expect } from "vitest";
import {
  alphaMask,
  createRaster,
  crop,
  findEdges,
  gaussianBlur,
  histogram,
  toGrayscale,
  toRgb,
} from "../../../stack/captcha/image.js";
import { solidRaster } from "../../fixtures/images.js";

describe("createRaster", () => {
  it("rejects data of the wrong size", () => {
    expect(() => createRaster(2, 2, 3, new Uint8Array(5))).toThrow("Raster 2x2x3 needs 12 bytes, got 5");
  });

  it("allocates zeroed data when none is given", () => {
    const raster = createRaster(3, 2, 1);
    expect(raster.data).toEqual(new Uint8Array(6));
  });
});

describe("toGrayscale", () => {
  it("uses truncated ITU-R 601 luma", () => {
    const rgb = createRaster(1, 1, 3, Uint8Array.from([10, 20, 30]));
    expect(toGrayscale(rgb).data).toEqual(Uint8Array.from([18]));
  });

  it("ignores alpha", () => {
    const rgba = createRaster(1, 1, 4, Uint8Array.from([255, 255, 255, 0]));
    expect(toGrayscale(rgba).data).toEqual(Uint8Array.from([255]));
  });

  it("returns grayscale input unchanged", () => {
    const gray = solidRaster(2, 2, 9, 1);
    expect(toGrayscale(gray)).toBe(gray);
  });
});

describe("toRgb", () => {
  it("spreads grey over three channels", () => {
    const gray = createRaster(2, 1, 1, Uint8Array.from([5, 7]));
    expect(toRgb(gray).data).toEqual(Uint8Array.from([5, 5, 5, 7, 7, 7]));
  });

  it("drops alpha", () => {
    const rgba = createRaster(1, 1, 4, Uint8Array.from([1, 2, 3, 4]));
    expect(toRgb(rgba).data).toEqual(Uint8Array.from([1, 2, 3]));
  });
});

describe("findEdges", () => {
  it("marks an isolated bright pixel and leaves the border at zero", () => {
    const data = new Uint8Array(25);
    data[12] = 100;
    const edges = findEdges(createRaster(5, 5, 1, data));

    expect(edges.data[12]).toBe(255);
    // Neighbours see 0 * 8 - 100, clamped
    expect(edges.data[7]).toBe(0);
    expect(edges.data[0]).toBe(0);
  });

  it("is zero on a flat image", () => {
    expect(findEdges(solidRaster(4, 4, 77)).data.every((value) => value === 0)).toBe(true);
  });
});

describe("gaussianBlur", () => {
  it("keeps a flat image flat", () => {
    const blurred = gaussianBlur(solidRaster(6, 4, 120), 1.5);
    expect(blurred.channels).toBe(1);
    expect(blurred.data.every((value) => value === 120)).toBe(true);
  });

  it("spreads a dark pixel into its neighbours", () => {
    const data = new Uint8Array(49).fill(200);
    data[24] = 0;
    const blurred = gaussianBlur(createRaster(7, 7, 1, data), 1);
    const centre = blurred.data[24] ?? 0;
    const neighbour = blurred.data[25] ?? 0;
    expect(centre).toBeLessThan(neighbour);
    expect(neighbour).toBeLessThan(200);
  });
});

describe("crop", () => {
  it("copies the requested window", () => {
    const raster = createRaster(3, 3, 1, Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 8, 9]));
    expect(crop(raster, 1, 1, 2, 2).data).toEqual(Uint8Array.from([5, 6, 8, 9]));
  });

  it("throws when the window leaves the raster", () => {
    expect(() => crop(solidRaster(3, 3, 0), 2, 0, 2, 1)).toThrow("Crop 2x1@2,0 exceeds 3x3");
  });
});

describe("histogram", () => {
  it("counts grayscale values", () => {
    const bins = histogram(createRaster(3, 1, 1, Uint8Array.from([0, 0, 255])));
    expect(bins).toHaveLength(256);
    expect(bins[0]).toBe(2);
    expect(bins[255]).toBe(1);
  });
});

describe("alphaMask", () => {
  it("extracts the alpha channel", () => {
    const rgba = createRaster(2, 1, 4, Uint8Array.from([1, 2, 3, 10, 4, 5, 6, 20]));
    expect(alphaMask(rgba)?.data).toEqual(Uint8Array.from([10, 20]));
  });

  it("is null without alpha", () => {
    expect(alphaMask(solidRaster(1, 1, 0))).toBeNull();
  });
});
