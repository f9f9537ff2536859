export type Channels = 1 | 3 | 4;

/** Row-major pixel grid with interleaved channels. Treated as immutable. */
export interface Raster {
  readonly width: number;
  readonly height: number;
  readonly channels: Channels;
  readonly data: Uint8Array;
}

export function createRaster(
  width: number,
  height: number,
  channels: Channels,
  data?: Uint8Array,
): Raster {
  const size = width * height * channels;
  if (data && data.length !== size) {
    throw new Error(
      `Raster ${width.toString()}x${height.toString()}x${channels.toString()} needs ${size.toString()} bytes, got ${data.length.toString()}`,
    );
  }
  return { width, height, channels, data: data ?? new Uint8Array(size) };
}

function sample(raster: Raster, index: number): number {
  return raster.data[index] ?? 0;
}

// ITU-R 601 luma, truncated
export function toGrayscale(raster: Raster): Raster {
  if (raster.channels === 1) return raster;
  const out = new Uint8Array(raster.width * raster.height);
  const step = raster.channels;
  for (let i = 0; i < out.length; i++) {
    const base = i * step;
    const red = sample(raster, base);
    const green = sample(raster, base + 1);
    const blue = sample(raster, base + 2);
    out[i] = Math.floor((299 * red + 587 * green + 114 * blue) / 1000);
  }
  return createRaster(raster.width, raster.height, 1, out);
}

/** Drops alpha, or spreads a grey channel over RGB. */
export function toRgb(raster: Raster): Raster {
  if (raster.channels === 3) return raster;
  const count = raster.width * raster.height;
  const out = new Uint8Array(count * 3);
  for (let i = 0; i < count; i++) {
    for (let ch = 0; ch < 3; ch++) {
      out[i * 3 + ch] =
        raster.channels === 1 ? sample(raster, i) : sample(raster, i * raster.channels + ch);
    }
  }
  return createRaster(raster.width, raster.height, 3, out);
}

/**
 * 3x3 Laplacian (centre 8, neighbours -1) clamped to 0..255.
 * The one-pixel border has no full neighbourhood and stays 0.
 */
export function findEdges(raster: Raster): Raster {
  const gray = toGrayscale(raster);
  const { width, height } = gray;
  const out = new Uint8Array(width * height);
  for (let y = 1; y < height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      const centre = y * width + x;
      let sum = 8 * sample(gray, centre);
      for (let dy = -1; dy <= 1; dy++) {
        for (let dx = -1; dx <= 1; dx++) {
          if (dx !== 0 || dy !== 0) {
            sum -= sample(gray, centre + dy * width + dx);
          }
        }
      }
      out[centre] = Math.min(255, Math.max(0, sum));
    }
  }
  return createRaster(width, height, 1, out);
}

function gaussianKernel(sigma: number): Float64Array {
  const half = Math.max(1, Math.ceil(sigma * 3));
  const kernel = new Float64Array(half * 2 + 1);
  let total = 0;
  for (let i = -half; i <= half; i++) {
    const weight = Math.exp(-(i * i) / (2 * sigma * sigma));
    kernel[i + half] = weight;
    total += weight;
  }
  for (let i = 0; i < kernel.length; i++) {
    kernel[i] = (kernel[i] ?? 0) / total;
  }
  return kernel;
}

/** Separable Gaussian on a grayscale copy; edges clamp, output rounds to integers. */
export function gaussianBlur(raster: Raster, radius: number): Raster {
  const gray = toGrayscale(raster);
  const { width, height } = gray;
  const kernel = gaussianKernel(radius);
  const half = (kernel.length - 1) / 2;
  const clampX = (x: number): number => Math.min(width - 1, Math.max(0, x));
  const clampY = (y: number): number => Math.min(height - 1, Math.max(0, y));

  const horizontal = new Float64Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = -half; k <= half; k++) {
        acc += (kernel[k + half] ?? 0) * sample(gray, y * width + clampX(x + k));
      }
      horizontal[y * width + x] = acc;
    }
  }

  const out = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = -half; k <= half; k++) {
        acc += (kernel[k + half] ?? 0) * (horizontal[clampY(y + k) * width + x] ?? 0);
      }
      out[y * width + x] = Math.min(255, Math.max(0, Math.round(acc)));
    }
  }
  return createRaster(width, height, 1, out);
}

export function crop(raster: Raster, left: number, top: number, width: number, height: number): Raster {
  if (left < 0 || top < 0 || left + width > raster.width || top + height > raster.height) {
    throw new Error(
      `Crop ${width.toString()}x${height.toString()}@${left.toString()},${top.toString()} exceeds ${raster.width.toString()}x${raster.height.toString()}`,
    );
  }
  const { channels } = raster;
  const out = new Uint8Array(width * height * channels);
  const rowBytes = width * channels;
  for (let y = 0; y < height; y++) {
    const from = ((top + y) * raster.width + left) * channels;
    out.set(raster.data.subarray(from, from + rowBytes), y * rowBytes);
  }
  return createRaster(width, height, channels, out);
}

/** 256-bin histogram of a grayscale raster. */
export function histogram(raster: Raster): number[] {
  const gray = toGrayscale(raster);
  const bins = new Array<number>(256).fill(0);
  for (const value of gray.data) {
    bins[value] = (bins[value] ?? 0) + 1;
  }
  return bins;
}

/** Alpha channel as a grayscale raster, or null when there is none. */
export function alphaMask(raster: Raster): Raster | null {
  if (raster.channels !== 4) return null;
  const count = raster.width * raster.height;
  const out = new Uint8Array(count);
  for (let i = 0; i < count; i++) {
    out[i] = sample(raster, i * 4 + 3);
  }
  return createRaster(raster.width, raster.height, 1, out);
}
