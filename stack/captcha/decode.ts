import sharp from "sharp";
import { createRaster, type Channels, type Raster } from "./image.js";

function normaliseChannels(channels: number, hasAlpha: boolean): Channels {
  if (channels === 4 || (channels === 2 && hasAlpha)) return 4;
  if (channels === 1) return 1;
  return 3;
}

/** Decodes a PNG or JPEG screenshot; grey+alpha becomes RGBA. */
export async function decodeImage(buffer: Uint8Array): Promise<Raster> {
  const image = sharp(buffer);
  const meta = await image.metadata();
  const target = normaliseChannels(meta.channels ?? 3, meta.hasAlpha ?? false);

  let pipeline = image;
  if (target === 4) {
    pipeline = pipeline.ensureAlpha().toColourspace("srgb");
  } else if (target === 3) {
    pipeline = pipeline.removeAlpha().toColourspace("srgb");
  }

  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  if (info.channels !== target) {
    throw new Error(
      `Decoded ${info.channels.toString()} channels, expected ${target.toString()}`,
    );
  }
  return createRaster(info.width, info.height, target, new Uint8Array(data));
}
