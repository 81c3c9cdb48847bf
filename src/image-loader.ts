import { readFileSync } from "fs";
import { Uint16 } from "./bits";
import { errorMessage, ImageLoadError } from "./errors";
import { Memory } from "./memory";

export type LoadResult =
  | { ok: true; origin: Uint16; size: number }
  | { ok: false; error: ImageLoadError };

/**
 * Image layout: a big-endian origin word followed by big-endian payload words.
 * The payload is written from the origin and truncated at the top of memory;
 * a trailing odd byte is ignored.
 */
export function loadImage(
  memory: Memory,
  image: Buffer,
  imagePath = "<buffer>"
): LoadResult {
  if (image.length < 2) {
    return {
      ok: false,
      error: new ImageLoadError(imagePath, "missing origin"),
    };
  }
  const origin = image.readUint16BE(0);
  const words: Uint16[] = [];
  for (let pos = 2; pos + 1 < image.length; pos += 2) {
    words.push(image.readUint16BE(pos));
  }
  return { ok: true, origin, size: memory.load(origin, words) };
}

export function readImage(memory: Memory, imagePath: string): LoadResult {
  let image: Buffer;
  try {
    image = readFileSync(imagePath);
  } catch (err) {
    return {
      ok: false,
      error: new ImageLoadError(imagePath, errorMessage(err)),
    };
  }
  return loadImage(memory, image, imagePath);
}
