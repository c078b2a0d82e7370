/** Single-channel 8-bit image, row-major. */
export interface GrayImage {
  width: number;
  height: number;
  data: Uint8Array;
}

/** Binary image where 1 marks ink (glyph pixels) and 0 marks background. */
export interface InkMask {
  width: number;
  height: number;
  data: Uint8Array;
}

/** Pixels at or below `threshold` become ink. */
export function binarizeInverse(image: GrayImage, threshold: number): InkMask {
  const data = new Uint8Array(image.data.length);
  for (let i = 0; i < image.data.length; i += 1) {
    data[i] = image.data[i] <= threshold ? 1 : 0;
  }
  return { width: image.width, height: image.height, data };
}

/**
 * Ink where a pixel is at or below its local mean minus `offset`. `localMean`
 * is the same image blurred over the neighbourhood.
 */
export function adaptiveBinarizeInverse(image: GrayImage, localMean: GrayImage, offset: number): InkMask {
  if (image.width !== localMean.width || image.height !== localMean.height) {
    throw new Error("adaptive threshold needs the image and its local mean at the same size");
  }
  const data = new Uint8Array(image.data.length);
  for (let i = 0; i < image.data.length; i += 1) {
    data[i] = image.data[i] <= localMean.data[i] - offset ? 1 : 0;
  }
  return { width: image.width, height: image.height, data };
}

function kernelOffsets(size: number): number[] {
  const anchor = Math.floor(size / 2);
  const offsets: number[] = [];
  for (let k = 0; k < size; k += 1) {
    offsets.push(k - anchor);
  }
  return offsets;
}

function morph(mask: InkMask, size: number, keepWhen: "all" | "any"): InkMask {
  const offsets = kernelOffsets(size);
  const { width, height } = mask;
  const data = new Uint8Array(mask.data.length);

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      let hits = 0;
      let seen = 0;
      for (const dy of offsets) {
        const ny = y + dy;
        if (ny < 0 || ny >= height) continue;
        for (const dx of offsets) {
          const nx = x + dx;
          if (nx < 0 || nx >= width) continue;
          seen += 1;
          hits += mask.data[ny * width + nx];
        }
      }
      data[y * width + x] = keepWhen === "all" ? (hits === seen ? 1 : 0) : hits > 0 ? 1 : 0;
    }
  }

  return { width, height, data };
}

/** Square structuring element of `size`; out-of-bounds neighbours are ignored. */
export function erode(mask: InkMask, size: number): InkMask {
  return morph(mask, size, "all");
}

export function dilate(mask: InkMask, size: number): InkMask {
  return morph(mask, size, "any");
}

export function open(mask: InkMask, size: number): InkMask {
  return dilate(erode(mask, size), size);
}

/** Dark glyphs on a white background, the polarity the recognizer expects. */
export function maskToGray(mask: InkMask): GrayImage {
  const data = new Uint8Array(mask.data.length);
  for (let i = 0; i < mask.data.length; i += 1) {
    data[i] = mask.data[i] === 1 ? 0 : 255;
  }
  return { width: mask.width, height: mask.height, data };
}
