import sharp from "sharp";
import {
  adaptiveBinarizeInverse,
  binarizeInverse,
  dilate,
  type GrayImage,
  maskToGray,
  open,
} from "./raster";

export type VariantName = "global" | "adaptive" | "enhanced" | "denoise";

export interface ImageVariant {
  name: VariantName;
  /** PNG-encoded image handed to the recognizer. */
  image: Buffer;
}

export type ImagePreprocessor = (imageBytes: Buffer) => Promise<ImageVariant[]>;

const EDGE_ENHANCE_MORE = [-1, -1, -1, -1, 9, -1, -1, -1, -1];

function grayscale(input: sharp.Sharp): sharp.Sharp {
  return input.flatten({ background: "#ffffff" }).greyscale().toColourspace("b-w");
}

async function toGrayImage(pipeline: sharp.Sharp): Promise<GrayImage> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  if (info.channels === 1) {
    return { width: info.width, height: info.height, data: new Uint8Array(data) };
  }

  const pixels = new Uint8Array(info.width * info.height);
  for (let i = 0; i < pixels.length; i += 1) {
    pixels[i] = data[i * info.channels];
  }
  return { width: info.width, height: info.height, data: pixels };
}

function fromGrayImage(image: GrayImage): sharp.Sharp {
  return sharp(Buffer.from(image.data), {
    raw: { width: image.width, height: image.height, channels: 1 },
  });
}

function encodePng(image: GrayImage): Promise<Buffer> {
  return fromGrayImage(image).png().toBuffer();
}

/** Fixed threshold at 150, 2×2 opening, then 2×2 dilation. */
export async function globalThresholdVariant(imageBytes: Buffer): Promise<Buffer> {
  const gray = await toGrayImage(grayscale(sharp(imageBytes)));
  const mask = dilate(open(binarizeInverse(gray, 150), 2), 2);
  return encodePng(maskToGray(mask));
}

/** Gaussian blur, then a threshold against the local Gaussian mean minus 2. */
export async function adaptiveThresholdVariant(imageBytes: Buffer): Promise<Buffer> {
  const blurred = await toGrayImage(grayscale(sharp(imageBytes)).blur(1.1));
  const localMean = await toGrayImage(fromGrayImage(blurred).blur(2));
  const mask = dilate(open(adaptiveBinarizeInverse(blurred, localMean, 2), 1), 2);
  return encodePng(maskToGray(mask));
}

/** Contrast, sharpness and edge enhancement; the image stays grayscale. */
export async function enhancedVariant(imageBytes: Buffer): Promise<Buffer> {
  return grayscale(sharp(imageBytes))
    .linear(3, -(128 * 3) + 128)
    .sharpen({ sigma: 1 })
    .convolve({ width: 3, height: 3, kernel: EDGE_ENHANCE_MORE })
    .png()
    .toBuffer();
}

/** Median denoise, fixed threshold at 127, then 2×2 dilation. */
export async function denoiseVariant(imageBytes: Buffer): Promise<Buffer> {
  const denoised = await toGrayImage(grayscale(sharp(imageBytes)).median(3));
  const mask = dilate(binarizeInverse(denoised, 127), 2);
  return encodePng(maskToGray(mask));
}

export const preprocessChallenge: ImagePreprocessor = async (imageBytes) => {
  return [
    { name: "global", image: await globalThresholdVariant(imageBytes) },
    { name: "adaptive", image: await adaptiveThresholdVariant(imageBytes) },
    { name: "enhanced", image: await enhancedVariant(imageBytes) },
    { name: "denoise", image: await denoiseVariant(imageBytes) },
  ];
};
