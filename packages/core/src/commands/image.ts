import { CommandRoutingError } from '../errors/errors';
import type { ImageInfo } from './types';

export const MAX_IMAGE_DIMENSION = 1024;
export const JPEG_QUALITY = 95;

export interface EncodedImage {
  dataUrl: string;
  width: number;
  height: number;
  bytes: number;
}

export type ImageEncoder = (image: Uint8Array) => Promise<EncodedImage>;

// sharp is a native dependency; load it only when an image actually shows up.
const loadSharp = async () => (await import('sharp')).default;

export const encodeImageForPrompt: ImageEncoder = async (image) => {
  try {
    const sharp = await loadSharp();
    const { data, info } = await sharp(image)
      .resize({
        width: MAX_IMAGE_DIMENSION,
        height: MAX_IMAGE_DIMENSION,
        fit: 'inside',
        withoutEnlargement: true,
      })
      .flatten({ background: '#ffffff' })
      .jpeg({ quality: JPEG_QUALITY })
      .toBuffer({ resolveWithObject: true });
    return {
      dataUrl: `data:image/jpeg;base64,${data.toString('base64')}`,
      width: info.width,
      height: info.height,
      bytes: data.length,
    };
  } catch (error) {
    throw new CommandRoutingError(
      'image_processing',
      `Failed to process image: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
};

export const describeImage = async (image: Uint8Array): Promise<ImageInfo> => {
  const sharp = await loadSharp();
  const metadata = await sharp(image).metadata();
  return {
    width: metadata.width ?? 0,
    height: metadata.height ?? 0,
    format: metadata.format ?? 'unknown',
  };
};
