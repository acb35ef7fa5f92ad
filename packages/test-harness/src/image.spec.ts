import sharp from 'sharp';
import { describe, expect, it } from 'vitest';
import { CommandRoutingError, describeImage, encodeImageForPrompt } from '@voicebox/core';

const makePng = (width: number, height: number) =>
  sharp({
    create: { width, height, channels: 4, background: { r: 255, g: 0, b: 0, alpha: 0.5 } },
  })
    .png()
    .toBuffer();

describe('clipboard image encoding', () => {
  it('downsizes large images to the bounding box as JPEG', async () => {
    const encoded = await encodeImageForPrompt(new Uint8Array(await makePng(2048, 1024)));
    expect(encoded.width).toBe(1024);
    expect(encoded.height).toBe(512);
    expect(encoded.dataUrl.startsWith('data:image/jpeg;base64,')).toBe(true);

    const jpeg = Buffer.from(encoded.dataUrl.slice('data:image/jpeg;base64,'.length), 'base64');
    expect(jpeg.length).toBe(encoded.bytes);
    const metadata = await sharp(jpeg).metadata();
    expect(metadata.format).toBe('jpeg');
    expect(metadata.hasAlpha).toBe(false);
  });

  it('keeps small images at their size', async () => {
    const encoded = await encodeImageForPrompt(new Uint8Array(await makePng(100, 50)));
    expect(encoded.width).toBe(100);
    expect(encoded.height).toBe(50);
  });

  it('reports undecodable data as an image processing failure', async () => {
    const failure = await encodeImageForPrompt(new Uint8Array([1, 2, 3, 4])).catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(CommandRoutingError);
    expect(failure).toMatchObject({ code: 'image_processing' });
  });

  it('describes clipboard images', async () => {
    expect(await describeImage(new Uint8Array(await makePng(64, 32)))).toEqual({
      width: 64,
      height: 32,
      format: 'png',
    });
  });
});
