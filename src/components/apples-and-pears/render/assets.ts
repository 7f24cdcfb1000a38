import { AssetLoadError } from '../errors';
import type { PieceImages } from './renderer';

export type PieceSources = PieceImages<string>;

export type ImageDecoder<TImage> = (url: string) => Promise<TImage>;

/** Browser decoder: resolves once the image is fully decoded and drawable. */
export const decodeImage: ImageDecoder<HTMLImageElement> = async (url) => {
  const img = new Image();
  img.decoding = 'async';
  img.src = url;
  await img.decode();
  return img;
};

async function loadPiece<TImage>(
  piece: keyof PieceSources,
  url: string,
  decode: ImageDecoder<TImage>
): Promise<TImage> {
  try {
    return await decode(url);
  } catch (err) {
    throw new AssetLoadError(piece, url, err);
  }
}

/**
 * Decodes both piece images once, at startup. The game cannot draw without them,
 * so any failure rejects with AssetLoadError and the caller stops there.
 */
export async function loadPieceImages<TImage>(
  sources: PieceSources,
  decode: ImageDecoder<TImage>
): Promise<PieceImages<TImage>> {
  const [apple, pear] = await Promise.all([
    loadPiece('apple', sources.apple, decode),
    loadPiece('pear', sources.pear, decode),
  ]);
  return { apple, pear };
}
