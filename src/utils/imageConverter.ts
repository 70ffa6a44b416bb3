import { SUPPORTED_IMAGE_TYPES } from '../types';
import type { ImageMimeType } from '../types';

const DATA_URL_MARKER = 'data:image';
const STRICT_BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Removes a `data:image/...;base64,` style prefix (everything up to and including the
 * first comma). Input without the marker is returned unchanged, so applying it twice
 * is the same as applying it once.
 */
export function stripDataUrlPrefix(imageData: string): string {
  if (!imageData.startsWith(DATA_URL_MARKER)) {
    return imageData;
  }
  const commaIndex = imageData.indexOf(',');
  return commaIndex === -1 ? '' : imageData.slice(commaIndex + 1);
}

/** Mime type declared by a data URL, if any (`data:image/png;base64,...` -> `image/png`). */
export function getDataUrlMimeType(imageData: string): string | null {
  const match = /^data:(image\/[^;,]+)[;,]/.exec(imageData);
  return match ? match[1].toLowerCase() : null;
}

/**
 * Strict base64 decode: rejects characters outside the standard alphabet, misplaced
 * padding and lengths that are not a multiple of four. Returns null instead of
 * guessing, unlike Buffer.from which silently skips bad characters.
 */
export function decodeStrictBase64(base64Data: string): Buffer | null {
  if (base64Data.length === 0 || base64Data.length % 4 !== 0 || !STRICT_BASE64.test(base64Data)) {
    return null;
  }
  const bytes = Buffer.from(base64Data, 'base64');
  return bytes.length > 0 ? bytes : null;
}

export function isSupportedImageType(mimeType: string): mimeType is ImageMimeType {
  return (SUPPORTED_IMAGE_TYPES as readonly string[]).includes(mimeType);
}

export function detectMimeFromMagicBytes(bytes: Buffer): ImageMimeType | null {
  const hex = bytes.subarray(0, 16).toString('hex');

  if (hex.startsWith('ffd8ff')) {
    return 'image/jpeg';
  }
  if (hex.startsWith('89504e47')) {
    return 'image/png';
  }
  if (hex.startsWith('474946')) {
    return 'image/gif';
  }
  // RIFF....WEBP
  if (hex.startsWith('52494646') && hex.slice(16, 24) === '57454250') {
    return 'image/webp';
  }
  return null;
}

/**
 * Picks the mime type to send to a provider.
 * Priority: a supported declared type, then the magic bytes, then JPEG.
 */
export function resolveImageMimeType(bytes: Buffer, declaredMimeType?: string | null): ImageMimeType {
  const declared = declaredMimeType?.trim().toLowerCase();
  if (declared && isSupportedImageType(declared)) {
    return declared;
  }
  return detectMimeFromMagicBytes(bytes) ?? 'image/jpeg';
}

/** `image/jpg` is not a registered type; providers expect `image/jpeg`. */
export function toProviderMimeType(mimeType: ImageMimeType): Exclude<ImageMimeType, 'image/jpg'> {
  return mimeType === 'image/jpg' ? 'image/jpeg' : mimeType;
}
