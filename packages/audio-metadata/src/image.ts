import type { CoverImage } from '@cloud-narrator/contracts';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** Detect the cover formats an MP4 container can carry as an attached picture. */
export function sniffImageType(bytes: Uint8Array): CoverImage['mimeType'] | null {
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return 'image/jpeg';
  }
  if (bytes.length >= PNG_SIGNATURE.length && PNG_SIGNATURE.every((byte, i) => bytes[i] === byte)) {
    return 'image/png';
  }
  return null;
}

export function extensionFor(mimeType: CoverImage['mimeType']): string {
  return mimeType === 'image/png' ? '.png' : '.jpg';
}
