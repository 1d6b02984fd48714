/**
 * Image type detection by magic number. The declared content type and file
 * extension of an upload are not trusted.
 */
export interface ImageType {
  mimeType: string;
  extension: string;
}

const SIGNATURES: Array<{ offset: number; bytes: number[]; type: ImageType }> = [
  { offset: 0, bytes: [0xff, 0xd8, 0xff], type: { mimeType: 'image/jpeg', extension: '.jpg' } },
  {
    offset: 0,
    bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a],
    type: { mimeType: 'image/png', extension: '.png' },
  },
  { offset: 0, bytes: ascii('GIF87a'), type: { mimeType: 'image/gif', extension: '.gif' } },
  { offset: 0, bytes: ascii('GIF89a'), type: { mimeType: 'image/gif', extension: '.gif' } },
  { offset: 0, bytes: ascii('BM'), type: { mimeType: 'image/bmp', extension: '.bmp' } },
];

const WEBP: ImageType = { mimeType: 'image/webp', extension: '.webp' };

function ascii(text: string): number[] {
  return Array.from(text, (char) => char.charCodeAt(0));
}

function matchesAt(bytes: Uint8Array, offset: number, expected: number[]): boolean {
  if (bytes.length < offset + expected.length) return false;
  return expected.every((value, index) => bytes[offset + index] === value);
}

export function detectImageType(bytes: Uint8Array): ImageType | null {
  // RIFF is shared with WAV/AVI; only RIFF....WEBP is an image
  if (matchesAt(bytes, 0, ascii('RIFF'))) {
    return matchesAt(bytes, 8, ascii('WEBP')) ? WEBP : null;
  }

  const match = SIGNATURES.find((signature) => matchesAt(bytes, signature.offset, signature.bytes));
  return match ? match.type : null;
}

export function toDataUri(bytes: Uint8Array, mimeType: string): string {
  return `data:${mimeType};base64,${Buffer.from(bytes).toString('base64')}`;
}
