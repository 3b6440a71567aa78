import type { EncodedImage, UploadedImage } from '@/lib/types';

const MEDIA_TYPES: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
};

const DEFAULT_MEDIA_TYPE = 'image/png';

export function mediaTypeFor(filename: string): string {
  const ext = filename.toLowerCase().split('.').pop() ?? '';
  return MEDIA_TYPES[ext] ?? DEFAULT_MEDIA_TYPE;
}

/** Bytes are not checked; a broken image only fails once the model sees it. */
export function encodeImage(image: UploadedImage): EncodedImage {
  return {
    mediaType: mediaTypeFor(image.name),
    data: Buffer.from(image.bytes).toString('base64'),
  };
}

export const toDataUrl = ({ mediaType, data }: EncodedImage) => `data:${mediaType};base64,${data}`;
