import { COPY_PROMPT, sectionsPrompt } from '@/lib/prompts';
import type { UploadedImage } from '@/lib/types';
import { complete, imageParts, type VisionModel } from '@/lib/vision';

export const COPY_MAX_TOKENS = 4000;
export const SECTIONS_MAX_TOKENS = 4000;

export function transcribeCopy(vision: VisionModel, images: UploadedImage[]): Promise<string> {
  return complete(vision, [{ type: 'text', text: COPY_PROMPT }, ...imageParts(images)], COPY_MAX_TOKENS);
}

// Whether the model kept to the seven markers is not checked here.
export function structureSections(vision: VisionModel, rawCopy: string): Promise<string> {
  return complete(vision, sectionsPrompt(rawCopy), SECTIONS_MAX_TOKENS);
}
