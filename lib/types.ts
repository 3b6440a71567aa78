export type UploadedImage = {
  name: string;
  bytes: Uint8Array;
};

export type EncodedImage = {
  mediaType: string;
  data: string; // base64
};

/**
 * Brand attributes as decoded from the model. Keys are whatever the model
 * returned; the recognized ones are listed in BRAND_KEYS.
 */
export type BrandInfo = Record<string, unknown>;

export type PipelineInput = {
  brandboard: UploadedImage[];
  copy: UploadedImage[];
};

export type PipelineStep = 'brand' | 'copy' | 'sections';

export type PipelineError =
  | { kind: 'missing_input'; message: string }
  | { kind: 'config'; message: string }
  | { kind: 'api'; step: PipelineStep; message: string };

export type PipelineEvent =
  | { type: 'step'; step: PipelineStep }
  | { type: 'brand'; brandInfo: BrandInfo; parsed: boolean }
  | { type: 'copy'; rawCopy: string }
  | { type: 'sections'; sections: string }
  | { type: 'done'; prompt: string; tookMs: number }
  | { type: 'error'; error: PipelineError };

export type PipelineOutcome =
  | {
      state: 'prompt_assembled';
      brandInfo: BrandInfo;
      rawCopy: string;
      sections: string;
      prompt: string;
    }
  | { state: 'error'; error: PipelineError };
