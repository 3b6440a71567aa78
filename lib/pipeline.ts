import { transcribeCopy, structureSections } from '@/lib/copy';
import { errorMessage } from '@/lib/errors';
import { extractBrandInfo } from '@/lib/extract';
import { composeLandingPrompt } from '@/lib/prompt';
import type {
  PipelineError,
  PipelineEvent,
  PipelineInput,
  PipelineOutcome,
  PipelineStep,
} from '@/lib/types';
import type { ChatClient, VisionModel } from '@/lib/vision';

export type PipelineDeps = {
  getClient: () => ChatClient;
  model: string;
  onEvent?: (event: PipelineEvent) => void;
};

export function checkInput(input: PipelineInput): PipelineError | null {
  if (!input.brandboard.length) return { kind: 'missing_input', message: 'Sube al menos una imagen del brandboard' };
  if (!input.copy.length) return { kind: 'missing_input', message: 'Sube al menos una imagen del copy' };
  return null;
}

class StepFailure extends Error {
  constructor(readonly step: PipelineStep, cause: unknown) {
    super(errorMessage(cause));
  }
}

/**
 * idle → brand_extracted → copy_transcribed → sections_structured → prompt_assembled.
 * Any failure is terminal; steps run one after another with no retry.
 */
export async function runPipeline(input: PipelineInput, deps: PipelineDeps): Promise<PipelineOutcome> {
  const started = Date.now();
  const emit = deps.onEvent ?? (() => {});
  const fail = (error: PipelineError): PipelineOutcome => {
    emit({ type: 'error', error });
    return { state: 'error', error };
  };

  const missing = checkInput(input);
  if (missing) return fail(missing);

  let vision: VisionModel;
  try {
    vision = { client: deps.getClient(), model: deps.model };
  } catch (e) {
    return fail({ kind: 'config', message: errorMessage(e) });
  }

  const step = async <T>(name: PipelineStep, run: () => Promise<T>): Promise<T> => {
    emit({ type: 'step', step: name });
    try {
      return await run();
    } catch (e) {
      throw new StepFailure(name, e);
    }
  };

  try {
    const brand = await step('brand', () => extractBrandInfo(vision, input.brandboard));
    emit({ type: 'brand', brandInfo: brand.brandInfo, parsed: brand.ok });

    const rawCopy = await step('copy', () => transcribeCopy(vision, input.copy));
    emit({ type: 'copy', rawCopy });

    const sections = await step('sections', () => structureSections(vision, rawCopy));
    emit({ type: 'sections', sections });

    const prompt = composeLandingPrompt(brand.brandInfo, sections);
    emit({ type: 'done', prompt, tookMs: Date.now() - started });

    return { state: 'prompt_assembled', brandInfo: brand.brandInfo, rawCopy, sections, prompt };
  } catch (e) {
    if (e instanceof StepFailure) return fail({ kind: 'api', step: e.step, message: e.message });
    throw e;
  }
}
