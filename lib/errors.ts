import type { PipelineError, PipelineStep } from '@/lib/types';

export class ConfigError extends Error {
  readonly name = 'ConfigError';
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === 'string') return e;
  return String(e);
}

export const STEP_LABELS: Record<PipelineStep, string> = {
  brand: 'Error al analizar brandboard',
  copy: 'Error al extraer copy',
  sections: 'Error al estructurar secciones',
};

/** User-facing text; API failures keep the raw SDK message after the step label. */
export function describeError(error: PipelineError): string {
  return error.kind === 'api' ? `${STEP_LABELS[error.step]}: ${error.message}` : error.message;
}
