import { z } from 'zod';
import type { PipelineEvent } from '@/lib/types';

const Step = z.enum(['brand', 'copy', 'sections']);

const ErrorSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('missing_input'), message: z.string() }),
  z.object({ kind: z.literal('config'), message: z.string() }),
  z.object({ kind: z.literal('api'), step: Step, message: z.string() }),
]);

const EventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('step'), step: Step }),
  z.object({ type: z.literal('brand'), brandInfo: z.record(z.unknown()), parsed: z.boolean() }),
  z.object({ type: z.literal('copy'), rawCopy: z.string() }),
  z.object({ type: z.literal('sections'), sections: z.string() }),
  z.object({ type: z.literal('done'), prompt: z.string(), tookMs: z.number() }),
  z.object({ type: z.literal('error'), error: ErrorSchema }),
]);

export const encodeEvent = (event: PipelineEvent) => JSON.stringify(event) + '\n';

/** null for blank, malformed or unknown lines. */
export function parseEventLine(line: string): PipelineEvent | null {
  if (!line.trim()) return null;
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    return null;
  }
  const res = EventSchema.safeParse(json);
  return res.success ? res.data : null;
}

/** Reads an NDJSON body to the end, handing each event over as it arrives. */
export async function readEvents(
  body: ReadableStream<Uint8Array>,
  onEvent: (event: PipelineEvent) => void,
): Promise<void> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';
      for (const line of lines) {
        const event = parseEventLine(line);
        if (event) onEvent(event);
      }
    }
    buffer += decoder.decode();
    const last = parseEventLine(buffer);
    if (last) onEvent(last);
  } finally {
    reader.releaseLock();
  }
}
