import { NextResponse } from 'next/server';
import { z } from 'zod';
import { getClient } from '@/lib/client';
import { loadConfig } from '@/lib/config';
import { resolveApiKey } from '@/lib/credentials';
import { describeError, errorMessage } from '@/lib/errors';
import { runPipeline } from '@/lib/pipeline';
import { encodeEvent } from '@/lib/stream';
import type { PipelineEvent, UploadedImage } from '@/lib/types';

export const runtime = 'nodejs'; // Buffer + fs
export const dynamic = 'force-dynamic';

// Form fields: repeated `brandboard` and `copy` files. Stray strings are ignored.
const FilesSchema = z.array(z.unknown()).transform(items => items.filter((v): v is File => v instanceof File));

async function toUploaded(files: File[]): Promise<UploadedImage[]> {
  return Promise.all(files.map(async f => ({ name: f.name, bytes: new Uint8Array(await f.arrayBuffer()) })));
}

// --- health check: GET /api/generate -> { hasKey, model } ---
export async function GET() {
  try {
    const config = loadConfig();
    return NextResponse.json({ hasKey: Boolean(resolveApiKey(config)), model: config.model });
  } catch (e) {
    console.error('[generate] config error', errorMessage(e));
    return NextResponse.json({ error: errorMessage(e) }, { status: 500 });
  }
}

export async function POST(req: Request) {
  let form: FormData;
  try {
    form = await req.formData();
  } catch (e) {
    return NextResponse.json({ error: `Expected multipart/form-data: ${errorMessage(e)}` }, { status: 400 });
  }

  const input = {
    brandboard: await toUploaded(FilesSchema.parse(form.getAll('brandboard'))),
    copy: await toUploaded(FilesSchema.parse(form.getAll('copy'))),
  };

  let model: string;
  try {
    model = loadConfig().model;
  } catch (e) {
    return NextResponse.json({ error: errorMessage(e) }, { status: 500 });
  }

  const encoder = new TextEncoder();
  const readable = new ReadableStream<Uint8Array>({
    async start(controller) {
      const send = (event: PipelineEvent) => {
        controller.enqueue(encoder.encode(encodeEvent(event)));
      };

      try {
        const outcome = await runPipeline(input, { getClient, model, onEvent: send });
        if (outcome.state === 'error') {
          console.error('[generate]', describeError(outcome.error));
        } else {
          console.info('[generate] prompt assembled', { chars: outcome.prompt.length });
        }
      } catch (e) {
        // the page treats a stream without `done` or `error` as a failed run
        console.error('[generate] unexpected error', errorMessage(e));
      }
      controller.close();
    },
  });

  return new Response(readable, {
    status: 200,
    headers: {
      'Content-Type': 'application/x-ndjson; charset=utf-8',
      'Cache-Control': 'no-cache, no-transform',
    },
  });
}
