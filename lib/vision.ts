import type {
  ChatCompletion,
  ChatCompletionContentPart,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import { encodeImage, toDataUrl } from '@/lib/encode';
import type { UploadedImage } from '@/lib/types';

/** The slice of the OpenAI SDK this app calls; tests hand in a fake. */
export interface ChatClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): PromiseLike<ChatCompletion>;
    };
  };
}

export type VisionModel = {
  client: ChatClient;
  model: string;
};

export function imageParts(images: UploadedImage[]): ChatCompletionContentPart[] {
  return images.map((img): ChatCompletionContentPart => ({
    type: 'image_url',
    image_url: { url: toDataUrl(encodeImage(img)) },
  }));
}

/** Single user message, trimmed text back. API errors are left to the caller. */
export async function complete(
  { client, model }: VisionModel,
  content: string | ChatCompletionContentPart[],
  maxTokens: number,
): Promise<string> {
  const completion = await client.chat.completions.create({
    model,
    messages: [{ role: 'user', content }],
    max_tokens: maxTokens,
  });
  return (completion.choices[0]?.message?.content ?? '').trim();
}
