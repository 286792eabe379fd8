import { z } from 'zod';
import { MalformedResponseError, ModelLoadingError, NetworkError, RateLimitedError, messageOf } from './errors';
import { CompletionRequest, InferenceEndpoint } from './types';

const GenerationSchema = z.union([
  z.array(z.object({ generated_text: z.string().optional(), answer: z.string().optional() })).min(1),
  z.object({ generated_text: z.string() }),
]);

const ErrorBodySchema = z.object({
  error: z.union([z.string(), z.array(z.string())]).optional(),
  estimated_time: z.number().optional(),
});

type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Hosted Inference API client (`POST {baseUrl}/models/{model}`).
 * Text prompts go out as text-generation requests; images as
 * visual-question-answering requests carrying the instruction as text.
 */
export class HuggingFaceEndpoint implements InferenceEndpoint {
  constructor(
    private readonly baseUrl: string,
    readonly model: string,
    private readonly token?: string,
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  async complete(request: CompletionRequest, options: { timeoutMs: number }): Promise<string> {
    const url = `${this.baseUrl}/models/${this.model}`;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await this.fetchFn(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(this.buildBody(request)),
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      if (isAbort(error)) {
        throw new NetworkError(`Inference request to ${this.model} timed out after ${options.timeoutMs}ms`);
      }
      throw new NetworkError(`Inference endpoint unreachable: ${messageOf(error)}`);
    }

    if (!ok) throw this.toError(status, text);
    return this.readGeneration(text);
  }

  private buildBody(request: CompletionRequest) {
    if (request.image) {
      return {
        inputs: { image: request.image.data.toString('base64'), text: request.prompt },
      };
    }
    return {
      inputs: request.prompt,
      parameters: {
        max_new_tokens: 200,
        temperature: 0.1,
        do_sample: false,
        return_full_text: false,
      },
    };
  }

  private toError(status: number, text: string): Error {
    const body = ErrorBodySchema.safeParse(safeJson(text));
    const detail = body.success && body.data.error !== undefined ? [body.data.error].flat().join('; ') : text;
    const estimated = body.success ? body.data.estimated_time : undefined;

    if (status === 503 && (estimated !== undefined || /loading/i.test(detail))) {
      return new ModelLoadingError(`Model ${this.model} is loading`, estimated);
    }
    if (status === 429) {
      return new RateLimitedError(`Inference endpoint rate limited the request: ${detail.slice(0, 200)}`);
    }
    return new NetworkError(`Inference endpoint returned HTTP ${status}: ${detail.slice(0, 200)}`, status);
  }

  private readGeneration(text: string): string {
    const parsed = GenerationSchema.safeParse(safeJson(text));
    if (!parsed.success) {
      throw new MalformedResponseError(`Unexpected response shape from ${this.model}`);
    }
    const data = parsed.data;
    const generated = Array.isArray(data) ? data[0].generated_text ?? data[0].answer : data.generated_text;
    if (!generated || !generated.trim()) {
      throw new MalformedResponseError(`Empty completion from ${this.model}`);
    }
    return generated;
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isAbort(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}
