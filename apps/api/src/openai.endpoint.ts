import { ChatOpenAI } from '@langchain/openai';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { MalformedResponseError, ModelLoadingError, NetworkError, RateLimitedError, messageOf } from './errors';
import { CompletionRequest, InferenceEndpoint } from './types';

const SYSTEM = 'You are a precise assistant for relational database schemas and SQL. Follow the output format exactly.';

/** OpenAI chat model through LangChain. Retries are owned by InferenceClient, so the SDK's own are off. */
export class OpenAiChatEndpoint implements InferenceEndpoint {
  private readonly llm: ChatOpenAI;

  constructor(readonly model: string, apiKey: string) {
    this.llm = new ChatOpenAI({
      apiKey,
      model,
      temperature: 0,
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest, options: { timeoutMs: number }): Promise<string> {
    const human = request.image
      ? new HumanMessage({
          content: [
            { type: 'text', text: request.prompt },
            {
              type: 'image_url',
              image_url: { url: `data:${request.image.mimeType};base64,${request.image.data.toString('base64')}` },
            },
          ],
        })
      : new HumanMessage(request.prompt);

    let content: unknown;
    try {
      const resp = await this.llm.invoke([new SystemMessage(SYSTEM), human], {
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      content = resp.content;
    } catch (error) {
      throw toInferenceError(error, this.model);
    }

    const text = textOf(content);
    if (!text.trim()) throw new MalformedResponseError(`Empty completion from ${this.model}`);
    return text;
  }
}

function textOf(content: unknown): string {
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return '';
  return content
    .map((part: unknown) =>
      typeof part === 'object' && part !== null && 'text' in part && typeof part.text === 'string' ? part.text : '',
    )
    .join('');
}

function toInferenceError(error: unknown, model: string): Error {
  const status =
    typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
      ? error.status
      : undefined;
  if (status === 429) return new RateLimitedError(`OpenAI rate limited the request: ${messageOf(error)}`);
  if (status === 503) return new ModelLoadingError(`Model ${model} is temporarily unavailable`);
  return new NetworkError(`OpenAI request failed: ${messageOf(error)}`, status);
}
