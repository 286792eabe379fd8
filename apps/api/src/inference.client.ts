import { Inject, Injectable, Logger } from '@nestjs/common';
import { setTimeout as sleep } from 'timers/promises';
import { APP_CONFIG, AppConfig } from './config';
import { MalformedResponseError, ModelLoadingError } from './errors';
import { HuggingFaceEndpoint } from './huggingface.endpoint';
import { OpenAiChatEndpoint } from './openai.endpoint';
import { CompletionRequest, InferenceEndpoint } from './types';

export const SQL_ENDPOINT = Symbol('SQL_ENDPOINT');
export const VISION_ENDPOINT = Symbol('VISION_ENDPOINT');

export function createInferenceEndpoint(config: AppConfig, model: string): InferenceEndpoint {
  if (config.provider === 'openai') {
    if (!config.apiToken) throw new Error('OPENAI_API_KEY missing');
    return new OpenAiChatEndpoint(model, config.apiToken);
  }
  return new HuggingFaceEndpoint(config.hfApiUrl, model, config.apiToken);
}

const NAME = String.raw`[\x60"[]?[A-Za-z_][\w$.]*[\x60"\]]?`;

// A keyword only opens a statement when followed by what SQL puts after it,
// so prose such as "With the schema above" or "Select the rows" is skipped.
const STATEMENT_OPENERS = [
  String.raw`SELECT\s+(?:\*|DISTINCT\b|ALL\b|CASE\b|['"\x60[(]|\d|[A-Za-z_][\w$]*\s*(?:[,.(*]|\s(?:AS|FROM)\b|$))`,
  String.raw`WITH\s+(?:RECURSIVE\b|${NAME}\s*(?:\([^)]*\)\s*)?AS\s*(?:(?:NOT\s+)?MATERIALIZED\s*)?\()`,
  String.raw`INSERT\s+(?:OR\s+[A-Za-z]+\s+)?INTO\s+${NAME}`,
  String.raw`REPLACE\s+INTO\s+${NAME}`,
  String.raw`UPDATE\s+(?:OR\s+[A-Za-z]+\s+)?${NAME}\s+SET\b`,
  String.raw`DELETE\s+FROM\s+${NAME}`,
  String.raw`CREATE\s+(?:(?:TEMP|TEMPORARY|UNIQUE|VIRTUAL)\s+)?(?:TABLE|VIEW|INDEX|TRIGGER)\b`,
  String.raw`DROP\s+(?:TABLE|VIEW|INDEX|TRIGGER)\b`,
  String.raw`ALTER\s+TABLE\s+${NAME}`,
  String.raw`PRAGMA\s+[A-Za-z_]\w*`,
].join('|');

const STATEMENT_AT_LINE_START = new RegExp(String.raw`^[ \t]*(?:${STATEMENT_OPENERS})`, 'im');
const STATEMENT_ANYWHERE = new RegExp(String.raw`\b(?:${STATEMENT_OPENERS})`, 'im');

function findSqlStart(text: string): number {
  const match = STATEMENT_AT_LINE_START.exec(text) ?? STATEMENT_ANYWHERE.exec(text);
  return match ? match.index : -1;
}

/** Index just past the statement: its first unquoted `;`, else the first blank line, `##` heading or fence. */
function statementEnd(text: string): number {
  let quote: string | undefined;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (text.startsWith('```', i) || (ch === '\n' && /^\n[ \t\r]*(?:\n|#{2,})/.test(text.slice(i)))) return i;
    if (quote) {
      if (ch === quote) quote = undefined;
    } else if (ch === "'" || ch === '"' || ch === '`') {
      quote = ch;
    } else if (ch === ';') {
      return i + 1;
    }
  }
  return text.length;
}

/**
 * Pulls the SQL statement out of free-form model output: code fences,
 * "SQL:"-style prefixes and surrounding explanation are dropped, and the
 * statement ends at its first semicolon outside a quoted literal, or at a
 * blank line or markdown heading. Returns '' when no statement is present.
 */
export function extractSql(raw: string): string {
  const fenced = /```[a-zA-Z]*\s*([\s\S]*?)```/.exec(raw);
  let text = (fenced ? fenced[1] : raw).trim();
  text = text.replace(/^(?:SQL|Query|Answer)\s*:\s*/i, '');

  const start = findSqlStart(text);
  if (start < 0) return '';
  text = text.slice(start).trimStart();
  text = text.slice(0, statementEnd(text));

  return text.replace(/\s+/g, ' ').trim();
}

@Injectable()
export class InferenceClient {
  private readonly logger = new Logger(InferenceClient.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(SQL_ENDPOINT) private readonly sqlEndpoint: InferenceEndpoint,
    @Inject(VISION_ENDPOINT) private readonly visionEndpoint: InferenceEndpoint,
  ) {}

  async generateSql(prompt: string): Promise<string> {
    const raw = await this.complete(this.sqlEndpoint, { prompt });
    const sql = extractSql(raw);
    if (!sql) {
      this.logger.warn(`No SQL found in completion from ${this.sqlEndpoint.model}: ${raw.slice(0, 120)}`);
      throw new MalformedResponseError(`No SQL statement found in the response from ${this.sqlEndpoint.model}`);
    }
    return sql;
  }

  describeImage(image: { data: Buffer; mimeType: string }, instruction: string): Promise<string> {
    return this.complete(this.visionEndpoint, { prompt: instruction, image });
  }

  /**
   * Calls the endpoint, retrying only while it reports a cold start. After
   * `loadingMaxRetries` retries the ModelLoadingError surfaces; every other
   * failure surfaces on the first attempt.
   */
  async complete(endpoint: InferenceEndpoint, request: CompletionRequest): Promise<string> {
    const { loadingMaxRetries, loadingRetryDelayMs, timeoutMs } = this.config;
    for (let attempt = 0; ; attempt++) {
      try {
        return await endpoint.complete(request, { timeoutMs });
      } catch (error) {
        if (!(error instanceof ModelLoadingError) || attempt >= loadingMaxRetries) throw error;
        this.logger.warn(
          `Model ${endpoint.model} is loading, retry ${attempt + 1}/${loadingMaxRetries} in ${loadingRetryDelayMs}ms`,
        );
        await sleep(loadingRetryDelayMs);
      }
    }
  }
}
