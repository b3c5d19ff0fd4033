import { fetchWithTimeout, TimeoutError, type FetchFn } from '../utils/timeout.js';
import { type IntelligenceOracle, type OracleRequest, OracleUnavailableError } from './oracle.js';

export interface OpenRouterOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
}

interface ChatCompletionBody {
  model: string;
  messages: { role: 'system' | 'user' | 'assistant'; content: string }[];
  temperature?: number;
  response_format?: { type: 'json_object' };
}

function readContent(data: unknown): string | undefined {
  if (data === null || typeof data !== 'object' || !('choices' in data) || !Array.isArray(data.choices)) {
    return undefined;
  }
  const first: unknown = data.choices[0];
  if (first === null || typeof first !== 'object' || !('message' in first)) return undefined;
  const message: unknown = first.message;
  if (message === null || typeof message !== 'object' || !('content' in message)) return undefined;
  return typeof message.content === 'string' ? message.content : undefined;
}

/** OpenAI-compatible chat completions over HTTP (OpenRouter, Groq). */
export class OpenRouterOracle implements IntelligenceOracle {
  readonly name = 'openrouter';

  constructor(private readonly options: OpenRouterOptions) {}

  async complete(request: OracleRequest): Promise<string> {
    const body: ChatCompletionBody = {
      model: this.options.model,
      messages: [{ role: 'system', content: request.system }, ...request.messages],
    };
    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }
    if (request.json) {
      body.response_format = { type: 'json_object' };
    }

    let reply: { status: number; ok: boolean; text: string };
    try {
      reply = await fetchWithTimeout(
        this.options.baseUrl,
        {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${this.options.apiKey}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(body),
        },
        this.options.timeoutMs,
        async (response) => ({ status: response.status, ok: response.ok, text: await response.text() }),
        this.options.fetchFn,
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new OracleUnavailableError('timeout', error.message);
      }
      throw new OracleUnavailableError('transport', error instanceof Error ? error.message : String(error));
    }

    if (reply.status === 429) {
      throw new OracleUnavailableError('rate-limit', 'AI API rate limit [429]');
    }
    if (!reply.ok) {
      throw new OracleUnavailableError('transport', `AI API error [${reply.status}]: ${reply.text.slice(0, 200)}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(reply.text);
    } catch {
      throw new OracleUnavailableError('malformed', 'AI API returned a non-JSON body');
    }

    const content = readContent(data);
    if (content === undefined) {
      throw new OracleUnavailableError('malformed', `AI returned unexpected format: ${JSON.stringify(data).slice(0, 200)}`);
    }
    return content;
  }
}
