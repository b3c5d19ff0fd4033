import { GoogleGenAI } from '@google/genai';
import { TimeoutError, withTimeout } from '../utils/timeout.js';
import { type IntelligenceOracle, type OracleRequest, OracleUnavailableError } from './oracle.js';

export interface GeminiOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

/** Narrow view of the SDK surface this oracle uses; lets tests pass a fake client. */
export interface GenerateContentClient {
  models: {
    generateContent(params: {
      model: string;
      contents: { role: 'user' | 'model'; parts: { text: string }[] }[];
      config?: { systemInstruction?: string; temperature?: number; responseMimeType?: string };
    }): Promise<{ text?: string }>;
  };
}

function isRateLimit(error: unknown): boolean {
  if (error === null || typeof error !== 'object') return false;
  if ('status' in error && error.status === 429) return true;
  if ('code' in error && error.code === 429) return true;
  return error instanceof Error && error.message.includes('429');
}

export class GeminiOracle implements IntelligenceOracle {
  readonly name = 'gemini';
  private ai: GenerateContentClient;

  constructor(
    private readonly options: GeminiOptions,
    client?: GenerateContentClient,
  ) {
    this.ai = client ?? new GoogleGenAI({ apiKey: options.apiKey });
  }

  async complete(request: OracleRequest): Promise<string> {
    const contents = request.messages.map((m) => ({
      role: m.role === 'assistant' ? ('model' as const) : ('user' as const),
      parts: [{ text: m.content }],
    }));

    let text: string | undefined;
    try {
      const response = await withTimeout(
        this.ai.models.generateContent({
          model: this.options.model,
          contents,
          config: {
            systemInstruction: request.system,
            temperature: request.temperature,
            responseMimeType: request.json ? 'application/json' : undefined,
          },
        }),
        this.options.timeoutMs,
        'Gemini generateContent',
      );
      text = response.text;
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new OracleUnavailableError('timeout', error.message);
      }
      if (isRateLimit(error)) {
        throw new OracleUnavailableError('rate-limit', 'Gemini rate limit [429]');
      }
      throw new OracleUnavailableError('transport', error instanceof Error ? error.message : String(error));
    }

    if (!text?.trim()) {
      throw new OracleUnavailableError('malformed', 'Gemini returned an empty response');
    }
    return text;
  }
}
