import { OracleError } from './types';
import type { ReasoningOracle } from './types';

export interface GeminiOracleOptions {
  apiKey: string;
  model: string;
  temperature?: number;
  baseUrl?: string;
}

const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

/** Oracle backed by the Gemini generateContent REST endpoint */
export class GeminiOracle implements ReasoningOracle {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly baseUrl: string;

  constructor(options: GeminiOracleOptions) {
    if (!options.apiKey) {
      throw new OracleError('Gemini API key is required');
    }
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.temperature = options.temperature ?? 0;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  }

  async decide(instruction: string, context: string): Promise<string> {
    const url = `${this.baseUrl}/models/${encodeURIComponent(this.model)}:generateContent?key=${encodeURIComponent(this.apiKey)}`;

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          systemInstruction: { parts: [{ text: instruction }] },
          contents: [
            {
              role: 'user',
              parts: [{ text: context || instruction }],
            },
          ],
          generationConfig: {
            temperature: this.temperature,
          },
        }),
      });
    } catch (err) {
      throw new OracleError(`Gemini request failed: ${err instanceof Error ? err.message : String(err)}`, 0, err);
    }

    if (!res.ok) {
      const errBody = await safeReadBody(res);
      throw new OracleError(`Gemini API error ${res.status} ${res.statusText}: ${errBody}`, res.status);
    }

    const json = (await res.json()) as GeminiGenerateContentResponse;
    return (
      json.candidates?.[0]?.content?.parts
        ?.map((p) => p.text)
        .filter(Boolean)
        .join('') ?? ''
    );
  }
}

async function safeReadBody(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch {
    return '';
  }
}

type GeminiGenerateContentResponse = {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string }>;
    };
  }>;
};
