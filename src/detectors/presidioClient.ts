/**
 * Presidio Analyzer Client
 * HTTP client for a Presidio analyzer service (POST /analyze, GET /health).
 */
import { z } from 'zod';
import { AnalyzerError, errorMessage } from '../core/errors.js';

export const AnalyzerResultSchema = z.object({
  entity_type: z.string(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  score: z.number().optional(),
});
export type AnalyzerResult = z.infer<typeof AnalyzerResultSchema>;

const AnalyzeResponseSchema = z.array(AnalyzerResultSchema);

export interface AnalyzeRequest {
  text: string;
  entities: readonly string[];
  language: string;
}

/**
 * Anything that can answer an analyze request with offset-based results.
 */
export interface AnalyzerEngine {
  analyze(request: AnalyzeRequest): Promise<AnalyzerResult[]>;
}

export interface PresidioClientOptions {
  url: string;
  timeoutMs?: number;
  scoreThreshold?: number;
}

export class PresidioClient implements AnalyzerEngine {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly scoreThreshold?: number;

  constructor(opts: PresidioClientOptions) {
    const parsed = new URL(opts.url);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error(`Unsupported analyzer protocol: ${parsed.protocol}`);
    }
    this.baseUrl = opts.url.replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.scoreThreshold = opts.scoreThreshold;
  }

  async analyze(request: AnalyzeRequest): Promise<AnalyzerResult[]> {
    const response = await this.send('/analyze', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        text: request.text,
        language: request.language,
        entities: request.entities,
        ...(this.scoreThreshold !== undefined ? { score_threshold: this.scoreThreshold } : {}),
      }),
    });

    if (!response.ok) {
      const message = await response.text();
      throw new AnalyzerError(
        `Presidio analyze failed: HTTP ${response.status} - ${message}`,
        { status: response.status },
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new AnalyzerError('Presidio analyze returned non-JSON body', { cause: err });
    }

    const parsed = AnalyzeResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AnalyzerError('Presidio analyze returned an unexpected payload', { cause: parsed.error });
    }
    return parsed.data;
  }

  /**
   * True when the service answers its health endpoint with 2xx.
   */
  async health(): Promise<boolean> {
    const response = await this.send('/health', { method: 'GET' });
    return response.ok;
  }

  private async send(path: string, init: RequestInit): Promise<Response> {
    try {
      return await fetch(`${this.baseUrl}${path}`, {
        ...init,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new AnalyzerError(`Presidio request timed out after ${this.timeoutMs}ms`, { cause: err });
      }
      throw new AnalyzerError(`Presidio unreachable at ${this.baseUrl}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
