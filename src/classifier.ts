import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { errorMessage } from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import { buildTitleQuery, sameTitle } from './titles';
import type { ClassificationResult, MediaKind } from './types';

export interface Classifier {
  classify(displayName: string, apiKey: string): Promise<ClassificationResult>;
}

export function unknownResult(title: string, reason: string): ClassificationResult {
  return { kind: 'unknown', normalizedTitle: title, confidence: 0, reason };
}

const omdbResponse = z.union([
  z.object({
    Response: z.literal('True'),
    Title: z.string(),
    Type: z.string(),
    Year: z.string().optional(),
  }),
  z.object({
    Response: z.literal('False'),
    Error: z.string().optional(),
  }),
]);

const OMDB_KINDS: Record<string, MediaKind> = {
  movie: 'movie',
  series: 'series',
  episode: 'series',
};

export type OmdbClassifierOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
  logger?: Logger;
};

// Movie/series lookup against the OMDb title endpoint.
// Never throws: network errors, timeouts, rate limiting and misses all come back as `unknown`.
export class OmdbClassifier implements Classifier {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(options: OmdbClassifierOptions = {}) {
    this.baseUrl = options.baseUrl ?? 'https://www.omdbapi.com/';
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.http = options.http ?? axios.create();
    this.logger = options.logger ?? defaultLogger;
  }

  async classify(displayName: string, apiKey: string): Promise<ClassificationResult> {
    const query = buildTitleQuery(displayName);
    if (query.title.length === 0) return unknownResult(displayName, 'empty title');

    // Ask the service, bounded by the timeout
    let body: unknown;
    try {
      const res = await this.http.get<unknown>(this.baseUrl, {
        params: {
          apikey: apiKey,
          t: query.title,
          y: query.year,
          type: query.episodic ? 'series' : undefined,
        },
        timeout: this.timeoutMs,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      body = res.data;
    } catch (err) {
      const reason = describeFailure(err);
      this.logger.debug({ title: query.title, reason }, 'OMDb lookup failed');
      return unknownResult(query.title, reason);
    }

    // Only movie and series answers route an item
    const parsed = omdbResponse.safeParse(body);
    if (!parsed.success) return unknownResult(query.title, 'unexpected response');
    if (parsed.data.Response === 'False') return unknownResult(query.title, parsed.data.Error ?? 'no match');

    const kind = OMDB_KINDS[parsed.data.Type.toLowerCase()];
    if (kind === undefined) return unknownResult(query.title, `unsupported type ${parsed.data.Type}`);
    return {
      kind,
      normalizedTitle: parsed.data.Title,
      confidence: sameTitle(parsed.data.Title, query.title) ? 1 : 0.6,
    };
  }
}

// Short reason recorded on the unknown result
function describeFailure(err: unknown): string {
  if (axios.isAxiosError(err)) {
    if (err.response?.status === 401 || err.response?.status === 429) return `rate limited or unauthorized (HTTP ${err.response.status})`;
    if (err.response) return `HTTP ${err.response.status}`;
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT' || err.code === 'ERR_CANCELED') return 'timeout';
    return err.message;
  }
  return errorMessage(err);
}
