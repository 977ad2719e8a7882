import { randomUUID } from 'crypto';
import { z } from 'zod';
import { fetchWithRetry } from './fetch-with-timeout';
import { TimeoutError, UpstreamUnavailableError, describeError } from './errors';
import type { Logger } from './logger';

export interface GraphClientConfig {
  serviceName: string;
  url: string;
  apiKey?: string;
  timeout?: number;
  retries?: number;
  retryDelay?: number;
}

const graphEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

/**
 * GraphQL client for Graph gateway subgraphs. Every failure mode (transport,
 * HTTP status, GraphQL errors, unexpected shape) surfaces as
 * UpstreamUnavailableError tagged with the service name.
 *
 * @example
 * const client = new GraphClient({ serviceName: 'network-subgraph', url }, logger);
 * const data = await client.query(QUERY, { first: 10 }, schema);
 */
export class GraphClient {
  private readonly timeout: number;
  private readonly retries: number;
  private readonly retryDelay: number;

  constructor(
    private readonly config: GraphClientConfig,
    private readonly logger: Logger
  ) {
    this.timeout = config.timeout ?? 30000;
    this.retries = config.retries ?? 3;
    this.retryDelay = config.retryDelay ?? 1000;
  }

  get serviceName(): string {
    return this.config.serviceName;
  }

  async query<T>(
    query: string,
    variables: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const requestId = randomUUID();
    const startTime = Date.now();
    const context = { requestId, service: this.serviceName, url: this.config.url };

    this.logger.debug(context, 'GraphQL request started');

    let response: Response;
    try {
      response = await fetchWithRetry(this.config.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.config.apiKey && { Authorization: `Bearer ${this.config.apiKey}` }),
        },
        body: JSON.stringify({ query, variables }),
        timeout: this.timeout,
        retries: this.retries,
        retryDelay: this.retryDelay,
      });
    } catch (error) {
      const duration = Date.now() - startTime;
      if (error instanceof TimeoutError) {
        this.logger.warn({ ...context, timeout: this.timeout, duration }, 'GraphQL request timeout');
      } else {
        this.logger.error({ ...context, duration, error: describeError(error) }, 'GraphQL request exception');
      }
      throw new UpstreamUnavailableError(this.serviceName, describeError(error), error);
    }

    const duration = Date.now() - startTime;

    if (!response.ok) {
      const errorBody = await response.text();
      this.logger.error(
        { ...context, status: response.status, duration, errorBody: errorBody.substring(0, 500) },
        'GraphQL request failed'
      );
      throw new UpstreamUnavailableError(this.serviceName, `HTTP ${response.status}: ${errorBody.substring(0, 200)}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new UpstreamUnavailableError(this.serviceName, 'response is not valid JSON', error);
    }

    const envelope = graphEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new UpstreamUnavailableError(this.serviceName, 'response is not a GraphQL envelope', envelope.error);
    }

    if (envelope.data.errors && envelope.data.errors.length > 0) {
      const messages = envelope.data.errors.map((entry) => entry.message).join('; ');
      this.logger.error({ ...context, duration, errors: messages }, 'GraphQL errors');
      throw new UpstreamUnavailableError(this.serviceName, `GraphQL errors: ${messages}`);
    }

    const parsed = schema.safeParse(envelope.data.data);
    if (!parsed.success) {
      this.logger.error({ ...context, duration, issues: parsed.error.issues }, 'GraphQL response has unexpected shape');
      throw new UpstreamUnavailableError(this.serviceName, 'malformed response data', parsed.error);
    }

    this.logger.debug({ ...context, status: response.status, duration }, 'GraphQL request success');

    return parsed.data;
  }
}
