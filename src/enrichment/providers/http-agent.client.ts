import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import CircuitBreaker from 'opossum';
import { CircuitBreakerFactory } from '../../common/circuit-breaker.factory';
import type { EnvironmentVariables } from '../../config/env.validation';
import type {
  AgentClient,
  AgentRunRequest,
  AgentRunResponse,
} from '../interfaces/agent-client.interface';

export class AgentRequestError extends Error {
  constructor(
    message: string,
    readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'AgentRequestError';
  }
}

/**
 * Calls `POST {agentUrl}/run` through a circuit breaker. Any 2xx answer is
 * accepted; a JSON body with a `result` key is passed back to the caller.
 */
@Injectable()
export class HttpAgentClient implements AgentClient {
  private readonly logger = new Logger(HttpAgentClient.name);
  private readonly breaker: CircuitBreaker<[AgentRunRequest], AgentRunResponse>;
  private readonly timeoutMs: number;

  constructor(
    breakerFactory: CircuitBreakerFactory,
    configService: ConfigService<EnvironmentVariables, true>,
  ) {
    this.timeoutMs = configService.get('AGENT_TIMEOUT_MS', { infer: true });
    this.breaker = breakerFactory.createBreaker(
      'agent-run',
      (request: AgentRunRequest) => this.post(request),
      { timeout: this.timeoutMs },
    );
  }

  run(request: AgentRunRequest): Promise<AgentRunResponse> {
    return this.breaker.fire(request);
  }

  private async post(request: AgentRunRequest): Promise<AgentRunResponse> {
    const url = `${request.agentUrl.replace(/\/+$/, '')}/run`;

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': request.apiKey,
      },
      body: JSON.stringify({ prompt: request.prompt, webhook: request.webhook }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new AgentRequestError(
        `Agent responded with ${response.status} ${response.statusText}`.trim(),
        response.status,
      );
    }

    const text = await response.text();
    if (!text) return {};

    try {
      const body: unknown = JSON.parse(text);
      if (typeof body === 'object' && body !== null && 'result' in body) {
        return { result: body.result };
      }
    } catch {
      this.logger.debug(`Agent answered ${url} with a non-JSON body`);
    }
    return {};
  }
}
