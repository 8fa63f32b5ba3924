import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import type {
  AgentClient,
  AgentRunRequest,
  AgentRunResponse,
} from '../interfaces/agent-client.interface';

const PromptSchema = z.object({
  account: z.object({
    name: z.string(),
    website: z.string().nullable().optional(),
  }),
});

/**
 * Answers synchronously without leaving the process. Accounts without a
 * website get one derived from their name.
 */
@Injectable()
export class MockAgentClient implements AgentClient {
  private readonly logger = new Logger(MockAgentClient.name);

  run(request: AgentRunRequest): Promise<AgentRunResponse> {
    let body: unknown;
    try {
      body = JSON.parse(request.prompt);
    } catch {
      body = undefined;
    }

    const prompt = PromptSchema.safeParse(body);
    if (!prompt.success) {
      return Promise.resolve({ result: {} });
    }

    const { name, website } = prompt.data.account;
    const slug = name.toLowerCase().replace(/[^a-z0-9]+/g, '');
    this.logger.log(`Mock agent enriching "${name}"`);

    return Promise.resolve({
      result: {
        website: website ?? `https://${slug || 'example'}.example.com`,
        notes: `Enriched by the mock agent for ${name}`,
      },
    });
  }
}
