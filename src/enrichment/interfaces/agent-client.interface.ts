export interface AgentRunRequest {
  agentUrl: string;
  apiKey: string;
  prompt: string;
  webhook: string;
}

/**
 * What the agent answered to the run request. Agents that finish
 * synchronously put their output in `result`; the others report later
 * through the webhook.
 */
export interface AgentRunResponse {
  result?: unknown;
}

export interface AgentClient {
  run(request: AgentRunRequest): Promise<AgentRunResponse>;
}

export const AGENT_CLIENT = 'AGENT_CLIENT';
