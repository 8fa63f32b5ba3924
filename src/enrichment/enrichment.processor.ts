import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Inject, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Job } from 'bullmq';
import { Histogram } from 'prom-client';
import { Repository } from 'typeorm';
import { Account } from '../accounts/account.entity';
import { SettingsService } from '../settings/settings.service';
import { AGENT_DISPATCH_DURATION } from '../common/metrics.providers';
import { EnrichmentService } from './enrichment.service';
import {
  ENRICHMENT_QUEUE,
  EnrichmentJob,
  EnrichmentJobData,
} from './enrichment.constants';
import { buildPrompt, webhookUrl } from './enrichment-prompt';
import { toEnrichmentResult } from './enrichment-output';
import {
  AGENT_CLIENT,
  AgentRunResponse,
} from './interfaces/agent-client.interface';
import type { AgentClient } from './interfaces/agent-client.interface';

export const ENRICHMENT_TIMED_OUT = 'Enrichment timed out';

@Processor(ENRICHMENT_QUEUE)
export class EnrichmentProcessor extends WorkerHost {
  private readonly logger = new Logger(EnrichmentProcessor.name);

  constructor(
    @InjectRepository(Account)
    private readonly accountRepository: Repository<Account>,
    @Inject(AGENT_CLIENT) private readonly agentClient: AgentClient,
    private readonly enrichmentService: EnrichmentService,
    private readonly settingsService: SettingsService,
    @InjectMetric(AGENT_DISPATCH_DURATION)
    private readonly dispatchDuration: Histogram<string>,
  ) {
    super();
  }

  async process(job: Job<EnrichmentJobData, void, string>): Promise<void> {
    switch (job.name) {
      case EnrichmentJob.DISPATCH:
        return this.dispatch(job.data);
      case EnrichmentJob.EXPIRE:
        return this.expire(job.data);
      default:
        this.logger.warn(`Unknown enrichment job "${job.name}" (${job.id})`);
    }
  }

  /**
   * Sends the account to the agent. Every failure ends the request, so the
   * account never stays `enriching` because of a broken call.
   */
  private async dispatch({
    accountId,
    requestId,
    instructions,
  }: EnrichmentJobData): Promise<void> {
    const account = await this.accountRepository.findOne({
      where: { id: accountId },
    });
    if (!account || account.enrichmentRequestId !== requestId) {
      this.logger.log(
        `Skipping dispatch of ${requestId}: account ${accountId} no longer waits for it`,
      );
      return;
    }

    const settings = await this.settingsService.get();
    if (!settings.agentUrl || !settings.agentApiKey) {
      await this.enrichmentService.complete(accountId, requestId, {
        status: 'failed',
        error: 'Agent is not configured',
      });
      return;
    }

    this.logger.log(
      `Dispatching enrichment ${requestId} for account ${accountId}`,
    );

    let response: AgentRunResponse;
    const endTimer = this.dispatchDuration.startTimer();
    try {
      response = await this.agentClient.run({
        agentUrl: settings.agentUrl,
        apiKey: settings.agentApiKey,
        prompt: buildPrompt(account, instructions),
        webhook: webhookUrl(settings.baseUrl, accountId, requestId),
      });
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `AGENT_DISPATCH_ERROR: ${errorMessage} (account ${accountId})`,
      );
      await this.enrichmentService.complete(accountId, requestId, {
        status: 'failed',
        error: `Agent call failed: ${errorMessage}`,
      });
      return;
    } finally {
      endTimer();
    }

    if (response.result === undefined) {
      this.logger.log(`Enrichment ${requestId} dispatched, awaiting webhook`);
      return;
    }

    await this.enrichmentService.complete(
      accountId,
      requestId,
      toEnrichmentResult(response.result),
    );
  }

  private async expire({
    accountId,
    requestId,
  }: EnrichmentJobData): Promise<void> {
    const expired = await this.enrichmentService.complete(
      accountId,
      requestId,
      { status: 'failed', error: ENRICHMENT_TIMED_OUT },
    );

    if (expired) {
      this.logger.warn(
        `Enrichment ${requestId} for account ${accountId} timed out`,
      );
    }
  }
}
