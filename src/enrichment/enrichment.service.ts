import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectQueue } from '@nestjs/bullmq';
import { InjectRepository } from '@nestjs/typeorm';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Queue } from 'bullmq';
import { Counter } from 'prom-client';
import { Repository } from 'typeorm';
import type { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { instanceToPlain } from 'class-transformer';
import { v4 as uuidv4 } from 'uuid';
import { Account, EnrichmentState } from '../accounts/account.entity';
import { SettingsService } from '../settings/settings.service';
import { NotificationsService } from '../notifications/notifications.service';
import type { EnrichmentCompleteEvent } from '../notifications/enrichment-event';
import { ACCOUNT_ENRICHMENTS_TOTAL } from '../common/metrics.providers';
import type { EnvironmentVariables } from '../config/env.validation';
import {
  ENRICHMENT_QUEUE,
  EnrichmentJob,
  EnrichmentJobData,
} from './enrichment.constants';
import { EnrichmentResult, toEnrichmentResult } from './enrichment-output';

export interface EnrichmentAccepted {
  status: 'accepted';
  accountId: number;
  requestId: string;
}

export const AGENT_RESPONSE_EVENT = 'response';

/**
 * Owns the `ready ⇄ enriching` state of an account. Both transitions are
 * conditional updates, so a request is dispatched at most once and completed
 * at most once.
 */
@Injectable()
export class EnrichmentService {
  private readonly logger = new Logger(EnrichmentService.name);

  constructor(
    @InjectRepository(Account)
    private readonly accountRepository: Repository<Account>,
    @InjectQueue(ENRICHMENT_QUEUE)
    private readonly enrichmentQueue: Queue<EnrichmentJobData>,
    private readonly settingsService: SettingsService,
    private readonly notificationsService: NotificationsService,
    private readonly configService: ConfigService<EnvironmentVariables, true>,
    @InjectMetric(ACCOUNT_ENRICHMENTS_TOTAL)
    private readonly enrichmentsCounter: Counter<string>,
  ) {}

  async trigger(
    accountId: number,
    instructions?: string,
  ): Promise<EnrichmentAccepted> {
    if (!(await this.settingsService.isAgentConfigured())) {
      throw new BadRequestException(
        'Agent URL and API key must be configured in settings',
      );
    }

    const requestId = uuidv4();
    const claimed = await this.accountRepository.update(
      { id: accountId, enrichmentState: EnrichmentState.READY },
      {
        enrichmentState: EnrichmentState.ENRICHING,
        enrichmentRequestId: requestId,
      },
    );

    if (!claimed.affected) {
      const exists = await this.accountRepository.exists({
        where: { id: accountId },
      });
      if (!exists) {
        throw new NotFoundException('Account not found');
      }
      throw new ConflictException('Enrichment already in progress');
    }

    try {
      await this.enqueue(accountId, requestId, instructions);
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `Failed to queue enrichment ${requestId} for account ${accountId}: ${errorMessage}`,
      );
      await this.complete(accountId, requestId, {
        status: 'failed',
        error: 'Enrichment could not be queued',
      });
      throw new ServiceUnavailableException('Enrichment queue unavailable');
    }

    this.logger.log(`Enrichment ${requestId} accepted for account ${accountId}`);
    return { status: 'accepted', accountId, requestId };
  }

  /**
   * Moves the account back to `ready` if `requestId` is still its in-flight
   * request, merging the agent's fields on success. Returns false for stale
   * or duplicate completions, which change nothing and publish nothing.
   */
  async complete(
    accountId: number,
    requestId: string,
    result: EnrichmentResult,
  ): Promise<boolean> {
    const changes: QueryDeepPartialEntity<Account> = {
      enrichmentState: EnrichmentState.READY,
      enrichmentRequestId: null,
    };
    if (result.status === 'succeeded') {
      const { name, industry, website, notes } = result.fields;
      if (name !== undefined) changes.name = name;
      if (industry !== undefined) changes.industry = industry;
      if (website !== undefined) changes.website = website;
      if (notes !== undefined) changes.notes = notes;
    }

    const released = await this.accountRepository.update(
      {
        id: accountId,
        enrichmentState: EnrichmentState.ENRICHING,
        enrichmentRequestId: requestId,
      },
      changes,
    );

    if (!released.affected) {
      this.logger.debug(
        `Ignoring completion of ${requestId} for account ${accountId}: not in flight`,
      );
      return false;
    }

    this.enrichmentsCounter.inc({ outcome: result.status });

    const account = await this.accountRepository.findOne({
      where: { id: accountId },
    });

    const event: EnrichmentCompleteEvent = {
      type: 'enrichment_complete',
      accountId,
      requestId,
      status: result.status,
      account: account ? instanceToPlain(account) : { id: accountId },
    };
    if (result.status === 'failed') {
      event.error = result.error;
      this.logger.warn(
        `Enrichment ${requestId} for account ${accountId} failed: ${result.error}`,
      );
    } else {
      this.logger.log(
        `Enrichment ${requestId} for account ${accountId} applied (${Object.keys(result.fields).join(', ') || 'no changes'})`,
      );
    }

    this.notificationsService.publish(event);
    return true;
  }

  /**
   * Applies an agent callback. Progress events are ignored; a `response`
   * completes the request, as failed when no account object can be read.
   */
  async handleWebhook(
    accountId: number,
    requestId: string | undefined,
    eventType: string,
    body: unknown,
  ): Promise<void> {
    if (eventType !== AGENT_RESPONSE_EVENT) {
      this.logger.debug(`Ignoring ${eventType} event for account ${accountId}`);
      return;
    }

    if (!requestId) {
      this.logger.warn(
        `Agent response for account ${accountId} carried no request id`,
      );
      return;
    }

    await this.complete(accountId, requestId, toEnrichmentResult(body));
  }

  private async enqueue(
    accountId: number,
    requestId: string,
    instructions?: string,
  ): Promise<void> {
    await this.enrichmentQueue.add(
      EnrichmentJob.DISPATCH,
      { accountId, requestId, instructions },
      {
        jobId: `${EnrichmentJob.DISPATCH}-${requestId}`,
        attempts: 1,
        removeOnComplete: true,
        removeOnFail: 100,
      },
    );

    await this.enrichmentQueue.add(
      EnrichmentJob.EXPIRE,
      { accountId, requestId },
      {
        jobId: `${EnrichmentJob.EXPIRE}-${requestId}`,
        delay: this.configService.get('ENRICHMENT_TIMEOUT_MS', { infer: true }),
        attempts: 1,
        removeOnComplete: true,
        removeOnFail: 100,
      },
    );
  }
}
