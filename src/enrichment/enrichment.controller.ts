import {
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiTokenGuard } from '../auth/api-token.guard';
import {
  AGENT_RESPONSE_EVENT,
  EnrichmentAccepted,
  EnrichmentService,
} from './enrichment.service';
import { TriggerEnrichmentDto } from './dto/trigger-enrichment.dto';

@Controller()
export class EnrichmentController {
  constructor(private readonly enrichmentService: EnrichmentService) {}

  @Post('api/accounts/:id/enrich')
  @UseGuards(ApiTokenGuard)
  @HttpCode(HttpStatus.ACCEPTED)
  trigger(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: TriggerEnrichmentDto,
  ): Promise<EnrichmentAccepted> {
    return this.enrichmentService.trigger(id, dto.instructions);
  }

  // Called by the agent; the request id in the query identifies the run
  @Post('webhook/:accountId')
  @HttpCode(HttpStatus.OK)
  async webhook(
    @Param('accountId', ParseIntPipe) accountId: number,
    @Query('request') requestId: string | undefined,
    @Headers('x-agent-event-type') eventType: string | undefined,
    @Body() body: unknown,
  ): Promise<{ status: 'received' }> {
    await this.enrichmentService.handleWebhook(
      accountId,
      requestId,
      eventType || AGENT_RESPONSE_EVENT,
      body,
    );
    return { status: 'received' };
  }
}
