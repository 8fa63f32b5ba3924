import { Controller, Get } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import {
  CircuitBreakerFactory,
  CircuitHealth,
} from './common/circuit-breaker.factory';

export interface HealthReport {
  status: 'ok' | 'degraded';
  database: 'up' | 'down';
  circuits: Record<string, CircuitHealth>;
}

@Controller()
export class AppController {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly breakerFactory: CircuitBreakerFactory,
  ) {}

  // An open agent circuit degrades the service but it still answers
  @Get('health')
  health(): HealthReport {
    return {
      status: this.breakerFactory.hasOpenCircuits() ? 'degraded' : 'ok',
      database: this.dataSource.isInitialized ? 'up' : 'down',
      circuits: this.breakerFactory.health(),
    };
  }
}
