import { Module } from '@nestjs/common';
import { CircuitBreakerFactory } from './circuit-breaker.factory';

@Module({
  providers: [CircuitBreakerFactory],
  exports: [CircuitBreakerFactory],
})
export class CircuitBreakerModule {}
