import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/**
 * Monotonic chain clock in unix seconds. Reads never go backwards even if the
 * host clock does. `advance` plays the part of a block-time jump for local runs.
 */
@Injectable()
export class ChainClockService {
  private readonly logger = new Logger(ChainClockService.name);
  private frozenAt: number | null = null;
  private offset = 0;
  private last = 0;

  constructor(private configService: ConfigService) {
    const frozen = this.configService.get<string>('CHAIN_CLOCK_FROZEN_AT', '');
    if (frozen !== '') {
      const at = Number(frozen);
      if (!Number.isInteger(at) || at < 0) {
        throw new Error(`CHAIN_CLOCK_FROZEN_AT must be a unix timestamp in seconds, got "${frozen}"`);
      }
      this.freeze(at);
    }
  }

  now(): number {
    const base = this.frozenAt ?? Math.floor(Date.now() / 1000);
    this.last = Math.max(this.last, base + this.offset);
    return this.last;
  }

  freeze(at: number): void {
    this.frozenAt = at;
    this.offset = 0;
    this.last = Math.max(this.last, at);
    this.logger.log(`Chain clock frozen at ${at}`);
  }

  advance(seconds: number): number {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new Error(`Clock can only advance by a non-negative whole number of seconds, got ${seconds}`);
    }
    this.offset += seconds;
    const now = this.now();
    this.logger.log(`Chain clock advanced by ${seconds}s to ${now}`);
    return now;
  }
}
