import type { ErrorCode } from './codes';
import type { VoiceError } from './types';

const MAX_SAMPLES = 5;

export interface ErrorStats {
  code: ErrorCode;
  count: number;
  lastOccurrence: string;
  samples: string[];
}

/**
 * Counts voice errors by code so repeated device or service failures are
 * visible without digging through the log.
 */
export class ErrorAggregator {
  private stats: Map<ErrorCode, ErrorStats> = new Map();

  record(error: VoiceError): void {
    const timestamp = new Date().toISOString();
    const existing = this.stats.get(error.code);
    if (existing) {
      existing.count += 1;
      existing.lastOccurrence = timestamp;
      if (existing.samples.length < MAX_SAMPLES) {
        existing.samples.push(error.message);
      }
      return;
    }
    this.stats.set(error.code, {
      code: error.code,
      count: 1,
      lastOccurrence: timestamp,
      samples: [error.message],
    });
  }

  getCount(code: ErrorCode): number {
    return this.stats.get(code)?.count ?? 0;
  }

  getStats(): ErrorStats[] {
    return Array.from(this.stats.values()).map((entry) => ({ ...entry, samples: [...entry.samples] }));
  }

  clear(): void {
    this.stats.clear();
  }
}
