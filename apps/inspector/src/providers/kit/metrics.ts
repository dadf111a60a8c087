import { ParseFailedError } from '../../lib/errors.js'
import type { Labels, UsageMetric } from '../../types.js'

/**
 * Field readers for a quota. Each is called in order, after the previous
 * metric was recorded, so a malformed later field keeps the earlier ones.
 */
export interface QuotaReader {
  used: () => number
  limit: () => number
  /** Derived as limit - used when absent */
  remaining?: () => number
}

/**
 * Accumulates normalized metrics for one provider inspection.
 * Every metric carries the base labels and the same observation time.
 */
export class MetricCollector {
  private readonly collected: UsageMetric[] = []

  constructor(
    private readonly provider: string,
    private readonly baseLabels: Labels,
    private readonly observedAt: Date
  ) {}

  /**
   * @throws ParseFailedError when the value is not a finite number
   */
  add(metricName: string, value: number, labels: Labels = {}): void {
    if (!Number.isFinite(value)) {
      throw new ParseFailedError(`Value for ${metricName} is not a finite number`)
    }
    this.collected.push({
      provider: this.provider,
      metricName,
      value,
      labels: { ...this.baseLabels, ...labels },
      observedAt: this.observedAt,
    })
  }

  /**
   * Record usage_used, usage_limit, usage_remaining and usage_ratio.
   * The ratio is skipped when the limit is zero.
   */
  quota(reader: QuotaReader, labels: Labels = {}): void {
    const used = reader.used()
    this.add('usage_used', used, labels)
    const limit = reader.limit()
    this.add('usage_limit', limit, labels)
    this.add('usage_remaining', reader.remaining ? reader.remaining() : limit - used, labels)
    if (limit > 0) {
      this.add('usage_ratio', used / limit, labels)
    }
  }

  get size(): number {
    return this.collected.length
  }

  toArray(): UsageMetric[] {
    return [...this.collected]
  }
}
