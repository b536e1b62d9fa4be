import { Classification } from '../types';
import { logger } from '../utils/logger';

interface DetectionMetric {
  requestId: string;
  result: Classification;
  confidence: number;
  processingTime: number;
  language: string;
  timestamp: Date;
}

interface ErrorMetric {
  requestId: string;
  errorType: string;
  errorMessage: string;
  processingTime: number;
  timestamp: Date;
}

export interface MetricsSnapshot {
  total: {
    detections: number;
    errors: number;
  };
  last24Hours: {
    detections: number;
    aiGenerated: number;
    human: number;
    avgConfidence: number;
    avgProcessingTime: number;
  };
  lastHour: {
    detections: number;
    errors: number;
  };
  languages: Record<string, number>;
}

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

const since = <T extends { timestamp: Date }>(items: readonly T[], now: number, windowMs: number): T[] =>
  items.filter(item => now - item.timestamp.getTime() < windowMs);

// Drops the oldest entries once the buffer is over capacity
const appendCapped = <T>(items: T[], item: T, capacity: number): T[] => {
  items.push(item);
  return items.length > capacity ? items.slice(-capacity) : items;
};

const countLabels = (detections: readonly DetectionMetric[]): Map<Classification, number> => {
  const counts = new Map(Object.values(Classification).map((label): [Classification, number] => [label, 0]));
  for (const { result } of detections) {
    counts.set(result, (counts.get(result) ?? 0) + 1);
  }
  return counts;
};

const countLanguages = (detections: readonly DetectionMetric[]): Record<string, number> => {
  const counts: Record<string, number> = {};
  for (const { language } of detections) {
    counts[language] = (counts[language] ?? 0) + 1;
  }
  return counts;
};

const average = (values: readonly number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

/**
 * Metrics Collector
 * In-memory detection and error history behind the metrics endpoint
 */
export class MetricsCollector {
  private static detections: DetectionMetric[] = [];
  private static errors: ErrorMetric[] = [];
  private static readonly capacity = 1000;

  static recordDetection(metric: Omit<DetectionMetric, 'timestamp'>): void {
    this.detections = appendCapped(this.detections, { ...metric, timestamp: new Date() }, this.capacity);
    logger.debug('Detection metric recorded', metric);
  }

  static recordError(metric: Omit<ErrorMetric, 'timestamp'>): void {
    this.errors = appendCapped(this.errors, { ...metric, timestamp: new Date() }, this.capacity);
    logger.debug('Error metric recorded', metric);
  }

  static getStats(now: number = Date.now()): MetricsSnapshot {
    const today = since(this.detections, now, DAY_MS);
    const labels = countLabels(today);

    return {
      total: {
        detections: this.detections.length,
        errors: this.errors.length,
      },
      last24Hours: {
        detections: today.length,
        aiGenerated: labels.get(Classification.AI_GENERATED) ?? 0,
        human: labels.get(Classification.HUMAN) ?? 0,
        avgConfidence: average(today.map(d => d.confidence)),
        avgProcessingTime: average(today.map(d => d.processingTime)),
      },
      lastHour: {
        detections: since(this.detections, now, HOUR_MS).length,
        errors: since(this.errors, now, HOUR_MS).length,
      },
      languages: countLanguages(today),
    };
  }

  static reset(): void {
    this.detections = [];
    this.errors = [];
  }
}
