/**
 * Lightweight Prometheus-compatible metrics — no external dependencies
 *
 * Exposes, in Prometheus text format:
 * - ledger operation outcomes (committed / aborted, by operation and error code)
 * - notifications appended
 * - HTTP request latency
 * - process gauges (heap, uptime)
 */

import type { NextFunction, Request, Response } from 'express';

type Labels = Record<string, string>;

interface CounterSeries {
  help: string;
  values: Map<string, { labels: Labels; value: number }>;
}

interface Histogram {
  help: string;
  buckets: number[];
  counts: number[]; // One per bucket + 1 for +Inf
  sum: number;
  count: number;
}

function labelKey(labels: Labels): string {
  return Object.keys(labels)
    .sort()
    .map((k) => `${k}=${labels[k]}`)
    .join(',');
}

function formatLabels(labels: Labels): string {
  const keys = Object.keys(labels).sort();
  if (keys.length === 0) return '';
  const body = keys.map((k) => `${k}="${labels[k].replace(/["\\\n]/g, '_')}"`).join(',');
  return `{${body}}`;
}

export class MetricsCollector {
  private counters: Map<string, CounterSeries> = new Map();
  private gauges: Map<string, { value: number; help: string }> = new Map();
  private histograms: Map<string, Histogram> = new Map();

  constructor() {
    this.registerCounter('ledger_operations_total', 'Ledger operations by name and outcome');
    this.registerCounter('ledger_notifications_total', 'Notifications appended to the log');
    this.registerCounter('ledger_http_requests_total', 'Total HTTP requests');

    this.registerGauge('ledger_ws_connections', 'Current WebSocket subscribers');
    this.registerGauge('ledger_notification_sequence', 'Sequence number of the last notification');
    this.registerGauge('ledger_memory_heap_bytes', 'Heap memory used in bytes');
    this.registerGauge('ledger_uptime_seconds', 'Process uptime in seconds');

    this.registerHistogram('ledger_http_request_duration_seconds', 'HTTP request duration', [
      0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5,
    ]);
  }

  registerCounter(name: string, help: string): void {
    if (!this.counters.has(name)) {
      this.counters.set(name, { help, values: new Map() });
    }
  }

  registerGauge(name: string, help: string): void {
    if (!this.gauges.has(name)) {
      this.gauges.set(name, { value: 0, help });
    }
  }

  registerHistogram(name: string, help: string, buckets: number[]): void {
    if (!this.histograms.has(name)) {
      this.histograms.set(name, {
        help,
        buckets: [...buckets].sort((a, b) => a - b),
        counts: new Array<number>(buckets.length + 1).fill(0),
        sum: 0,
        count: 0,
      });
    }
  }

  incCounter(name: string, labels: Labels = {}, amount: number = 1): void {
    const counter = this.counters.get(name);
    if (!counter) return;
    const key = labelKey(labels);
    const series = counter.values.get(key);
    if (series) {
      series.value += amount;
    } else {
      counter.values.set(key, { labels: { ...labels }, value: amount });
    }
  }

  counterValue(name: string, labels: Labels = {}): number {
    return this.counters.get(name)?.values.get(labelKey(labels))?.value ?? 0;
  }

  setGauge(name: string, value: number): void {
    const gauge = this.gauges.get(name);
    if (gauge) gauge.value = value;
  }

  observeHistogram(name: string, value: number): void {
    const hist = this.histograms.get(name);
    if (!hist) return;
    hist.sum += value;
    hist.count++;
    const index = hist.buckets.findIndex((bound) => value <= bound);
    hist.counts[index === -1 ? hist.buckets.length : index]++;
  }

  /**
   * Express middleware to track request latency and count
   */
  httpMiddleware() {
    return (_req: Request, res: Response, next: NextFunction): void => {
      const start = process.hrtime.bigint();
      this.incCounter('ledger_http_requests_total');

      res.on('finish', () => {
        const durationSec = Number(process.hrtime.bigint() - start) / 1e9;
        this.observeHistogram('ledger_http_request_duration_seconds', durationSec);
      });

      next();
    };
  }

  /**
   * Render all metrics in Prometheus exposition format
   */
  render(): string {
    const lines: string[] = [];

    for (const [name, c] of this.counters) {
      lines.push(`# HELP ${name} ${c.help}`);
      lines.push(`# TYPE ${name} counter`);
      if (c.values.size === 0) {
        lines.push(`${name} 0`);
      }
      for (const series of c.values.values()) {
        lines.push(`${name}${formatLabels(series.labels)} ${series.value}`);
      }
    }

    this.setGauge('ledger_memory_heap_bytes', process.memoryUsage().heapUsed);
    this.setGauge('ledger_uptime_seconds', Math.round(process.uptime()));

    for (const [name, g] of this.gauges) {
      lines.push(`# HELP ${name} ${g.help}`);
      lines.push(`# TYPE ${name} gauge`);
      lines.push(`${name} ${g.value}`);
    }

    for (const [name, h] of this.histograms) {
      lines.push(`# HELP ${name} ${h.help}`);
      lines.push(`# TYPE ${name} histogram`);
      let cumulative = 0;
      for (let i = 0; i < h.buckets.length; i++) {
        cumulative += h.counts[i];
        lines.push(`${name}_bucket{le="${h.buckets[i]}"} ${cumulative}`);
      }
      lines.push(`${name}_bucket{le="+Inf"} ${h.count}`);
      lines.push(`${name}_sum ${h.sum}`);
      lines.push(`${name}_count ${h.count}`);
    }

    return lines.join('\n') + '\n';
  }
}
