import { monitorEventLoopDelay, type IntervalHistogram } from 'perf_hooks';
import { logger } from './logger.js';

const CHECK_INTERVAL_MS = 10_000;

let histogram: IntervalHistogram | null = null;
let checkInterval: ReturnType<typeof setInterval> | null = null;

/**
 * Start monitoring event loop lag. Capture frames are delivered on the event
 * loop, so sustained lag delays audio reaching the recognizer.
 */
export function startMonitoring(lagThresholdMs: number): void {
  if (histogram) return;

  // 20ms resolution
  histogram = monitorEventLoopDelay({ resolution: 20 });
  histogram.enable();

  checkInterval = setInterval(() => {
    const p99Ms = getEventLoopLagMs();
    if (p99Ms !== null && p99Ms > lagThresholdMs) {
      logger.warn(
        `Event loop lag: p99=${p99Ms.toFixed(1)}ms exceeds threshold ${lagThresholdMs}ms -- audio delivery is stalling`
      );
    }
    histogram?.reset();
  }, CHECK_INTERVAL_MS);
  checkInterval.unref();

  logger.debug('Monitoring started (event loop lag)');
}

/** Current event loop lag p99 in ms. */
function getEventLoopLagMs(): number | null {
  if (!histogram) return null;
  return histogram.percentile(99) / 1e6; // nanoseconds -> ms
}

export function stopMonitoring(): void {
  if (histogram) {
    histogram.disable();
    histogram = null;
  }
  if (checkInterval) {
    clearInterval(checkInterval);
    checkInterval = null;
  }
}
