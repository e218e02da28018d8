import type { SessionState } from '@mqtt/sessionState';
import { type StatisticsSnapshot, formatStatistics } from 'Statistics/StatisticsStore';
import { logInfo } from '@utils/logger';

type StopFn = () => void;

/**
 * Periodic statistics line in the log. Keeps flapping connections visible without a broker-side
 * dashboard.
 */
export function startStatisticsMonitor(
  read: () => { state: SessionState; stats: StatisticsSnapshot },
  intervalMs: number
): StopFn {
  if (intervalMs <= 0) return () => {};

  const timer = setInterval(() => {
    const { state, stats } = read();
    logInfo(`[Stats] state=${state} ${formatStatistics(stats)}`);
  }, intervalMs);

  return () => {
    clearInterval(timer);
  };
}
