import type { HealthSample } from './samples';

export type ProcessHealthDeps = {
  isConnected: () => boolean;
  readSignalStrength?: () => number | null;
  memoryUsage?: () => NodeJS.MemoryUsage;
  uptime?: () => number;
  now?: () => number;
};

/**
 * Health sampled from the running process.
 *
 * "Free heap" is the V8 heap headroom (`heapTotal - heapUsed`); the minimum is tracked across
 * samples since the source was created.
 */
export function createProcessHealthSource({
  isConnected,
  readSignalStrength = () => null,
  memoryUsage = () => process.memoryUsage(),
  uptime = () => process.uptime(),
  now = Date.now,
}: ProcessHealthDeps) {
  let minFreeHeap = Number.POSITIVE_INFINITY;

  return (): HealthSample => {
    const mem = memoryUsage();
    const freeHeap = Math.max(0, mem.heapTotal - mem.heapUsed);
    minFreeHeap = Math.min(minFreeHeap, freeHeap);

    return {
      freeHeap,
      minFreeHeap,
      signalStrength: readSignalStrength(),
      uptimeSec: Math.floor(uptime()),
      connected: isConnected(),
      timestamp: now(),
    };
  };
}
