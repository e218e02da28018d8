export type StatisticsSnapshot = {
  publishedCount: number;
  receivedCount: number;
  publishFailures: number;
  disconnectCount: number;
  /** Includes the downtime interval that is still open, if any. */
  disconnectedTimeMs: number;
  /** Epoch ms of the last successful publish, 0 when none since the last reset. */
  lastMessageTs: number;
};

/**
 * Operational counters shared by the session components.
 *
 * Every mutator is a single synchronous update, so callbacks interleaving on the event loop
 * cannot lose increments. Snapshots across counters are not transactional.
 *
 * `disconnectCount` and `disconnectedTimeMs` describe session health and survive `reset()`;
 * the throughput counters do not.
 */
export class StatisticsStore {
  private publishedCount = 0;
  private receivedCount = 0;
  private publishFailures = 0;
  private lastMessageTs = 0;

  private disconnectCount = 0;
  private closedDowntimeMs = 0;
  private disconnectedSince?: number;

  constructor(private readonly now: () => number = Date.now) {}

  recordPublished() {
    this.publishedCount += 1;
    this.lastMessageTs = this.now();
  }

  recordPublishFailure() {
    this.publishFailures += 1;
  }

  recordReceived() {
    this.receivedCount += 1;
  }

  /** Counts a disconnect and starts accumulating downtime. */
  markDisconnected() {
    this.disconnectCount += 1;
    if (this.disconnectedSince === undefined) this.disconnectedSince = this.now();
  }

  markReconnected() {
    this.closeDowntime();
  }

  /** Stops accumulating downtime without counting a reconnect, e.g. on shutdown. */
  closeDowntime() {
    if (this.disconnectedSince === undefined) return;
    this.closedDowntimeMs += Math.max(0, this.now() - this.disconnectedSince);
    this.disconnectedSince = undefined;
  }

  get(): StatisticsSnapshot {
    const openDowntimeMs =
      this.disconnectedSince === undefined ? 0 : Math.max(0, this.now() - this.disconnectedSince);
    return {
      publishedCount: this.publishedCount,
      receivedCount: this.receivedCount,
      publishFailures: this.publishFailures,
      disconnectCount: this.disconnectCount,
      disconnectedTimeMs: this.closedDowntimeMs + openDowntimeMs,
      lastMessageTs: this.lastMessageTs,
    };
  }

  reset() {
    this.publishedCount = 0;
    this.receivedCount = 0;
    this.publishFailures = 0;
    this.lastMessageTs = 0;
  }
}

export const formatStatistics = (stats: StatisticsSnapshot) =>
  `published=${stats.publishedCount} received=${stats.receivedCount} failures=${stats.publishFailures} ` +
  `disconnects=${stats.disconnectCount} downtime=${Math.round(stats.disconnectedTimeMs / 1000)}s ` +
  `last=${stats.lastMessageTs ? new Date(stats.lastMessageTs).toISOString() : 'never'}`;
