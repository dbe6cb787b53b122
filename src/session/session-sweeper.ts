import { SessionStore, PurgeResult } from './types';
import { SessionLock } from './session-lock';
import { logger } from '../observability/logger';

/**
 * SessionSweeper: moves idle sessions to TIMEOUT and drops expired keys on a
 * fixed interval. Sessions whose lock is held are left for the next pass.
 */
export class SessionSweeper {
  private intervalHandle?: NodeJS.Timeout;
  private running = false;
  private log = logger.child({ component: 'session-sweeper' });

  constructor(
    private readonly store: SessionStore,
    private readonly lock: SessionLock,
    private readonly intervalMs: number = 60_000,
    private readonly clock: () => number = Date.now,
  ) {}

  start(): void {
    if (this.intervalHandle) {
      this.log.warn('Session sweeper already running');
      return;
    }

    this.intervalHandle = setInterval(() => {
      this.sweep().catch((err) => this.log.error({ err }, 'Session sweep failed'));
    }, this.intervalMs);
    this.intervalHandle.unref();
    this.log.info({ intervalSeconds: this.intervalMs / 1000 }, 'Session sweeper started');
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = undefined;
      this.log.info('Session sweeper stopped');
    }
  }

  /** One pass; overlapping passes are skipped. */
  async sweep(): Promise<PurgeResult> {
    if (this.running) {
      this.log.debug('Sweep already running, skipping');
      return { sessionsExpired: 0, keysPurged: 0 };
    }

    this.running = true;
    try {
      const result = await this.store.purgeExpired(this.clock(), (sessionId) => this.lock.isLocked(sessionId));
      if (result.sessionsExpired > 0 || result.keysPurged > 0) {
        this.log.info(result, 'Session sweep completed');
      }
      return result;
    } finally {
      this.running = false;
    }
  }
}
