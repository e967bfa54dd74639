import { getLogger } from '../../utils/logger.js';
import type { UpstreamPusherClient } from './upstream-pusher-ws.client.js';

type IngestionOptions = {
  host: string;
  port: number;
  isins: string[];
  reconnectBaseMs: number;
  reconnectMaxMs: number;
};

/**
 * Keeps the upstream client connected: connect, subscribe, run until the
 * feed closes, then retry with exponential backoff until stopped.
 */
export class UpstreamIngestionService {
  private logger = getLogger();
  private running = false;
  private reconnectAttempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private wakeUp: (() => void) | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly client: UpstreamPusherClient,
    private readonly options: IngestionOptions,
  ) {}

  isConnected(): boolean {
    return this.client.isOpen();
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.loop = this.operate().catch((error: unknown) => {
      this.logger.error({ err: error }, 'Upstream ingestion loop failed');
    });
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.wakeUp?.();
    this.client.close();
    await this.loop;
    this.loop = null;
  }

  private async operate(): Promise<void> {
    while (this.running) {
      try {
        await this.client.connect(this.options.host, this.options.port);
        this.reconnectAttempts = 0;
        await this.client.subscribe(this.options.isins);
        await this.client.run();
      } catch (error) {
        this.logger.error({ err: error }, 'Upstream feed session failed');
        this.client.close();
      }

      if (this.running) {
        await this.backoff();
      }
    }
    this.logger.info('Upstream ingestion stopped');
  }

  private backoff(): Promise<void> {
    const delay = Math.min(
      this.options.reconnectBaseMs * 2 ** this.reconnectAttempts,
      this.options.reconnectMaxMs,
    );
    this.reconnectAttempts += 1;
    this.logger.info({ delay, attempt: this.reconnectAttempts }, 'Reconnecting to upstream feed');

    return new Promise((resolve) => {
      this.wakeUp = resolve;
      this.reconnectTimer = setTimeout(() => {
        this.reconnectTimer = null;
        this.wakeUp = null;
        resolve();
      }, delay);
    });
  }
}
