import { logger } from './logger.js';

/**
 * Holds one long-lived client (database pool, authenticated API client) per process.
 * The client is created on first use and reused until close(), so requests never
 * re-connect or re-authenticate.
 */
export class LazyClient<TClient> {
  private current: TClient | null = null;

  constructor(
    private readonly name: string,
    private readonly create: () => TClient,
    private readonly dispose: (client: TClient) => Promise<void> = async () => {}
  ) {}

  get(): TClient {
    if (this.current === null) {
      this.current = this.create();
      logger.debug('Client created', { client: this.name });
    }
    return this.current;
  }

  async close(): Promise<void> {
    if (this.current === null) return;
    const client = this.current;
    this.current = null;
    await this.dispose(client);
  }
}
