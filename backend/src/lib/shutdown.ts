import { logger } from '../logger';

export interface ShutdownHandler {
  name: string;
  priority: number;
  handler: () => Promise<void>;
}

/**
 * Ordered shutdown: lower priority runs first. A failing handler is logged
 * and the rest still run.
 */
export class GracefulShutdown {
  private handlers: ShutdownHandler[] = [];
  private isShuttingDown = false;
  private readonly FORCE_EXIT_TIMEOUT = 45000;

  constructor(private readonly exit: (code: number) => void = (code) => process.exit(code)) {}

  register(name: string, priority: number, handler: () => Promise<void>): void {
    this.handlers.push({ name, priority, handler });
  }

  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;
    logger.info('Graceful shutdown initiated');

    const timeout = setTimeout(() => {
      logger.error('Force exit timeout reached, exiting with error');
      this.exit(1);
    }, this.FORCE_EXIT_TIMEOUT);

    const sortedHandlers = [...this.handlers].sort((a, b) => a.priority - b.priority);

    for (const { name, handler } of sortedHandlers) {
      try {
        logger.info(`Running shutdown handler: ${name}`);
        await handler();
        logger.info(`Shutdown handler completed: ${name}`);
      } catch (error) {
        logger.error({ err: error }, `Shutdown handler failed: ${name}`);
      }
    }

    clearTimeout(timeout);
    logger.info('Graceful shutdown completed');
    this.exit(0);
  }

  registerHttpServer(server: { close: (callback?: (err?: Error) => void) => void }): void {
    this.register('httpServer', 0, () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      })
    );
  }

  setup(): void {
    process.on('SIGTERM', () => {
      logger.info('SIGTERM received');
      void this.shutdown();
    });

    process.on('SIGINT', () => {
      logger.info('SIGINT received');
      void this.shutdown();
    });
  }
}
