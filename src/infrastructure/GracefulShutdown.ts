import { Server } from 'http';
import { logger } from './logging/Logger';

interface ShutdownStep {
  name: string;
  run: () => Promise<void>;
}

/**
 * Stops accepting requests, then runs the registered steps one after another in
 * registration order. A running iteration has to settle before agent state is written.
 */
export class GracefulShutdown {
  private steps: ShutdownStep[] = [];
  private isShuttingDown = false;

  constructor(
    private server: Server,
    private timeoutMs = 30000
  ) {
    this.setupSignalHandlers();
  }

  private setupSignalHandlers(): void {
    process.on('SIGTERM', () => void this.shutdown('SIGTERM'));
    process.on('SIGINT', () => void this.shutdown('SIGINT'));
    process.on('uncaughtException', (error) => {
      logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
      void this.shutdown('uncaughtException');
    });
    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled Rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
      void this.shutdown('unhandledRejection');
    });
  }

  register(name: string, run: () => Promise<void>): void {
    this.steps.push({ name, run });
  }

  private async shutdown(signal: string): Promise<void> {
    if (this.isShuttingDown) {
      logger.info('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown`);

    const shutdownTimeout = setTimeout(() => {
      logger.error('Graceful shutdown timeout, forcing exit', { timeoutMs: this.timeoutMs });
      process.exit(1);
    }, this.timeoutMs);

    let failed = false;
    try {
      await this.closeServer();
    } catch (error) {
      failed = true;
      logger.error('Error closing server', { error: error instanceof Error ? error.message : String(error) });
    }

    for (const step of this.steps) {
      try {
        logger.info(`Shutdown: ${step.name}`);
        await step.run();
      } catch (error) {
        failed = true;
        logger.error(`Shutdown step failed: ${step.name}`, {
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    clearTimeout(shutdownTimeout);
    logger.info(failed ? 'Shutdown completed with errors' : 'Graceful shutdown completed');
    process.exit(failed ? 1 : 0);
  }

  private closeServer(): Promise<void> {
    logger.info('Closing HTTP server');
    return new Promise<void>((resolve, reject) => {
      this.server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        logger.info('HTTP server closed');
        resolve();
      });
    });
  }
}
