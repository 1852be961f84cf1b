/**
 * Graceful Shutdown Handler
 *
 * Handles process termination signals for clean shutdown:
 * - SIGTERM: container/orchestrator termination
 * - SIGINT: Ctrl+C during development
 *
 * Ensures:
 * - Listener connections are ended
 * - The active transcoder process is terminated (never orphaned)
 * - The HTTP server is closed
 */

import { logger } from './logging.js';
import { errorMessage } from './exceptions.js';
import type { Server } from 'http';

type ShutdownCallback = () => Promise<void>;

class ShutdownManager {
    private callbacks: ShutdownCallback[] = [];
    private isShuttingDown = false;
    private shutdownTimeout = 10000;
    private installed = false;

    /**
     * Register a callback to be called during shutdown
     */
    register(callback: ShutdownCallback): void {
        this.setupSignalHandlers();
        this.callbacks.push(callback);
    }

    /**
     * Register an HTTP server for graceful close
     */
    registerServer(server: Server): void {
        this.register(async () => {
            return new Promise((resolve) => {
                // Streaming responses never end on their own
                server.closeAllConnections();
                server.close(() => {
                    logger.info('HTTP server closed');
                    resolve();
                });
            });
        });
    }

    /**
     * Setup signal handlers (once, on first registration)
     */
    private setupSignalHandlers(): void {
        if (this.installed) return;
        this.installed = true;

        process.on('SIGTERM', () => void this.shutdown('SIGTERM'));
        process.on('SIGINT', () => void this.shutdown('SIGINT'));

        process.on('uncaughtException', (error) => {
            logger.error('Uncaught exception', error);
            void this.shutdown('uncaughtException', 1);
        });

        process.on('unhandledRejection', (reason: unknown) => {
            logger.error('Unhandled rejection', { reason: errorMessage(reason) });
        });
    }

    /**
     * Execute graceful shutdown
     */
    private async shutdown(signal: string, exitCode: number = 0): Promise<void> {
        if (this.isShuttingDown) {
            logger.warning('Shutdown already in progress, ignoring signal', { signal });
            return;
        }

        this.isShuttingDown = true;
        logger.info(`Received ${signal}, starting graceful shutdown...`);

        // Set a hard timeout
        const timeoutId = setTimeout(() => {
            logger.error('Shutdown timeout exceeded, forcing exit');
            process.exit(1);
        }, this.shutdownTimeout);

        // Callbacks run in registration order
        for (const callback of this.callbacks) {
            try {
                await callback();
            } catch (error) {
                logger.error('Error during shutdown callback', error);
            }
        }

        clearTimeout(timeoutId);
        logger.info('Graceful shutdown completed');
        process.exit(exitCode);
    }
}

// Singleton instance
export const shutdownManager = new ShutdownManager();

/**
 * Register a shutdown callback
 */
export function onShutdown(callback: ShutdownCallback): void {
    shutdownManager.register(callback);
}

/**
 * Register a server for graceful shutdown
 */
export function registerServerForShutdown(server: Server): void {
    shutdownManager.registerServer(server);
}
