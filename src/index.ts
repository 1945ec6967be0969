import dotenv from 'dotenv';
import { AppConfig, loadConfig } from './config';
import { JobContext } from './jobs/context';
import { AlertJobScheduler } from './jobs/scheduler';
import { DatabaseService } from './services/database';
import { MarketplaceClient } from './services/marketplace';
import { NotificationService } from './services/notifications';
import { AlertWorker } from './workers/alertWorker';

// Load environment variables
dotenv.config();

/**
 * Main application entry point
 * Starts the BullMQ worker and job scheduler for snapshots and alerts
 */
class RentalAlertsApp {
  private worker: AlertWorker;
  private scheduler: AlertJobScheduler;
  private isShuttingDown = false;
  private timers: NodeJS.Timeout[] = [];

  constructor(config: AppConfig) {
    const context: JobContext = {
      config,
      store: new DatabaseService(config),
      marketplace: new MarketplaceClient(config),
      notifications: new NotificationService(config),
      now: () => new Date()
    };

    this.worker = new AlertWorker(context);
    this.scheduler = new AlertJobScheduler(config);

    this.setupGracefulShutdown();
  }

  /**
   * Start the application
   */
  async start(): Promise<void> {
    console.log('🏠 Starting Rental Alerts Application...');
    console.log(`Environment: ${process.env.NODE_ENV || 'development'}`);

    try {
      await this.scheduler.start();
      await this.worker.start();

      // Take a snapshot straight away outside production
      if (process.env.NODE_ENV !== 'production') {
        console.log('Adding startup snapshot job...');
        await this.scheduler.addJob('snapshot-and-alert', 'startup-snapshot');
      }

      console.log('✅ Rental Alerts Application started successfully');
      this.keepAlive();
    } catch (error) {
      console.error('❌ Failed to start application:', error);
      await this.shutdown();
      process.exit(1);
    }
  }

  /**
   * Set up graceful shutdown handlers
   */
  private setupGracefulShutdown(): void {
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGQUIT'];

    signals.forEach(signal => {
      process.on(signal, () => {
        if (this.isShuttingDown) {
          console.log(`Received ${signal} again, forcing exit...`);
          process.exit(1);
        }

        console.log(`\nReceived ${signal}, starting graceful shutdown...`);
        this.shutdown().then(() => process.exit(0), () => process.exit(1));
      });
    });

    process.on('uncaughtException', (error) => {
      console.error('Uncaught Exception:', error);
      this.shutdown().then(() => process.exit(1), () => process.exit(1));
    });

    process.on('unhandledRejection', (reason) => {
      console.error('Unhandled Rejection, reason:', reason);
      this.shutdown().then(() => process.exit(1), () => process.exit(1));
    });
  }

  /**
   * Periodic health logging and queue cleanup
   */
  private keepAlive(): void {
    const healthCheck = async (): Promise<void> => {
      const [workerHealthy, schedulerHealthy] = await Promise.all([
        this.worker.healthCheck(),
        this.scheduler.healthCheck()
      ]);

      if (workerHealthy && schedulerHealthy) {
        const stats = await this.scheduler.getQueueStats();
        console.log('💚 Health check passed - Application running normally');
        console.log(`Queue stats - Waiting: ${stats.waiting}, Active: ${stats.active}, Completed: ${stats.completed}, Failed: ${stats.failed}`);
      } else {
        console.warn('⚠️  Health check warning - Some components unhealthy');
        console.log(`Worker healthy: ${workerHealthy}, Scheduler healthy: ${schedulerHealthy}`);
      }
    };

    this.timers.push(
      setInterval(() => {
        healthCheck().catch(error => console.error('❌ Health check failed:', error));
      }, 30 * 60 * 1000), // 30 minutes
      setInterval(() => {
        this.scheduler.cleanOldJobs().catch(error => console.error('Failed to clean old jobs:', error));
      }, 24 * 60 * 60 * 1000) // 24 hours
    );
  }

  /**
   * Shutdown the application gracefully
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;
    console.log('🔄 Shutting down Rental Alerts Application...');

    this.timers.forEach(timer => clearInterval(timer));
    await Promise.all([
      this.worker.shutdown(),
      this.scheduler.shutdown()
    ]);

    console.log('✅ Application shutdown complete');
  }
}

// Start the application if this file is run directly
if (require.main === module) {
  const app = new RentalAlertsApp(loadConfig());
  app.start().catch((error) => {
    console.error('Failed to start application:', error);
    process.exit(1);
  });
}

export { RentalAlertsApp };
