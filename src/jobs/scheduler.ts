import { Queue } from 'bullmq';
import IORedis from 'ioredis';
import { AppConfig } from '../config';
import { JobName } from './runJob';

export const QUEUE_NAME = 'rental-alerts';

/**
 * Repeat patterns per job, in the configured timezone
 */
export const SCHEDULES: Record<JobName, string> = {
  'snapshot-and-alert': '0 */2 * * *', // Every 2 hours at minute 0
  'property-alerts': '30 8 * * *', // Daily at 08:30
  'weekly-roundup': '0 9 * * 1', // Mondays at 09:00
};

/**
 * Job scheduler for snapshot and alert tasks
 */
export class AlertJobScheduler {
  private queue: Queue;
  private redis: IORedis;

  constructor(private readonly config: Pick<AppConfig, 'redis'>) {
    // Initialize Redis connection
    this.redis = new IORedis(config.redis.url, {
      maxRetriesPerRequest: null, // Required for BullMQ blocking operations
      lazyConnect: true
    });

    this.queue = new Queue(QUEUE_NAME, {
      connection: this.redis,
      defaultJobOptions: {
        removeOnComplete: 50,
        removeOnFail: 20,
        attempts: 2,
        backoff: {
          type: 'exponential',
          delay: 30000, // 30 seconds
        }
      }
    });

    console.log('Alert job scheduler initialized');
  }

  /**
   * Add a one-time job
   */
  async addJob(name: JobName, jobId?: string): Promise<void> {
    const job = await this.queue.add(name, {}, {
      jobId: jobId || `${name}-${Date.now()}`,
      removeOnComplete: 5,
      removeOnFail: 3
    });

    console.log(`Added ${name} job ${job.id}`);
  }

  /**
   * Schedule every recurring job, replacing earlier schedules
   */
  async scheduleRecurringJobs(): Promise<void> {
    await this.removeRecurringJobs();

    for (const [name, pattern] of Object.entries(SCHEDULES)) {
      const job = await this.queue.add(name, {}, {
        repeat: {
          pattern,
          tz: this.config.redis.timezone
        },
        jobId: `recurring-${name}`
      });

      console.log(`Scheduled recurring ${name} job (${pattern}): ${job.id}`);
    }
  }

  /**
   * Remove recurring jobs
   */
  async removeRecurringJobs(): Promise<void> {
    const repeatableJobs = await this.queue.getRepeatableJobs();

    for (const job of repeatableJobs) {
      if (job.name in SCHEDULES) {
        await this.queue.removeRepeatableByKey(job.key);
        console.log(`Removed recurring job: ${job.key}`);
      }
    }
  }

  /**
   * Get queue statistics
   */
  async getQueueStats(): Promise<{
    waiting: number;
    active: number;
    completed: number;
    failed: number;
    delayed: number;
  }> {
    const counts = await this.queue.getJobCounts('waiting', 'active', 'completed', 'failed', 'delayed');

    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0
    };
  }

  /**
   * Clean up jobs older than a week
   */
  async cleanOldJobs(): Promise<void> {
    const oneWeekMs = 7 * 24 * 60 * 60 * 1000;

    await Promise.all([
      this.queue.clean(oneWeekMs, 100, 'completed'),
      this.queue.clean(oneWeekMs, 50, 'failed')
    ]);

    console.log('Cleaned up old jobs');
  }

  /**
   * Start the scheduler
   */
  async start(): Promise<void> {
    console.log('Starting job scheduler...');

    await this.redis.ping();
    await this.scheduleRecurringJobs();

    console.log('Job scheduler started');
  }

  /**
   * Shutdown the scheduler
   */
  async shutdown(): Promise<void> {
    console.log('Shutting down job scheduler...');

    try {
      await this.queue.close();
      this.redis.disconnect();
      console.log('Job scheduler shutdown complete');
    } catch (error) {
      console.error('Error during scheduler shutdown:', error);
    }
  }

  /**
   * Health check for the scheduler
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.redis.ping();
      return true;
    } catch (error) {
      console.error('Scheduler health check failed:', error);
      return false;
    }
  }
}
