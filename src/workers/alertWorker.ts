import { Job, Worker } from 'bullmq';
import IORedis from 'ioredis';
import { JobContext, JobResult } from '../jobs/context';
import { isJobName, runJob } from '../jobs/runJob';
import { QUEUE_NAME } from '../jobs/scheduler';

/**
 * BullMQ worker running snapshot and alert jobs one at a time
 */
export class AlertWorker {
  private worker: Worker;
  private redis: IORedis;

  constructor(private readonly context: JobContext) {
    this.redis = new IORedis(context.config.redis.url, {
      maxRetriesPerRequest: null, // Required for BullMQ blocking operations
      lazyConnect: true
    });

    // concurrency 1: a run finishes before the next starts
    this.worker = new Worker(QUEUE_NAME, this.processJob.bind(this), {
      connection: this.redis,
      concurrency: 1,
      maxStalledCount: 3,
      stalledInterval: 30 * 1000,
      lockDuration: 10 * 60 * 1000, // 10 minutes
    });

    this.setupEventHandlers();
    console.log('Alert worker initialized');
  }

  /**
   * Process one queued job
   */
  async processJob(job: Job): Promise<JobResult> {
    if (!isJobName(job.name)) {
      throw new Error(`Unknown job name: ${job.name}`);
    }

    await job.updateProgress(10);
    const result = await runJob(job.name, this.context);
    await job.updateProgress(100);

    console.log(`Job ${job.id} (${job.name}) completed: ${result.changesFound} changes, notified: ${result.notified}`);
    return result;
  }

  /**
   * Set up event handlers for the worker
   */
  private setupEventHandlers(): void {
    this.worker.on('completed', (job) => {
      console.log(`Job ${job.id} completed successfully`);
    });

    this.worker.on('failed', (job, err) => {
      console.error(`Job ${job?.id} failed:`, err.message);
    });

    this.worker.on('error', (err) => {
      console.error('Worker error:', err);
    });

    this.worker.on('stalled', (jobId) => {
      console.warn(`Job ${jobId} stalled`);
    });
  }

  /**
   * Start the worker
   */
  async start(): Promise<void> {
    console.log('Starting alert worker...');
    // Worker starts processing when created; wait for Redis
    await this.redis.ping();
    console.log('Alert worker started and connected to Redis');
  }

  /**
   * Gracefully shutdown the worker
   */
  async shutdown(): Promise<void> {
    console.log('Shutting down alert worker...');

    try {
      await this.worker.close();
      this.redis.disconnect();
      console.log('Alert worker shutdown complete');
    } catch (error) {
      console.error('Error during worker shutdown:', error);
    }
  }

  /**
   * Check worker health
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.redis.ping();
      return this.worker.isRunning();
    } catch (error) {
      console.error('Worker health check failed:', error);
      return false;
    }
  }
}
