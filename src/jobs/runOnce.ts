import dotenv from 'dotenv';
import { loadConfig } from '../config';
import { DatabaseService } from '../services/database';
import { MarketplaceClient } from '../services/marketplace';
import { NotificationService } from '../services/notifications';
import { JobContext, JobResult } from './context';
import { isJobName, JOB_NAMES, JobName, runJob } from './runJob';

// Load environment variables
dotenv.config();

/**
 * Run one job once (for manual testing or cron jobs)
 */
async function runOnce(jobName: JobName = 'snapshot-and-alert', dryRun: boolean = false): Promise<JobResult> {
  console.log(`Starting one-time ${jobName} run...`);
  if (dryRun) {
    console.log('🚫 Dry run - messages are printed, not sent');
  }

  const config = loadConfig();
  const notifications = dryRun ? null : new NotificationService(config);
  let jobStarted = false;

  try {
    const store = new DatabaseService(config);

    console.log('Testing database connection...');
    const dbHealthy = await store.testConnection();
    if (!dbHealthy) {
      throw new Error('Database connection failed');
    }

    const context: JobContext = {
      config,
      store,
      marketplace: new MarketplaceClient(config),
      notifications,
      now: () => new Date()
    };

    jobStarted = true;
    const result = await runJob(jobName, context);

    console.log('\n=== RUN SUMMARY ===');
    console.log(`Job: ${jobName}`);
    console.log(`Units found: ${result.unitsFound}`);
    console.log(`Changes found: ${result.changesFound}`);
    console.log(`Notification sent: ${result.notified ? 'yes' : 'no'}`);
    console.log('===================\n');

    return result;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    console.error('❌ One-time run failed:', errorMessage);

    // runJob reports its own failures
    if (!jobStarted && notifications) {
      await notifications.sendErrorNotification(errorMessage, `one-time ${jobName} run`);
    }

    // Only exit in non-test environment
    if (process.env.NODE_ENV !== 'test') {
      process.exit(1);
    }
    throw error; // Re-throw in test environment
  }
}

function parseArgs(args: string[]): { jobName: JobName; dryRun: boolean } {
  const dryRun = args.includes('--dry-run');
  const positional = args.filter(arg => !arg.startsWith('--'));
  const requested = positional[0] ?? 'snapshot-and-alert';

  if (!isJobName(requested)) {
    throw new Error(`Unknown job "${requested}". Expected one of: ${JOB_NAMES.join(', ')}`);
  }
  return { jobName: requested, dryRun };
}

if (require.main === module) {
  const { jobName, dryRun } = parseArgs(process.argv.slice(2));

  runOnce(jobName, dryRun)
    .then(() => {
      console.log('Script completed');
      process.exit(0);
    })
    .catch((error) => {
      console.error('Script failed:', error);
      process.exit(1);
    });
}

export { runOnce, parseArgs };
