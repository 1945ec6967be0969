import { runPropertyAlerts, runUnitAlerts, runWeeklyRoundup } from './alertJobs';
import { JobContext, JobResult } from './context';
import { capturePropertySnapshot, captureUnitSnapshot } from './snapshotJob';

export const JOB_NAMES = ['snapshot-and-alert', 'weekly-roundup', 'property-alerts'] as const;

export type JobName = (typeof JOB_NAMES)[number];

export function isJobName(value: string): value is JobName {
  return JOB_NAMES.some(name => name === value);
}

async function dispatch(name: JobName, context: JobContext): Promise<JobResult> {
  switch (name) {
    case 'snapshot-and-alert': {
      const snapshot = await captureUnitSnapshot(context);
      if (snapshot.snapshotDatetime === null) {
        console.log('No snapshot recorded - skipping unit alerts');
        return { unitsFound: 0, changesFound: 0, notified: false };
      }
      const alerts = await runUnitAlerts(context);
      return { unitsFound: snapshot.unitsFound, ...alerts };
    }
    case 'weekly-roundup':
      return { unitsFound: 0, ...(await runWeeklyRoundup(context)) };
    case 'property-alerts': {
      const snapshot = await capturePropertySnapshot(context);
      if (snapshot.snapshotDatetime === null) {
        console.log('No property snapshot recorded - skipping property alerts');
        return { unitsFound: 0, changesFound: 0, notified: false };
      }
      const alerts = await runPropertyAlerts(context);
      return { unitsFound: snapshot.propertiesFound, ...alerts };
    }
  }
}

/**
 * Run one job to completion and log the run. Failures are logged, reported
 * through an error notification and rethrown.
 */
export async function runJob(name: JobName, context: JobContext): Promise<JobResult> {
  const startTime = context.now().toISOString();
  console.log(`Starting ${name} job at ${startTime}`);

  try {
    const result = await dispatch(name, context);

    await context.store.logRun({
      job_name: name,
      started_at: startTime,
      completed_at: context.now().toISOString(),
      units_found: result.unitsFound,
      changes_found: result.changesFound,
      status: 'completed'
    });

    console.log(`✅ ${name} job completed`);
    return result;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    console.error(`❌ ${name} job failed:`, errorMessage);

    try {
      await context.store.logRun({
        job_name: name,
        started_at: startTime,
        completed_at: context.now().toISOString(),
        units_found: 0,
        changes_found: 0,
        errors: errorMessage,
        status: 'failed'
      });

      if (context.notifications) {
        await context.notifications.sendErrorNotification(errorMessage, `${name} job`);
      }
    } catch (logError) {
      console.error('Failed to log error or send notification:', logError);
    }

    throw error;
  }
}
