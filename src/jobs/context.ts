import { AppConfig } from '../config';
import { MarketplaceClient } from '../services/marketplace';
import { NotificationService } from '../services/notifications';
import { SnapshotStore } from '../types/store';

/**
 * Collaborators shared by every job. `notifications` is null for dry runs,
 * where messages are only printed.
 */
export interface JobContext {
  config: AppConfig;
  store: SnapshotStore;
  marketplace: MarketplaceClient;
  notifications: NotificationService | null;
  now: () => Date;
}

export interface JobResult {
  unitsFound: number;
  changesFound: number;
  notified: boolean;
}
