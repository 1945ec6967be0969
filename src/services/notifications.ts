import { AppConfig } from '../config';
import { ComposedMessage } from './messages';

export interface NotificationOptions {
  tags?: string[];
  /** ntfy priority, 1 (min) to 5 (max) */
  priority?: 1 | 2 | 3 | 4 | 5;
  clickUrl?: string;
}

/**
 * Push notification service using ntfy.sh
 */
export class NotificationService {
  private ntfyTopic: string;
  private ntfyServer: string;

  constructor(config: Pick<AppConfig, 'ntfy'>) {
    this.ntfyTopic = config.ntfy.topic;
    this.ntfyServer = config.ntfy.server.replace(/\/+$/, '');

    console.log(`Notification service initialized with ntfy topic: ${this.ntfyTopic}`);
  }

  /**
   * Publish one message. JSON bodies go to the server root with the topic
   * inside the payload.
   */
  private async publish(title: string, message: string, options: NotificationOptions): Promise<void> {
    const response = await fetch(this.ntfyServer, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        topic: this.ntfyTopic,
        title,
        message,
        tags: options.tags ?? [],
        priority: options.priority ?? 3,
        ...(options.clickUrl ? { click: options.clickUrl } : {})
      })
    });

    if (!response.ok) {
      throw new Error(`ntfy request failed: ${response.status} ${response.statusText}`);
    }
  }

  /**
   * Send a composed alert. Failures are rethrown so the job is marked failed.
   */
  async sendAlert(composed: ComposedMessage, options: NotificationOptions = {}): Promise<void> {
    try {
      console.log(`Sending ntfy notification: ${composed.title}`);
      await this.publish(composed.title, composed.message, {
        tags: ['house'],
        priority: 4,
        ...options
      });
      console.log('Notification sent successfully');
    } catch (error) {
      console.error('Failed to send ntfy notification:', error);
      throw new Error(`Notification sending failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Send error notification to admin
   */
  async sendErrorNotification(error: string, context?: string): Promise<void> {
    try {
      const message = `${context ? `Context: ${context}\n` : ''}Error: ${error}`;
      await this.publish('🚨 Rental Alerts Error', message, { tags: ['warning', 'error'], priority: 5 });
      console.log('Error notification sent successfully');
    } catch (ntfyError) {
      console.error('Failed to send error notification:', ntfyError);
      // Don't throw here to avoid cascading failures
    }
  }
}
