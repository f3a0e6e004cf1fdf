import { Config } from '../config';
import { formatExperienceWindow } from '../filters/experience';
import { NotificationChannel, ScanMessage, ScanType } from './channels/types';
import { SnsChannel, createSnsClient, createTopicPublisher } from './channels/sns';
import { TelegramChannel, createTelegramMessenger } from './channels/telegram';
import { logger } from '../utils/logger';

export interface ScanSummary {
  jobCount: number;
  csvPath: string;
  byFamily: Record<string, number>;
  scanType: ScanType;
  scannedAt: Date;
}

const RULE = '='.repeat(50);

function formatScanTime(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19) + ' UTC';
}

/**
 * Builds the notification channels that have a destination configured
 */
export function createNotificationChannels(config: Config): NotificationChannel[] {
  const channels: NotificationChannel[] = [];

  if (config.sns.topicArn) {
    channels.push(new SnsChannel(
      config.sns.topicArn,
      createTopicPublisher(createSnsClient(config))
    ));
  }

  if (config.telegram.botToken && config.telegram.chatId) {
    channels.push(new TelegramChannel(
      config.telegram.chatId,
      createTelegramMessenger(config.telegram.botToken)
    ));
  }

  return channels;
}

/**
 * Publishes the scan summary to every configured channel
 * A failing channel never aborts the run
 */
export class NotificationDispatcher {
  constructor(
    private config: Config,
    private channels: NotificationChannel[]
  ) {}

  /**
   * Returns true when at least one channel accepted the message
   */
  async sendScanSummary(summary: ScanSummary): Promise<boolean> {
    if (this.channels.length === 0) {
      logger.warn('No notification destination configured, skipping notification');
      return false;
    }

    const message = this.formatScanMessage(summary);
    let delivered = 0;

    for (const channel of this.channels) {
      try {
        const messageId = await channel.deliver(message);
        delivered++;
        logger.info(`Notification sent via ${channel.name}`, { messageId });
      } catch (error) {
        logger.error(`Failed to send notification via ${channel.name}`, error, {
          jobCount: summary.jobCount,
        });
      }
    }

    return delivered > 0;
  }

  formatScanMessage(summary: ScanSummary): ScanMessage {
    const families = this.config.jobFamilies.map(family => family.label);
    const breakdown = Object.entries(summary.byFamily).map(
      ([family, count]) => `  - ${family}: ${count}`
    );

    const body = [
      RULE,
      'Job Scan Report',
      RULE,
      '',
      `Scan Time: ${formatScanTime(summary.scannedAt)}`,
      `Search: ${families.join(', ')} in ${this.config.jobLocation}`,
      `Experience Filter: ${formatExperienceWindow(this.config.experience)}`,
      '',
      RULE,
      'Results Summary',
      RULE,
      '',
      `Total Jobs Found: ${summary.jobCount}`,
      'By Role:',
      ...(breakdown.length > 0 ? breakdown : ['  (none)']),
      '',
      `CSV File: ${summary.csvPath}`,
      '',
      RULE,
      `Next scan follows the schedule "${this.config.schedule.expression}" (${this.config.schedule.timezone}).`,
    ].join('\n');

    return {
      subject: `Job Scan Alert - ${summary.jobCount} New Listings Found`,
      body,
      jobCount: summary.jobCount,
      scanType: summary.scanType,
    };
  }
}
