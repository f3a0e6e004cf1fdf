export type ScanType = 'Scheduled' | 'Manual';

/**
 * Channel-independent notification content
 */
export interface ScanMessage {
  subject: string;
  body: string;
  jobCount: number;
  scanType: ScanType;
}

export interface NotificationChannel {
  readonly name: string;
  /**
   * Delivers the message; resolves to a provider message id when one is returned
   */
  deliver(message: ScanMessage): Promise<string | undefined>;
}
