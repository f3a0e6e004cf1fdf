import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from '../config';
import { createSnsClient, createTopicAdmin } from '../services/channels/sns';
import { logger, setLogLevel } from '../utils/logger';

/**
 * Creates (or finds) the SNS topic and subscribes an email address to it
 * Usage: setup-notifications <email> [topic-name]
 */
async function setupNotifications() {
  const [email, topicName = 'job-alerts'] = process.argv.slice(2);
  if (!email) {
    logger.error('Usage: setup-notifications <email> [topic-name]');
    process.exit(1);
  }

  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    const admin = createTopicAdmin(createSnsClient(config));

    const topicArn = config.sns.topicArn || await admin.createTopic(topicName);
    if (!topicArn) {
      throw new Error(`SNS did not return an ARN for topic ${topicName}`);
    }
    logger.info('SNS topic ready', { topicArn });

    await admin.subscribeEmail(topicArn, email);
    logger.info(`Subscription created. Check ${email} for the confirmation link.`, { topicArn });
    logger.info('Set SNS_TOPIC_ARN to this ARN to enable scan notifications');
    process.exit(0);
  } catch (error) {
    logger.error('Notification setup failed', error);
    process.exit(1);
  }
}

void setupNotifications();
