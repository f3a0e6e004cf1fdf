import {
  CreateTopicCommand,
  PublishCommand,
  PublishCommandInput,
  SNSClient,
  SubscribeCommand,
} from '@aws-sdk/client-sns';
import { NotificationChannel, ScanMessage } from './types';
import { Config } from '../../config';

export interface TopicPublisher {
  publish(input: PublishCommandInput): Promise<{ MessageId?: string }>;
}

export interface TopicAdmin {
  createTopic(name: string): Promise<string | undefined>;
  subscribeEmail(topicArn: string, email: string): Promise<string | undefined>;
}

/**
 * Explicit keys when both are configured, otherwise the SDK's default
 * credential chain (IAM role, shared credentials file, ...)
 */
export function createSnsClient(config: Config): SNSClient {
  const { region, accessKeyId, secretAccessKey } = config.sns;
  return new SNSClient({
    region,
    credentials: accessKeyId && secretAccessKey
      ? { accessKeyId, secretAccessKey }
      : undefined,
  });
}

export function createTopicPublisher(client: SNSClient): TopicPublisher {
  return {
    publish: (input) => client.send(new PublishCommand(input)),
  };
}

export function createTopicAdmin(client: SNSClient): TopicAdmin {
  return {
    async createTopic(name) {
      const response = await client.send(new CreateTopicCommand({ Name: name }));
      return response.TopicArn;
    },
    async subscribeEmail(topicArn, email) {
      const response = await client.send(new SubscribeCommand({
        TopicArn: topicArn,
        Protocol: 'email',
        Endpoint: email,
      }));
      return response.SubscriptionArn;
    },
  };
}

/**
 * Publishes the scan summary to an SNS topic (email/SMS subscribers)
 */
export class SnsChannel implements NotificationChannel {
  readonly name = 'sns';

  constructor(
    private topicArn: string,
    private publisher: TopicPublisher
  ) {}

  async deliver(message: ScanMessage): Promise<string | undefined> {
    const response = await this.publisher.publish({
      TopicArn: this.topicArn,
      Subject: message.subject,
      Message: message.body,
      MessageAttributes: {
        JobCount: {
          DataType: 'Number',
          StringValue: String(message.jobCount),
        },
        ScanType: {
          DataType: 'String',
          StringValue: message.scanType,
        },
      },
    });
    return response.MessageId;
  }
}
