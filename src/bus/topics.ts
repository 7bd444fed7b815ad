import type { Logger } from '../core/logger';
import { ErrorCode, MqError, toMqError } from '../core/errors';
import type { CallMetadata, MqTransport } from '../core/transport';
import type { CallOptions } from './types';

export const WILDCARD_TOPIC = '*';

/**
 * Human-readable form of a topic pattern for logs. Patterns are sent to the
 * server as-is.
 */
export function describeTopicPattern(topic: string): string {
  if (topic === WILDCARD_TOPIC) return 'all topics (wildcard)';
  if (topic.endsWith(`.${WILDCARD_TOPIC}`)) return `topics matching: ${topic}`;
  return `topic: ${topic}`;
}

export class TopicManager {
  constructor(
    private transport: MqTransport,
    private metadata: CallMetadata,
    private logger: Logger
  ) {}

  /**
   * Count stored messages matching a topic or pattern ("orders.*", "*").
   * The server reports an int64; counts above Number.MAX_SAFE_INTEGER come
   * back rounded to the nearest double.
   */
  async countMessages(topic: string, opts: CallOptions = {}): Promise<number> {
    if (topic === '') {
      throw new MqError(ErrorCode.Validation, 'topic is required for counting messages');
    }

    this.logger.debug(`Counting messages for topic: ${topic}`);

    try {
      const response = await this.transport.countMessages({ topic }, this.metadata, opts.signal);
      this.logger.info(`Counted ${response.messagesCount} messages for topic: ${topic}`);
      return response.messagesCount;
    } catch (err) {
      const error = toMqError(err, 'failed to count messages');
      this.logger.error(error.message);
      throw error;
    }
  }
}
