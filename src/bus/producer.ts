import type { Logger } from '../core/logger';
import { ErrorCode, MqError, isMqError, toMqError } from '../core/errors';
import type { CallMetadata, MqTransport, PublishStream } from '../core/transport';
import type { Message, PubResponse } from './message';
import type { CallOptions } from './types';

export class Producer {
  constructor(
    private transport: MqTransport,
    private metadata: CallMetadata,
    private logger: Logger
  ) {}

  /**
   * Stream messages to the server in iteration order. Resolves with the
   * server's count once the input is exhausted. The first failure aborts the
   * call; messages already sent stay sent.
   */
  async publish(
    messages: Iterable<Message> | AsyncIterable<Message>,
    opts: CallOptions = {}
  ): Promise<PubResponse> {
    this.logger.debug('Starting publish');

    let stream: PublishStream;
    try {
      stream = this.transport.pubMessage(this.metadata, opts.signal);
    } catch (err) {
      throw this.fail(err, 'failed to create publish stream');
    }

    let sent = 0;
    try {
      for await (const message of messages) {
        if (message.topic === '') {
          this.logger.error('Message topic is required');
          throw new MqError(ErrorCode.Validation, 'message topic is required');
        }

        this.logger.debug(`Publishing message to topic: ${message.topic}`);
        try {
          await stream.send(message.toPubRequest());
        } catch (err) {
          throw this.fail(err, 'failed to send message');
        }
        sent++;
      }
    } catch (err) {
      stream.cancel();
      if (isMqError(err)) throw err;
      // the input iterable itself failed
      const error = new MqError(ErrorCode.Publish, 'failed to read message', err);
      this.logger.error(error.message);
      throw error;
    }

    this.logger.info(`Sent ${sent} messages, waiting for response`);

    let response: PubResponse;
    try {
      response = await stream.closeAndRecv();
    } catch (err) {
      throw this.fail(err, 'failed to receive publish response');
    }

    this.logger.info(`Publish completed: ${response.messagesReceived} messages received by server`);
    return { messagesReceived: response.messagesReceived };
  }

  /**
   * Publish a fixed list of messages over one stream
   */
  async publishBatch(messages: Message[], opts: CallOptions = {}): Promise<PubResponse> {
    this.logger.debug(`Publishing batch of ${messages.length} messages`);
    return this.publish(messages, opts);
  }

  private fail(err: unknown, context: string): MqError {
    const error = toMqError(err, context);
    this.logger.error(error.message);
    return error;
  }
}
