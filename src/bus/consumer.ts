import type { Logger } from '../core/logger';
import { ErrorCode, MqError, toMqError } from '../core/errors';
import type { CallMetadata, MqTransport, SubscribeStream } from '../core/transport';
import type { SubscribeOptions } from './message';
import { Subscription } from './subscription';
import { describeTopicPattern } from './topics';
import type { CallOptions } from './types';

export class Consumer {
  private readonly active = new Set<Subscription>();

  constructor(
    private transport: MqTransport,
    private metadata: CallMetadata,
    private logger: Logger
  ) {}

  /**
   * Open a subscription. The topic is checked before any stream is opened.
   */
  subscribe(options: SubscribeOptions, opts: CallOptions = {}): Subscription {
    if (options.topic === '') {
      throw new MqError(ErrorCode.Validation, 'topic is required for subscription');
    }

    this.logger.debug(`Starting subscribe for topic: ${options.topic}`);

    let stream: SubscribeStream;
    try {
      stream = this.transport.subMessage(options.toSubRequest(), this.metadata, opts.signal);
    } catch (err) {
      const error = toMqError(err, 'failed to create subscribe stream');
      this.logger.error(error.message);
      throw error;
    }

    const subscription = new Subscription(stream, options.topic, this.logger, opts.signal, (sub) =>
      this.active.delete(sub)
    );
    this.active.add(subscription);

    this.logger.info(`Subscribe stream started for ${describeTopicPattern(options.topic)}`);
    return subscription;
  }

  get activeCount(): number {
    return this.active.size;
  }

  /**
   * End every live subscription with the given error
   */
  terminateAll(error: MqError): void {
    for (const subscription of this.active) {
      subscription.terminate(error);
    }
    this.active.clear();
  }
}
