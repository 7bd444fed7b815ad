import type { Logger } from '../core/logger';
import { toMqError, type MqError } from '../core/errors';
import type { SubMessageResponse, SubscribeStream } from '../core/transport';
import { fromSubResponse, type ReceivedMessage } from './message';
import { Rendezvous } from './rendezvous';

/**
 * Live subscription. A background pump reads frames from the stream and
 * hands each one to the consumer through an unbuffered rendezvous, so a
 * slow consumer holds back further reads.
 *
 * Iteration ends cleanly when the server closes the stream or the
 * subscription is cancelled. A receive failure is thrown once, after the
 * messages delivered before it.
 */
export class Subscription implements AsyncIterable<ReceivedMessage> {
  private readonly channel = new Rendezvous<ReceivedMessage>();
  private readonly controller = new AbortController();
  private failure: MqError | undefined;
  private failureReported = false;

  /** Resolves once the pump has stopped */
  readonly closed: Promise<void>;

  constructor(
    private readonly stream: SubscribeStream,
    readonly topic: string,
    private readonly logger: Logger,
    signal?: AbortSignal,
    private readonly onFinish?: (subscription: Subscription) => void
  ) {
    this.controller.signal.addEventListener(
      'abort',
      () => {
        this.channel.close();
        this.stream.cancel();
      },
      { once: true }
    );

    const cancel = () => this.close();
    if (signal?.aborted) {
      this.close();
    } else {
      signal?.addEventListener('abort', cancel, { once: true });
    }

    // Start on the next tick so the caller holds the subscription first
    this.closed = Promise.resolve()
      .then(() => this.pump(this.controller.signal))
      .finally(() => signal?.removeEventListener('abort', cancel));
  }

  /**
   * Terminal receive error, if the stream failed
   */
  get error(): MqError | undefined {
    return this.failure;
  }

  async next(): Promise<IteratorResult<ReceivedMessage, undefined>> {
    const result = await this.channel.receive();
    if (result.done && this.failure && !this.failureReported) {
      this.failureReported = true;
      throw this.failure;
    }
    return result;
  }

  [Symbol.asyncIterator](): AsyncIterator<ReceivedMessage, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }

  /**
   * Stop the subscription; a message waiting for delivery is dropped
   */
  close(): void {
    this.controller.abort();
  }

  /**
   * Stop the subscription and report the given error to the consumer
   */
  terminate(error: MqError): void {
    if (this.channel.isClosed) return;
    this.failure ??= error;
    this.close();
  }

  private async pump(signal: AbortSignal): Promise<void> {
    let received = 0;

    try {
      while (!signal.aborted) {
        let frame: SubMessageResponse | undefined;
        try {
          frame = await this.stream.recv();
        } catch (err) {
          if (signal.aborted) {
            this.logger.info(`Subscription to ${this.topic} cancelled`);
            return;
          }
          this.failure = toMqError(err, 'failed to receive message');
          this.logger.error(`Failed to receive message: ${this.failure.message}`);
          return;
        }

        if (frame === undefined) {
          this.logger.info(`Subscribe stream ended, received ${received} messages`);
          return;
        }

        received++;
        this.logger.debug(`Received message from topic: ${frame.topic}, UUID: ${frame.uuid}`);

        const accepted = await this.channel.send(fromSubResponse(frame));
        if (!accepted) {
          this.logger.info(`Subscription to ${this.topic} cancelled`);
          return;
        }
      }
    } finally {
      this.channel.close();
      this.onFinish?.(this);
    }
  }
}
