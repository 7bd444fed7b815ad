/**
 * TogoMQ client
 * Publish, subscribe and count messages over a gRPC stream transport
 */

import { configAddress, validateConfig, type ClientConfig } from './core/config';
import { ErrorCode, MqError } from './core/errors';
import { GrpcTransport } from './core/grpc';
import { Logger } from './core/logger';
import { authMetadata, type MqTransport } from './core/transport';
import { Consumer } from './bus/consumer';
import type { Message, PubResponse, SubscribeOptions } from './bus/message';
import { Producer } from './bus/producer';
import type { Subscription } from './bus/subscription';
import { TopicManager } from './bus/topics';
import type { CallOptions } from './bus/types';

export interface ClientOptions {
  // Replaces the gRPC transport
  createTransport?: (config: Readonly<ClientConfig>) => MqTransport;
  logger?: Logger;
}

export class MqClient {
  private closed = false;

  private constructor(
    private readonly config: Readonly<ClientConfig>,
    private readonly transport: MqTransport,
    private readonly logger: Logger,
    private readonly producer: Producer,
    private readonly consumer: Consumer,
    private readonly topicManager: TopicManager
  ) {}

  /**
   * Validate the configuration and open the transport connection
   */
  static create(config: ClientConfig, options: ClientOptions = {}): MqClient {
    if (!config) {
      throw new MqError(ErrorCode.Configuration, 'config is required');
    }

    try {
      validateConfig(config);
    } catch (err) {
      throw new MqError(ErrorCode.Validation, 'invalid configuration', err);
    }

    const frozen: Readonly<ClientConfig> = Object.freeze({ ...config });
    const logger = options.logger ?? new Logger(frozen.logLevel);
    logger.info(`Creating TogoMQ client for ${configAddress(frozen)}`);

    let transport: MqTransport;
    try {
      transport = options.createTransport
        ? options.createTransport(frozen)
        : new GrpcTransport(frozen);
    } catch (err) {
      logger.error(`Failed to connect to TogoMQ: ${err instanceof Error ? err.message : String(err)}`);
      throw new MqError(ErrorCode.Connection, 'failed to create gRPC connection', err);
    }

    const metadata = Object.freeze(authMetadata(frozen.token));
    const client = new MqClient(
      frozen,
      transport,
      logger,
      new Producer(transport, metadata, logger),
      new Consumer(transport, metadata, logger),
      new TopicManager(transport, metadata, logger)
    );

    logger.info('TogoMQ client created successfully');
    return client;
  }

  get address(): string {
    return configAddress(this.config);
  }

  /**
   * Stream messages from any (async) iterable; resolves when the input ends
   * and the server has acknowledged
   */
  async publish(
    messages: Iterable<Message> | AsyncIterable<Message>,
    opts?: CallOptions
  ): Promise<PubResponse> {
    this.assertOpen();
    return this.producer.publish(messages, opts);
  }

  async publishBatch(messages: Message[], opts?: CallOptions): Promise<PubResponse> {
    this.assertOpen();
    return this.producer.publishBatch(messages, opts);
  }

  /**
   * Subscribe to a topic or pattern ("orders.*", "*").
   * Iterate the result with `for await`; abort the signal or call close() to stop.
   */
  subscribe(options: SubscribeOptions, opts?: CallOptions): Subscription {
    this.assertOpen();
    return this.consumer.subscribe(options, opts);
  }

  /**
   * Count stored messages for a topic or pattern. Exact up to
   * Number.MAX_SAFE_INTEGER.
   */
  async countMessages(topic: string, opts?: CallOptions): Promise<number> {
    this.assertOpen();
    return this.topicManager.countMessages(topic, opts);
  }

  /**
   * Health check: waits for the connection to become ready
   */
  async ping(timeoutMs: number = 5000): Promise<boolean> {
    if (this.closed) return false;
    try {
      await this.transport.waitForReady(timeoutMs);
      return true;
    } catch (err) {
      this.logger.warn(`Ping failed: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }

  /**
   * Close the connection. Live subscriptions end with a connection error.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    this.logger.info('Closing TogoMQ client');
    this.consumer.terminateAll(new MqError(ErrorCode.Connection, 'client closed'));
    this.transport.close();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new MqError(ErrorCode.Connection, 'client is closed');
    }
  }
}

export * from './types';
export {
  configFromEnv,
  defaultConfig,
  newConfig,
  validateConfig,
  configAddress,
  channelOptions,
  withHost,
  withPort,
  withToken,
  withLogLevel,
  withTls,
  withMaxMessageSize,
  withInitialWindowSize,
  withInitialConnWindowSize,
  withWriteBufferSize,
  withReadBufferSize,
  withKeepaliveTime,
  withKeepaliveTimeout,
  ConfigValidationError,
  ConfigViolation,
} from './core/config';
export { ErrorCode, MqError, isMqError, wrapGrpcError } from './core/errors';
export { Logger, parseLogLevel } from './core/logger';
export { decodeJson } from './core/codecs';
export { GrpcTransport } from './core/grpc';
export { Message, SubscribeOptions } from './bus/message';
export { Subscription } from './bus/subscription';
export { WILDCARD_TOPIC } from './bus/topics';
