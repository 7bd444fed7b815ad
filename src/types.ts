/**
 * Public types for the TogoMQ client
 */

export type { ClientConfig, ConfigOption, EnvConfig } from './core/config';
export type { StatusError } from './core/errors';
export type { LogLevel, LogSink } from './core/logger';

export type {
  CallMetadata,
  MqTransport,
  PublishStream,
  SubscribeStream,
  PubMessageRequest,
  PubMessageResponse,
  SubMessageRequest,
  SubMessageResponse,
  CountMessagesRequest,
  CountMessagesResponse,
} from './core/transport';

export type { PubResponse, ReceivedMessage, Variables } from './bus/message';
export type { CallOptions } from './bus/types';
