import { encodeJson, toBody } from '../core/codecs';
import type {
  PubMessageRequest,
  SubMessageRequest,
  SubMessageResponse,
} from '../core/transport';

export type Variables = Record<string, string>;

/**
 * Outbound message. The topic is checked when the message is published,
 * not here.
 */
export class Message {
  topic: string;
  body: Buffer;
  variables: Variables = {};
  // Seconds before subscribers can see the message
  postpone = 0;
  // Seconds the server keeps the message
  retention = 0;

  constructor(topic: string, body: string | Uint8Array = '') {
    this.topic = topic;
    this.body = toBody(body);
  }

  static json(topic: string, value: unknown): Message {
    return new Message(topic, encodeJson(value));
  }

  /**
   * Replace the variables (not merged with earlier ones)
   */
  withVariables(variables: Variables): this {
    this.variables = variables;
    return this;
  }

  withPostpone(seconds: number): this {
    this.postpone = seconds;
    return this;
  }

  withRetention(seconds: number): this {
    this.retention = seconds;
    return this;
  }

  toPubRequest(): PubMessageRequest {
    return {
      topic: this.topic,
      body: this.body,
      variables: this.variables,
      postpone: this.postpone,
      retention: this.retention,
    };
  }
}

export interface ReceivedMessage {
  topic: string;
  // Server-assigned id
  uuid: string;
  body: Uint8Array;
  variables: Variables;
}

export function fromSubResponse(frame: SubMessageResponse): ReceivedMessage {
  return {
    topic: frame.topic,
    uuid: frame.uuid,
    body: frame.body,
    variables: frame.variables,
  };
}

/**
 * Subscription parameters. Topic may be exact, a prefix pattern such as
 * "orders.*", or "*" for every topic; matching happens on the server.
 */
export class SubscribeOptions {
  // 0 lets the server pick its default batch size
  batch = 0;
  // 0 means no delivery rate limit
  speedPerSec = 0;

  constructor(public topic: string) {}

  withBatch(batch: number): this {
    this.batch = batch;
    return this;
  }

  withSpeedPerSec(speed: number): this {
    this.speedPerSec = speed;
    return this;
  }

  toSubRequest(): SubMessageRequest {
    return {
      topic: this.topic,
      batch: this.batch,
      speedPerSec: this.speedPerSec,
    };
  }
}

export interface PubResponse {
  // Messages the server acknowledged; exact up to Number.MAX_SAFE_INTEGER
  messagesReceived: number;
}
