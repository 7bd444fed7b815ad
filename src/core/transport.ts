/**
 * Transport seam between the client and the wire.
 * Shapes mirror the mq.v1 schema in proto/mq/v1/mq.proto.
 */

export interface PubMessageRequest {
  topic: string;
  body: Uint8Array;
  variables: Record<string, string>;
  postpone: number;
  retention: number;
}

export interface PubMessageResponse {
  messagesReceived: number;
}

export interface SubMessageRequest {
  topic: string;
  batch: number;
  speedPerSec: number;
}

export interface SubMessageResponse {
  topic: string;
  uuid: string;
  body: Uint8Array;
  variables: Record<string, string>;
}

export interface CountMessagesRequest {
  topic: string;
}

export interface CountMessagesResponse {
  messagesCount: number;
}

export type CallMetadata = Record<string, string>;

export const AUTH_METADATA_KEY = 'authorization';

export function authMetadata(token: string): CallMetadata {
  return { [AUTH_METADATA_KEY]: token };
}

/**
 * Client-streaming publish call
 */
export interface PublishStream {
  send(request: PubMessageRequest): Promise<void>;
  // Half-close and wait for the server's acknowledgement
  closeAndRecv(): Promise<PubMessageResponse>;
  cancel(): void;
}

/**
 * Server-streaming subscribe call
 */
export interface SubscribeStream {
  // Resolves undefined once the server ends the stream cleanly
  recv(): Promise<SubMessageResponse | undefined>;
  cancel(): void;
}

export interface MqTransport {
  pubMessage(metadata: CallMetadata, signal?: AbortSignal): PublishStream;
  subMessage(
    request: SubMessageRequest,
    metadata: CallMetadata,
    signal?: AbortSignal
  ): SubscribeStream;
  countMessages(
    request: CountMessagesRequest,
    metadata: CallMetadata,
    signal?: AbortSignal
  ): Promise<CountMessagesResponse>;
  waitForReady(timeoutMs: number): Promise<void>;
  close(): void;
}
