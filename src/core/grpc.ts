import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { existsSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { channelOptions, configAddress, type ClientConfig } from './config';
import { toStringMap } from './codecs';
import type {
  CallMetadata,
  CountMessagesRequest,
  CountMessagesResponse,
  MqTransport,
  PubMessageRequest,
  PubMessageResponse,
  PublishStream,
  SubMessageRequest,
  SubMessageResponse,
  SubscribeStream,
} from './transport';

const PROTO_FILE = join('mq', 'v1', 'mq.proto');
const SERVICE_NAME = 'mq.v1.MqService';

type AnyDefinition = protoLoader.PackageDefinition[string];
type MethodDefinition = protoLoader.MethodDefinition<object, object>;

/**
 * Walk up from startDir to the directory holding proto/mq/v1/mq.proto
 */
export function findProtoRoot(startDir: string = __dirname): string {
  let dir = resolve(startDir);

  while (true) {
    const candidate = join(dir, 'proto');
    if (existsSync(join(candidate, PROTO_FILE))) {
      return candidate;
    }

    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`Schema ${PROTO_FILE} not found from: ${startDir}`);
    }
    dir = parent;
  }
}

function isServiceDefinition(
  def: AnyDefinition | undefined
): def is protoLoader.ServiceDefinition {
  return def !== undefined && !('format' in def);
}

let serviceDefinition: protoLoader.ServiceDefinition | undefined;

/**
 * The MqService definition, loaded once. int64 fields decode to numbers,
 * so values above Number.MAX_SAFE_INTEGER are rounded.
 */
export function loadService(): protoLoader.ServiceDefinition {
  if (serviceDefinition) return serviceDefinition;

  const pkg = protoLoader.loadSync(PROTO_FILE, {
    includeDirs: [findProtoRoot()],
    keepCase: false,
    longs: Number,
    enums: String,
    defaults: true,
  });

  const service = pkg[SERVICE_NAME];
  if (!isServiceDefinition(service)) {
    throw new Error(`Service ${SERVICE_NAME} missing from ${PROTO_FILE}`);
  }
  serviceDefinition = service;
  return service;
}

function method(service: protoLoader.ServiceDefinition, name: string): MethodDefinition {
  const def = service[name];
  if (!def) {
    throw new Error(`Method ${name} missing from ${SERVICE_NAME}`);
  }
  return def;
}

function field(value: object, key: string): unknown {
  return Reflect.get(value, key);
}

// int64 fields arrive as numbers (longs: Number) but tolerate strings
function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return Number(value);
  return 0;
}

function toBytes(value: unknown): Uint8Array {
  return value instanceof Uint8Array ? value : new Uint8Array();
}

function readSubResponse(value: object): SubMessageResponse {
  const topic = field(value, 'topic');
  const uuid = field(value, 'uuid');
  return {
    topic: typeof topic === 'string' ? topic : '',
    uuid: typeof uuid === 'string' ? uuid : '',
    body: toBytes(field(value, 'body')),
    variables: toStringMap(field(value, 'variables')),
  };
}

function toGrpcMetadata(metadata: CallMetadata): grpc.Metadata {
  const md = new grpc.Metadata();
  for (const [key, value] of Object.entries(metadata)) {
    md.set(key, value);
  }
  return md;
}

/**
 * Cancel the call when the signal aborts; returns the unbind function
 */
function bindSignal(signal: AbortSignal | undefined, cancel: () => void): () => void {
  if (!signal) return () => undefined;
  if (signal.aborted) {
    cancel();
    return () => undefined;
  }
  signal.addEventListener('abort', cancel, { once: true });
  return () => signal.removeEventListener('abort', cancel);
}

type PublishOutcome =
  | { error: grpc.ServiceError }
  | { error: null; value: object | undefined };

class GrpcPublishStream implements PublishStream {
  private readonly call: grpc.ClientWritableStream<object>;
  private readonly unbind: () => void;
  private outcome: PublishOutcome | undefined;
  private readonly waiters = new Set<(outcome: PublishOutcome) => void>();

  constructor(client: grpc.Client, def: MethodDefinition, metadata: CallMetadata, signal?: AbortSignal) {
    this.call = client.makeClientStreamRequest(
      def.path,
      def.requestSerialize,
      def.responseDeserialize,
      toGrpcMetadata(metadata),
      {},
      (error, value) => this.settle(error ? { error } : { error: null, value })
    );
    this.unbind = bindSignal(signal, () => this.call.cancel());
  }

  private settle(outcome: PublishOutcome): void {
    this.outcome = outcome;
    this.unbind();
    for (const waiter of this.waiters) waiter(outcome);
    this.waiters.clear();
  }

  private onSettled(callback: (outcome: PublishOutcome) => void): () => void {
    if (this.outcome) {
      callback(this.outcome);
      return () => undefined;
    }
    this.waiters.add(callback);
    return () => this.waiters.delete(callback);
  }

  send(request: PubMessageRequest): Promise<void> {
    return new Promise((resolve, reject) => {
      // A failed call may never flush the write, so settle on the call outcome too
      const stop = this.onSettled((outcome) => {
        if (outcome.error) reject(outcome.error);
      });
      this.call.write(request, (error: Error | null | undefined) => {
        stop();
        if (error) reject(error);
        else resolve();
      });
    });
  }

  closeAndRecv(): Promise<PubMessageResponse> {
    this.call.end();
    return new Promise((resolve, reject) => {
      this.onSettled((outcome) => {
        if (outcome.error) {
          reject(outcome.error);
        } else if (outcome.value === undefined) {
          reject(new Error('empty publish response'));
        } else {
          resolve({ messagesReceived: toNumber(field(outcome.value, 'messagesReceived')) });
        }
      });
    });
  }

  cancel(): void {
    this.call.cancel();
  }
}

class GrpcSubscribeStream implements SubscribeStream {
  private readonly call: grpc.ClientReadableStream<object>;
  private readonly frames: AsyncIterator<unknown>;
  private readonly unbind: () => void;

  constructor(
    client: grpc.Client,
    def: MethodDefinition,
    request: SubMessageRequest,
    metadata: CallMetadata,
    signal?: AbortSignal
  ) {
    this.call = client.makeServerStreamRequest(
      def.path,
      def.requestSerialize,
      def.responseDeserialize,
      request,
      toGrpcMetadata(metadata),
      {}
    );
    this.frames = this.call[Symbol.asyncIterator]();
    this.unbind = bindSignal(signal, () => this.call.cancel());
  }

  async recv(): Promise<SubMessageResponse | undefined> {
    try {
      const next = await this.frames.next();
      if (next.done) {
        this.unbind();
        return undefined;
      }
      const frame: unknown = next.value;
      if (typeof frame !== 'object' || frame === null) {
        throw new Error('malformed subscribe frame');
      }
      return readSubResponse(frame);
    } catch (err) {
      this.unbind();
      throw err;
    }
  }

  cancel(): void {
    this.unbind();
    this.call.cancel();
  }
}

/**
 * MqTransport over a single grpc-js channel
 */
export class GrpcTransport implements MqTransport {
  private readonly client: grpc.Client;
  private readonly service: protoLoader.ServiceDefinition;

  constructor(config: Readonly<ClientConfig>) {
    this.service = loadService();
    const credentials = config.useTls
      ? grpc.credentials.createSsl()
      : grpc.credentials.createInsecure();
    this.client = new grpc.Client(configAddress(config), credentials, channelOptions(config));
  }

  pubMessage(metadata: CallMetadata, signal?: AbortSignal): PublishStream {
    return new GrpcPublishStream(this.client, method(this.service, 'PubMessage'), metadata, signal);
  }

  subMessage(
    request: SubMessageRequest,
    metadata: CallMetadata,
    signal?: AbortSignal
  ): SubscribeStream {
    return new GrpcSubscribeStream(
      this.client,
      method(this.service, 'SubMessage'),
      request,
      metadata,
      signal
    );
  }

  countMessages(
    request: CountMessagesRequest,
    metadata: CallMetadata,
    signal?: AbortSignal
  ): Promise<CountMessagesResponse> {
    const def = method(this.service, 'CountMessages');
    return new Promise((resolve, reject) => {
      let unbind: () => void = () => undefined;
      const call = this.client.makeUnaryRequest(
        def.path,
        def.requestSerialize,
        def.responseDeserialize,
        request,
        toGrpcMetadata(metadata),
        {},
        (error, value) => {
          unbind();
          if (error) {
            reject(error);
          } else if (value === undefined) {
            reject(new Error('empty count response'));
          } else {
            resolve({ messagesCount: toNumber(field(value, 'messagesCount')) });
          }
        }
      );
      unbind = bindSignal(signal, () => call.cancel());
    });
  }

  waitForReady(timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      this.client.waitForReady(Date.now() + timeoutMs, (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  close(): void {
    this.client.close();
  }
}
