/**
 * In-process transport fakes for tests
 */

import { Metadata, status as Status } from '@grpc/grpc-js';
import type { StatusError } from './core/errors';
import { Logger } from './core/logger';
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
} from './core/transport';

/**
 * Error shaped like a grpc-js ServiceError
 */
export function statusError(code: Status, details: string): StatusError {
  return Object.assign(new Error(`${code} ${Status[code]}: ${details}`), {
    code,
    details,
    metadata: new Metadata(),
  });
}

export function silentLogger(): Logger {
  return new Logger('none');
}

export interface PublishFailures {
  send?: Error;
  recv?: Error;
}

export class FakePublishStream implements PublishStream {
  readonly sent: PubMessageRequest[] = [];
  cancelled = false;
  halfClosed = false;

  constructor(private readonly failures: PublishFailures = {}) {}

  async send(request: PubMessageRequest): Promise<void> {
    if (this.cancelled) throw statusError(Status.CANCELLED, 'Cancelled on client');
    if (this.failures.send) throw this.failures.send;
    this.sent.push(request);
  }

  async closeAndRecv(): Promise<PubMessageResponse> {
    if (this.cancelled) throw statusError(Status.CANCELLED, 'Cancelled on client');
    this.halfClosed = true;
    if (this.failures.recv) throw this.failures.recv;
    return { messagesReceived: this.sent.length };
  }

  cancel(): void {
    this.cancelled = true;
  }
}

type StreamEvent =
  | { kind: 'frame'; frame: SubMessageResponse }
  | { kind: 'end' }
  | { kind: 'error'; error: Error };

interface Waiter {
  resolve: (frame: SubMessageResponse | undefined) => void;
  reject: (error: Error) => void;
}

/**
 * Server-push stream driven by the test: push(), end(), fail()
 */
export class FakeSubscribeStream implements SubscribeStream {
  private readonly queue: StreamEvent[] = [];
  private waiter: Waiter | undefined;
  framesRead = 0;
  cancelled = false;

  push(frame: Partial<SubMessageResponse> & { topic: string }): void {
    this.enqueue({
      kind: 'frame',
      frame: { uuid: '', body: Buffer.alloc(0), variables: {}, ...frame },
    });
  }

  end(): void {
    this.enqueue({ kind: 'end' });
  }

  fail(error: Error): void {
    this.enqueue({ kind: 'error', error });
  }

  recv(): Promise<SubMessageResponse | undefined> {
    if (this.cancelled) {
      return Promise.reject(statusError(Status.CANCELLED, 'Cancelled on client'));
    }
    return new Promise((resolve, reject) => {
      const event = this.queue.shift();
      if (event) {
        this.settle(event, { resolve, reject });
      } else {
        this.waiter = { resolve, reject };
      }
    });
  }

  cancel(): void {
    this.cancelled = true;
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.reject(statusError(Status.CANCELLED, 'Cancelled on client'));
  }

  private enqueue(event: StreamEvent): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      this.settle(event, waiter);
    } else {
      this.queue.push(event);
    }
  }

  private settle(event: StreamEvent, waiter: Waiter): void {
    switch (event.kind) {
      case 'frame':
        this.framesRead++;
        waiter.resolve(event.frame);
        break;
      case 'end':
        waiter.resolve(undefined);
        break;
      case 'error':
        waiter.reject(event.error);
        break;
    }
  }
}

export class FakeTransport implements MqTransport {
  readonly publishStreams: FakePublishStream[] = [];
  readonly subscribeStreams: FakeSubscribeStream[] = [];
  readonly subscribeRequests: SubMessageRequest[] = [];
  readonly countRequests: CountMessagesRequest[] = [];
  readonly metadata: CallMetadata[] = [];

  publishFailures: PublishFailures = {};
  countResult: number | Error = 0;
  readyError: Error | undefined;
  closed = false;

  pubMessage(metadata: CallMetadata, signal?: AbortSignal): PublishStream {
    this.metadata.push(metadata);
    const stream = new FakePublishStream(this.publishFailures);
    this.publishStreams.push(stream);
    if (signal?.aborted) {
      stream.cancel();
    } else {
      signal?.addEventListener('abort', () => stream.cancel(), { once: true });
    }
    return stream;
  }

  subMessage(request: SubMessageRequest, metadata: CallMetadata): SubscribeStream {
    this.metadata.push(metadata);
    this.subscribeRequests.push(request);
    const stream = new FakeSubscribeStream();
    this.subscribeStreams.push(stream);
    return stream;
  }

  async countMessages(
    request: CountMessagesRequest,
    metadata: CallMetadata
  ): Promise<CountMessagesResponse> {
    this.metadata.push(metadata);
    this.countRequests.push(request);
    if (this.countResult instanceof Error) throw this.countResult;
    return { messagesCount: this.countResult };
  }

  async waitForReady(): Promise<void> {
    if (this.readyError) throw this.readyError;
  }

  close(): void {
    this.closed = true;
  }
}
