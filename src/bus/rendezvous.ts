interface PendingSend<T> {
  value: T;
  resolve: (accepted: boolean) => void;
}

/**
 * Unbuffered handoff between one producer and one consumer.
 * send() resolves true once a receiver took the value, or false if the
 * rendezvous closed first.
 */
export class Rendezvous<T> {
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  send(value: T): Promise<boolean> {
    if (this.closed) return Promise.resolve(false);

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return Promise.resolve(true);
    }
    return new Promise((resolve) => this.senders.push({ value, resolve }));
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve(true);
      return Promise.resolve({ value: sender.value, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.receivers.push(resolve));
  }

  /**
   * Close; values still waiting for a receiver are dropped
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const sender of this.senders.splice(0)) sender.resolve(false);
    for (const receiver of this.receivers.splice(0)) receiver({ value: undefined, done: true });
  }
}
