import { describe, it, expect } from 'vitest';
import { Rendezvous } from './rendezvous';

describe('Rendezvous', () => {
  it('hands a value to a waiting receiver', async () => {
    const channel = new Rendezvous<number>();
    const received = channel.receive();

    await expect(channel.send(1)).resolves.toBe(true);
    await expect(received).resolves.toEqual({ value: 1, done: false });
  });

  it('holds the sender until a receiver arrives', async () => {
    const channel = new Rendezvous<string>();
    let accepted: boolean | undefined;
    const sent = channel.send('a').then((ok) => {
      accepted = ok;
    });

    await Promise.resolve();
    expect(accepted).toBeUndefined();

    await expect(channel.receive()).resolves.toEqual({ value: 'a', done: false });
    await sent;
    expect(accepted).toBe(true);
  });

  it('drops a pending value on close', async () => {
    const channel = new Rendezvous<string>();
    const sent = channel.send('late');

    channel.close();

    await expect(sent).resolves.toBe(false);
    await expect(channel.receive()).resolves.toEqual({ value: undefined, done: true });
  });

  it('releases waiting receivers on close', async () => {
    const channel = new Rendezvous<number>();
    const received = channel.receive();

    channel.close();

    await expect(received).resolves.toEqual({ value: undefined, done: true });
    expect(channel.isClosed).toBe(true);
  });

  it('refuses sends after close', async () => {
    const channel = new Rendezvous<number>();
    channel.close();
    await expect(channel.send(1)).resolves.toBe(false);
  });
});
