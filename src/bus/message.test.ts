import { describe, it, expect } from 'vitest';
import { Message, SubscribeOptions, fromSubResponse } from './message';
import { decodeJson } from '../core/codecs';

describe('Message', () => {
  it('starts with empty variables and no delays', () => {
    const msg = new Message('orders', 'hello');
    expect(msg.variables).toEqual({});
    expect(msg.postpone).toBe(0);
    expect(msg.retention).toBe(0);
    expect(msg.body.toString('utf-8')).toBe('hello');
  });

  it('defaults to an empty body', () => {
    expect(new Message('orders').body.length).toBe(0);
  });

  it('copies byte bodies', () => {
    const bytes = new Uint8Array([1, 2, 3]);
    const msg = new Message('bin', bytes);
    expect([...msg.body]).toEqual([1, 2, 3]);
  });

  it('chains builders on the same instance', () => {
    const msg = new Message('orders', 'x');
    const result = msg.withVariables({ priority: 'high' }).withPostpone(60).withRetention(3600);

    expect(result).toBe(msg);
    expect(msg.variables).toEqual({ priority: 'high' });
    expect(msg.postpone).toBe(60);
    expect(msg.retention).toBe(3600);
  });

  it('replaces variables instead of merging', () => {
    const msg = new Message('orders')
      .withVariables({ a: '1', b: '2' })
      .withVariables({ c: '3' });
    expect(msg.variables).toEqual({ c: '3' });
  });

  it('projects onto the publish request', () => {
    const msg = new Message('orders', 'payload')
      .withVariables({ k: 'v' })
      .withPostpone(5)
      .withRetention(10);

    const req = msg.toPubRequest();
    expect(req.topic).toBe('orders');
    expect(Buffer.from(req.body).toString('utf-8')).toBe('payload');
    expect(req.variables).toEqual({ k: 'v' });
    expect(req.postpone).toBe(5);
    expect(req.retention).toBe(10);
  });

  it('encodes JSON bodies', () => {
    const msg = Message.json('events', { id: 7, ok: true });
    expect(msg.body.toString('utf-8')).toBe('{"id":7,"ok":true}');
    expect(decodeJson(msg.body)).toEqual({ id: 7, ok: true });
  });
});

describe('fromSubResponse', () => {
  it('copies each field', () => {
    const body = Buffer.from('hi');
    expect(
      fromSubResponse({ topic: 'orders', uuid: 'u-1', body, variables: { a: 'b' } })
    ).toEqual({ topic: 'orders', uuid: 'u-1', body, variables: { a: 'b' } });
  });
});

describe('SubscribeOptions', () => {
  it('defaults batch and speed to zero', () => {
    const opts = new SubscribeOptions('orders.*');
    expect(opts.topic).toBe('orders.*');
    expect(opts.batch).toBe(0);
    expect(opts.speedPerSec).toBe(0);
  });

  it('chains and projects onto the subscribe request', () => {
    const opts = new SubscribeOptions('*').withBatch(100).withSpeedPerSec(50);
    expect(opts.toSubRequest()).toEqual({ topic: '*', batch: 100, speedPerSec: 50 });
  });
});
