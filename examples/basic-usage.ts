/**
 * Basic usage example for the TogoMQ client
 */

import {
  Message,
  MqClient,
  SubscribeOptions,
  decodeJson,
  newConfig,
  withLogLevel,
  withToken,
} from '../src/index';

async function* orderStream(count: number): AsyncGenerator<Message> {
  for (let i = 1; i <= count; i++) {
    yield Message.json('orders.eu', { orderId: `ord-${i}`, total: i * 10 });
    await new Promise((resolve) => setTimeout(resolve, 50));
  }
}

async function main() {
  const client = MqClient.create(
    newConfig(withToken(process.env.TOGOMQ_TOKEN || 'your-token-here'), withLogLevel('info'))
  );

  console.log('✓ Client created for', client.address);

  // Example 1: Batch publish
  console.log('\n--- Batch Publish ---');

  const batch = await client.publishBatch([
    new Message('orders', 'first order'),
    new Message('orders', 'urgent order').withVariables({ priority: 'high' }),
    new Message('orders', 'scheduled order').withPostpone(60).withRetention(3600),
  ]);

  console.log('✓ Server received', batch.messagesReceived, 'messages');

  // Example 2: Streaming publish from a generator
  console.log('\n--- Streaming Publish ---');

  const streamed = await client.publish(orderStream(5));
  console.log('✓ Streamed', streamed.messagesReceived, 'messages');

  // Example 3: Subscribe to a pattern
  console.log('\n--- Subscribing ---');

  const controller = new AbortController();
  const subscription = client.subscribe(
    new SubscribeOptions('orders.*').withBatch(10).withSpeedPerSec(100),
    { signal: controller.signal }
  );

  // Stop after ten seconds
  const timer = setTimeout(() => controller.abort(), 10_000);

  let received = 0;
  for await (const msg of subscription) {
    console.log(`\nMessage ${received + 1}:`, {
      topic: msg.topic,
      uuid: msg.uuid,
      payload: decodeJson(msg.body),
      variables: msg.variables,
    });

    received++;
    if (received >= 5) {
      break;
    }
  }
  clearTimeout(timer);

  // Example 4: Count
  const pending = await client.countMessages('orders');
  console.log('\nPending messages on orders:', pending);

  client.close();
  console.log('\n✓ Client closed');
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
