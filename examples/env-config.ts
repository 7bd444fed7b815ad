/**
 * Example: configuring the client from environment variables
 * TOGOMQ_TOKEN is required; see configFromEnv for the rest
 */

import { MqClient, Message, configFromEnv, isMqError, ErrorCode } from '../src/index';

async function main() {
  const config = configFromEnv();

  console.log('Configuration loaded:');
  console.log('- Host:', config.host);
  console.log('- Port:', config.port);
  console.log('- TLS:', config.useTls);
  console.log('- Log level:', config.logLevel);
  console.log('');

  let client: MqClient;
  try {
    client = MqClient.create(config);
  } catch (err) {
    if (isMqError(err, ErrorCode.Validation)) {
      console.error('Invalid configuration:', err.message);
      process.exit(1);
    }
    throw err;
  }

  const healthy = await client.ping();
  console.log('✓ Health check:', healthy ? 'PASS' : 'FAIL');

  const response = await client.publishBatch([
    Message.json('env-test', {
      test: 'environment configuration',
      timestamp: new Date().toISOString(),
    }),
  ]);
  console.log('✓ Published', response.messagesReceived, 'message');

  const count = await client.countMessages('env-test');
  console.log('✓ Messages waiting on env-test:', count);

  client.close();
  console.log('\n✓ Client closed');
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
