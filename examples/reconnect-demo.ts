/**
 * Reconnection Demo
 *
 * Connects to a Centrifugo server, subscribes to one channel with recovery
 * and prints connection statistics while you restart the server.
 *
 * Usage:
 *   CENTRIFUGO_URL=ws://localhost:8000/connection/websocket \
 *   CENTRIFUGO_TOKEN_SECRET=<hmac secret> CENTRIFUGO_USER=demo \
 *   tsx examples/reconnect-demo.ts
 */

import { RealtimeClient, loadClientConfig, toError } from '@pushline/client';

const CHANNEL = process.env.CHANNEL || 'chat';
const STATS_INTERVAL_MS = 5000;
const PUBLISH_INTERVAL_MS = 10000;

function formatDuration(seconds: number): string {
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  if (seconds < 3600) return `${(seconds / 60).toFixed(1)}m`;
  return `${(seconds / 3600).toFixed(2)}h`;
}

async function main(): Promise<void> {
  const options = loadClientConfig();

  console.log('='.repeat(60));
  console.log('Reconnection Demo');
  console.log('='.repeat(60));
  console.log(`Server URL: ${options.url}`);
  console.log(`Channel:    ${CHANNEL}`);
  console.log('='.repeat(60));

  const client = new RealtimeClient({ ...options, name: 'reconnect-demo' });

  client.on('connected', (ctx) => {
    console.log(`\n[EVENT] Connected: clientId=${ctx.clientId}, server=${ctx.version}`);
  });

  client.on('disconnected', (ctx) => {
    console.log(`\n[EVENT] Disconnected: reason=${ctx.reason}, code=${ctx.code}, reconnect=${ctx.reconnect}`);
  });

  client.on('reconnecting', (ctx) => {
    console.log(`\n[EVENT] Reconnecting: attempt=${ctx.attempt}, delay=${ctx.delay}ms`);
  });

  client.on('reconnected', (ctx) => {
    console.log(`\n[EVENT] Reconnected: clientId=${ctx.clientId}, after ${ctx.attempt} attempts`);
  });

  client.on('error', (ctx) => {
    console.error(`\n[EVENT] Error (${ctx.code}):`, ctx.error.message);
  });

  client.on('stateChange', (ctx) => {
    console.log(`[EVENT] State changed: ${ctx.oldState} -> ${ctx.newState}`);
  });

  client.subscribe(CHANNEL, {
    onSubscribed: (ctx) => {
      const where = ctx.position ? ` at offset ${ctx.position.offset}` : '';
      console.log(`[SUBSCRIPTION] Subscribed to ${ctx.channel}${where} (recovered=${ctx.recovered})`);
    },
    onPublication: (pub) => {
      const marker = pub.recovered === false ? ' [after gap]' : '';
      console.log(`[MESSAGE] #${pub.offset}${marker}: ${JSON.stringify(pub.data)}`);
    },
    onGap: (ctx) => {
      console.warn(
        `[GAP] ${ctx.channel}: missed messages after offset ${ctx.lastPosition.offset}` +
          (ctx.currentPosition ? `, stream now at ${ctx.currentPosition.offset}` : '')
      );
    },
    onError: (ctx) => {
      console.error(`[SUBSCRIPTION ERROR] ${ctx.error.message}`);
    },
  });

  console.log('Connecting...');
  await client.connect();

  const statsInterval = setInterval(() => {
    const stats = client.getStats();
    console.log('\n' + '-'.repeat(40));
    console.log('Connection Statistics:');
    console.log(`  State:             ${stats.state}`);
    console.log(`  Connect Attempts:  ${stats.connectAttempts}`);
    console.log(`  Connect Success:   ${stats.connectSuccess}`);
    console.log(`  Connect Failed:    ${stats.connectFailed}`);
    console.log(`  Reconnect Count:   ${stats.reconnectCount}`);
    console.log(`  Uptime:            ${formatDuration(stats.uptimeSeconds)}`);
    if (stats.lastDisconnectReason) {
      console.log(`  Last Disconnect:   ${stats.lastDisconnectReason} (code: ${stats.lastDisconnectCode})`);
    }
    console.log('-'.repeat(40) + '\n');
  }, STATS_INTERVAL_MS);

  let messageCount = 0;
  const publishInterval = setInterval(() => {
    if (!client.isConnected()) return;
    messageCount++;
    const count = messageCount;
    client
      .publish(CHANNEL, { text: `Hello from reconnect-demo (#${count})`, timestamp: Date.now() })
      .then(() => console.log(`[SENT] Message #${count}`))
      .catch((err: unknown) => {
        console.error(`[SEND ERROR] Failed to send message #${count}:`, toError(err).message);
      });
  }, PUBLISH_INTERVAL_MS);

  const shutdown = (): void => {
    console.log('\n\nShutting down...');
    clearInterval(statsInterval);
    clearInterval(publishInterval);

    const finalStats = client.getStats();
    console.log('\n' + '='.repeat(60));
    console.log('Final Statistics:');
    console.log(`  Total Connect Attempts: ${finalStats.connectAttempts}`);
    console.log(`  Successful Connections: ${finalStats.connectSuccess}`);
    console.log(`  Failed Connections:     ${finalStats.connectFailed}`);
    console.log(`  Reconnections:          ${finalStats.reconnectCount}`);
    console.log(`  Total Uptime:           ${formatDuration(finalStats.uptimeSeconds)}`);
    console.log('='.repeat(60));

    client.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  console.log('\nDemo running. Press Ctrl+C to stop.');
  console.log('Try stopping and starting the server to test reconnection.\n');
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
