/**
 * CartSync Server
 * Main entry point: loads lists from storage and serves them over WebSocket
 */

import * as dotenv from 'dotenv';
import { loadConfig } from './config';
import { openStorage } from './db/index';
import { ListStore } from './store/list-store';
import { CartSyncWSServer } from './websocket/server';

// Load environment variables
dotenv.config();

async function main() {
  const config = loadConfig();
  console.log('Starting CartSync Server...');

  // Load the last durable state
  console.log(`Opening ${config.storageDriver} storage in ${config.dataDir}...`);
  const store = await ListStore.open(openStorage(config), {
    durability: config.durability,
    createOnReference: config.autoCreateLists,
    persistence: { debounceMs: config.persistDebounceMs, retryMs: config.persistRetryMs },
  });

  store.scheduler.on('degraded', () => {
    console.warn('Durability degraded: changes are live but not yet saved');
  });

  // Start WebSocket server
  const wsServer = new CartSyncWSServer(
    {
      port: config.port,
      host: config.host,
      heartbeatIntervalMs: config.heartbeatIntervalMs,
      maxBufferedBytes: config.maxBufferedBytes,
    },
    store,
  );
  const port = await wsServer.ready();

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\nShutting down...');
    try {
      await wsServer.close();
      await store.close();
      process.exit(0);
    } catch (error) {
      console.error('Shutdown failed:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  console.log('CartSync Server ready!');
  console.log(`WebSocket server: ws://${config.host}:${port}`);
  console.log(`Durability: ${config.durability}`);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
