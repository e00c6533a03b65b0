import { MongoClient } from 'mongodb';
import type { ILogger } from '@keepsake/types';
import type { AppConfig } from '../config/env.js';

/**
 * Open the MongoDB connection pool.
 *
 * Multi-document transactions need a replica set or sharded cluster; a
 * single-node replica set is enough for development.
 */
export async function connectDatabase(config: Pick<AppConfig, 'mongoUri'>, logger: ILogger): Promise<MongoClient> {
  const client = new MongoClient(config.mongoUri, {
    maxPoolSize: 20,
    serverSelectionTimeoutMS: 5000
  });

  client.on('serverHeartbeatFailed', event => logger.warn({ connectionId: event.connectionId }, 'MongoDB heartbeat failed'));
  client.on('topologyClosed', () => logger.warn('MongoDB disconnected'));

  await client.connect();
  logger.info('MongoDB connected');
  return client;
}

export async function disconnectDatabase(client: MongoClient): Promise<void> {
  await client.close();
}
