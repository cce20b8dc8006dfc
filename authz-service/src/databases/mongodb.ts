/**
 * MongoDB Connection
 */

import { MongoClient, type Db } from 'mongodb';
import { logger } from '../common/logger.js';
import { getErrorMessage } from '../common/errors.js';
import { maskUrl } from './redis.js';

let client: MongoClient | null = null;
let db: Db | null = null;

// ═══════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════

export interface MongoConfig {
  uri: string;
  /** Database name (default: the one in the URI) */
  dbName?: string;
  maxPoolSize?: number;
  minPoolSize?: number;
  connectTimeoutMS?: number;
  serverSelectionTimeoutMS?: number;
}

export const DEFAULT_MONGO_CONFIG: Omit<Required<MongoConfig>, 'uri' | 'dbName'> = {
  maxPoolSize: 100,
  minPoolSize: 10,
  connectTimeoutMS: 10000,
  serverSelectionTimeoutMS: 5000,
};

// ═══════════════════════════════════════════════════════════════════
// Connection
// ═══════════════════════════════════════════════════════════════════

export async function connectDatabase(config: MongoConfig): Promise<Db> {
  if (db) return db;

  const cfg = { ...DEFAULT_MONGO_CONFIG, ...config };
  const mongo = new MongoClient(cfg.uri, {
    maxPoolSize: cfg.maxPoolSize,
    minPoolSize: cfg.minPoolSize,
    connectTimeoutMS: cfg.connectTimeoutMS,
    serverSelectionTimeoutMS: cfg.serverSelectionTimeoutMS,
    retryWrites: true,
    retryReads: true,
  });

  try {
    await mongo.connect();
    await mongo.db('admin').command({ ping: 1 });
  } catch (error) {
    logger.error('Failed to connect to MongoDB', { error: getErrorMessage(error), uri: maskUrl(cfg.uri) });
    await mongo.close();
    throw error;
  }

  client = mongo;
  db = mongo.db(cfg.dbName);
  logger.info('Connected to MongoDB', { uri: maskUrl(cfg.uri), db: db.databaseName });
  return db;
}

export function getDatabase(): Db | null {
  return db;
}

export async function closeDatabase(): Promise<void> {
  if (client) {
    const mongo = client;
    client = null;
    db = null;
    await mongo.close();
    logger.info('MongoDB disconnected');
  }
}
