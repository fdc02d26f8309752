import mongoose, { Connection } from 'mongoose';
import type { AppConfig } from './index.js';

// One connection per process, opened at startup and handed to the store.
export const connectDB = async (config: Pick<AppConfig, 'mongodbUri' | 'mongodbDbName'>): Promise<Connection> => {
  const connection = mongoose.createConnection(config.mongodbUri, {
    dbName: config.mongodbDbName,
    serverSelectionTimeoutMS: 10000,
    connectTimeoutMS: 10000,
  });
  await connection.asPromise();
  console.log(`🍃 MongoDB Connected: ${connection.host}/${connection.name}`);
  return connection;
};

export const disconnectDB = async (connection: Connection): Promise<void> => {
  await connection.close();
  console.log('🍃 MongoDB connection closed');
};
