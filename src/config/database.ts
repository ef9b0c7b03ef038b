import { Pool } from 'pg';
import config from './index';
import logger from '../services/logger.service';

const pool = new Pool({
  connectionString: config.database.url,
  max: config.database.maxConnections,
  idleTimeoutMillis: config.database.idleTimeoutMillis,
  connectionTimeoutMillis: config.database.connectionTimeoutMillis,
  ssl: config.database.ssl ? { rejectUnauthorized: false } : undefined,
  options: `-c search_path=${config.database.schema}`,
});

pool.on('error', (err) => {
  logger.error('Unexpected error on idle database client', { error: err.message });
});

export default pool;
