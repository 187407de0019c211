import { Pool, neonConfig } from '@neondatabase/serverless';
import { drizzle, type NeonDatabase } from 'drizzle-orm/neon-serverless';
import ws from "ws";
import * as schema from "@shared/schema";

// Neon serverless talks to Postgres over WebSockets
neonConfig.webSocketConstructor = ws;
neonConfig.useSecureWebSocket = true;
neonConfig.pipelineConnect = false;
neonConfig.pipelineTLS = false;

export type Database = NeonDatabase<typeof schema>;

export interface DatabaseConnection {
  pool: Pool;
  db: Database;
}

// Detect if running in production (deployed) environment
const isProduction = process.env.NODE_ENV === 'production';

export function connectDatabase(connectionString: string): DatabaseConnection {
  // Fewer, longer-lived connections in production to ride out cold starts
  const pool = new Pool({
    connectionString,
    max: isProduction ? 5 : 10,
    idleTimeoutMillis: isProduction ? 60000 : 30000,
    connectionTimeoutMillis: isProduction ? 30000 : 15000,
    maxUses: 7500,
    allowExitOnIdle: false
  });

  pool.on('error', (err: Error) => {
    console.error('[Database Pool] Error:', err.message);
  });

  pool.on('connect', () => {
    console.log('Database connection established');
  });

  return { pool, db: drizzle({ client: pool, schema }) };
}

export async function testDatabaseConnection(pool: Pool): Promise<boolean> {
  try {
    const client = await pool.connect();
    await client.query('SELECT 1');
    client.release();
    return true;
  } catch (error) {
    console.error('[Database] Connection test failed:', error instanceof Error ? error.message : error);
    return false;
  }
}
