import 'dotenv/config';

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  corsOrigin: string[] | true;
  apiTitle: string;
  apiVersion: string;
  apiDescription: string;
  apiBaseUrl: string;
}

const DEFAULT_PORT = 3000;

function parsePort(raw: string | undefined): number {
  const port = parseInt(raw || '', 10);
  return Number.isNaN(port) ? DEFAULT_PORT : port;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = parsePort(env.PORT);
  const host = env.HOST || '0.0.0.0';

  return {
    port,
    host,
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
    // any origin unless a comma-separated allow list is given
    corsOrigin: env.CORS_ORIGIN
      ? env.CORS_ORIGIN.split(',').map((origin) => origin.trim())
      : true,
    apiTitle: env.API_TITLE || 'Item Store API',
    apiVersion: env.API_VERSION || '1.0.0',
    apiDescription: env.API_DESCRIPTION || 'A minimal in-memory item store',
    apiBaseUrl: env.API_BASE_URL || `http://${host}:${port}`,
  };
}
