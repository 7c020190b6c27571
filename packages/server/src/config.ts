import { createLogger, isLogLevel, type LogLevel } from './logger.js';

const log = createLogger('Config');

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  meterIds: string[];
  demo: boolean;
  maxReadings: number;
}

export const DEFAULT_CONFIG: ServerConfig = {
  port: 3410,
  host: '0.0.0.0',
  logLevel: 'info',
  meterIds: [],
  demo: false,
  maxReadings: 500,
};

function positiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const n = parseInt(raw, 10);
  if (!Number.isInteger(n) || n <= 0 || String(n) !== raw.trim()) {
    log.warn(`${name}=${raw} is not a positive integer, using ${fallback}`);
    return fallback;
  }
  return n;
}

export function parseMeterIds(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(',').map(s => s.trim().toUpperCase()).filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const logLevel = env.LOG_LEVEL ?? '';
  if (logLevel && !isLogLevel(logLevel)) log.warn(`Unknown LOG_LEVEL ${logLevel}, using info`);

  return {
    port: positiveInt('PORT', env.PORT, DEFAULT_CONFIG.port),
    host: env.HOST || DEFAULT_CONFIG.host,
    logLevel: isLogLevel(logLevel) ? logLevel : DEFAULT_CONFIG.logLevel,
    meterIds: parseMeterIds(env.WMBUS_METER_IDS),
    demo: env.WMBUS_DEMO === '1' || env.WMBUS_DEMO === 'true',
    maxReadings: positiveInt('WMBUS_MAX_READINGS', env.WMBUS_MAX_READINGS, DEFAULT_CONFIG.maxReadings),
  };
}
