import { readFileSync } from 'fs';
import path from 'path';
import { ConfigError, errorMessage } from './errors.js';

export const SERVICE = 'gateway-service';

export const DEFAULT_CALTOPO_URL = 'https://caltopo.com/api/v1/position/report';
export const DEFAULT_TOPIC = 'msh/US/2/json/+/+';

export interface MqttSettings {
  url: string;
  topic: string;
  username?: string;
  password?: string;
  keepalive: number;
  // TLS options for mqtts:// (paths to PEM files)
  tlsCa?: string;
  tlsCert?: string;
  tlsKey?: string;
  tlsRejectUnauthorized: boolean;
}

export interface RetrySettings {
  /** Total attempts per destination, first one included. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface CalTopoSettings {
  baseUrl: string;
  /** Wildcard URL patterns; when empty only caltopo.com and its subdomains are accepted. */
  allowedUrlPatterns: string[];
  connectKey?: string;
  group?: string;
  timeoutMs: number;
  retry: RetrySettings;
}

export interface NodeOverride {
  /** Callsign shown at the destination instead of the device-reported name. */
  deviceId: string;
  group?: string;
}

export interface GatewayConfig {
  mqtt: MqttSettings;
  caltopo: CalTopoSettings;
  /** Keyed by lower-case hardware id, e.g. `!33687da0`. */
  nodes: Record<string, NodeOverride>;
  allowUnknownDevices: boolean;
  stateDb: string;
  statsIntervalMs: number;
  healthPort: number;
}

type Env = Record<string, string | undefined>;

function trimmed(value: string | undefined): string | undefined {
  const v = value?.trim();
  return v ? v : undefined;
}

function flag(name: string, value: string | undefined, fallback: boolean): boolean {
  const v = trimmed(value)?.toLowerCase();
  if (v === undefined) return fallback;
  if (['true', '1', 'yes', 'on'].includes(v)) return true;
  if (['false', '0', 'no', 'off'].includes(v)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${value}"`);
}

function integer(name: string, value: string | undefined, fallback: number, min = 0): number {
  const v = trimmed(value);
  if (v === undefined) return fallback;
  const n = Number(v);
  if (!Number.isInteger(n) || n < min) throw new ConfigError(`${name} must be an integer >= ${min}, got "${value}"`);
  return n;
}

/** Parse the per-device overrides document (`{ "!xxxxxxxx": { "device_id": "...", "group": "..." } }`). */
export function parseNodes(raw: unknown, source = 'nodes'): Record<string, NodeOverride> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`${source}: expected an object keyed by hardware id`);
  }
  const nodes: Record<string, NodeOverride> = {};
  for (const [key, entry] of Object.entries(raw)) {
    if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
      throw new ConfigError(`${source}: entry "${key}" must be an object`);
    }
    const deviceId = 'device_id' in entry ? entry.device_id : undefined;
    const group = 'group' in entry ? entry.group : undefined;
    if (typeof deviceId !== 'string' || !deviceId.trim()) {
      throw new ConfigError(`${source}: entry "${key}" needs a non-empty device_id`);
    }
    if (group !== undefined && group !== null && typeof group !== 'string') {
      throw new ConfigError(`${source}: entry "${key}" has a non-string group`);
    }
    const g = typeof group === 'string' ? trimmed(group) : undefined;
    nodes[key.trim().toLowerCase()] = g ? { deviceId: deviceId.trim(), group: g } : { deviceId: deviceId.trim() };
  }
  return nodes;
}

export function loadNodesFile(file: string): Record<string, NodeOverride> {
  let text: string;
  try {
    text = readFileSync(file, 'utf-8');
  } catch (e) {
    throw new ConfigError(`cannot read NODES_FILE ${file}: ${errorMessage(e)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`NODES_FILE ${file} is not valid JSON: ${errorMessage(e)}`);
  }
  return parseNodes(raw, file);
}

/**
 * Build the gateway configuration from environment variables.
 * Throws ConfigError on anything the gateway cannot run with.
 */
export function loadConfig(env: Env = process.env): GatewayConfig {
  const connectKey = trimmed(env.CALTOPO_CONNECT_KEY);
  const group = trimmed(env.CALTOPO_GROUP);
  if (!connectKey && !group) {
    throw new ConfigError("At least one of 'CALTOPO_CONNECT_KEY' or 'CALTOPO_GROUP' must be configured.");
  }

  const nodeEnv = env.NODE_ENV || 'development';
  const stateDb = trimmed(env.STATE_DB) || (
    nodeEnv === 'production'
      ? '/var/lib/mesh-gateway/state.db'
      : path.resolve(process.cwd(), 'data', 'gateway-state.db')
  );

  const nodesFile = trimmed(env.NODES_FILE);

  const retry: RetrySettings = {
    maxAttempts: integer('RETRY_MAX_ATTEMPTS', env.RETRY_MAX_ATTEMPTS, 4, 1),
    baseDelayMs: integer('RETRY_BASE_DELAY_MS', env.RETRY_BASE_DELAY_MS, 1000),
    maxDelayMs: integer('RETRY_MAX_DELAY_MS', env.RETRY_MAX_DELAY_MS, 30000),
    jitterMs: integer('RETRY_JITTER_MS', env.RETRY_JITTER_MS, 500),
  };

  return {
    mqtt: {
      url: trimmed(env.MQTT_URL) || 'mqtt://127.0.0.1:1883',
      topic: trimmed(env.MQTT_TOPIC) || DEFAULT_TOPIC,
      username: trimmed(env.MQTT_USERNAME),
      password: env.MQTT_PASSWORD || undefined,
      keepalive: integer('MQTT_KEEPALIVE', env.MQTT_KEEPALIVE, 60),
      tlsCa: trimmed(env.MQTT_TLS_CA),
      tlsCert: trimmed(env.MQTT_TLS_CERT),
      tlsKey: trimmed(env.MQTT_TLS_KEY),
      tlsRejectUnauthorized: flag('MQTT_TLS_REJECT_UNAUTHORIZED', env.MQTT_TLS_REJECT_UNAUTHORIZED, true),
    },
    caltopo: {
      baseUrl: (trimmed(env.CALTOPO_URL) || DEFAULT_CALTOPO_URL).replace(/\/+$/, ''),
      allowedUrlPatterns: (env.CALTOPO_ALLOWED_URL_PATTERNS || '')
        .split(',')
        .map((p) => p.trim())
        .filter(Boolean),
      connectKey,
      group,
      timeoutMs: integer('HTTP_TIMEOUT_MS', env.HTTP_TIMEOUT_MS, 10000, 1),
      retry,
    },
    nodes: nodesFile ? loadNodesFile(nodesFile) : {},
    allowUnknownDevices: flag('ALLOW_UNKNOWN_DEVICES', env.ALLOW_UNKNOWN_DEVICES, true),
    stateDb,
    statsIntervalMs: integer('STATS_INTERVAL_MS', env.STATS_INTERVAL_MS, 60000),
    healthPort: integer('HEALTH_PORT', env.HEALTH_PORT, 0),
  };
}
