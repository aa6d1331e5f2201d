import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CALTOPO_URL, DEFAULT_TOPIC, loadConfig, parseNodes } from './config.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'gateway-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should require a connect key or a group', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ CALTOPO_CONNECT_KEY: '  ' })).toThrow(
      "At least one of 'CALTOPO_CONNECT_KEY' or 'CALTOPO_GROUP' must be configured."
    );
  });

  it('should apply defaults', () => {
    const config = loadConfig({ CALTOPO_GROUP: 'SAR_TEAM', STATE_DB: path.join(dir, 'state.db') });
    expect(config.mqtt.url).toBe('mqtt://127.0.0.1:1883');
    expect(config.mqtt.topic).toBe(DEFAULT_TOPIC);
    expect(config.mqtt.username).toBeUndefined();
    expect(config.caltopo.baseUrl).toBe(DEFAULT_CALTOPO_URL);
    expect(config.caltopo.connectKey).toBeUndefined();
    expect(config.caltopo.group).toBe('SAR_TEAM');
    expect(config.caltopo.allowedUrlPatterns).toEqual([]);
    expect(config.caltopo.retry).toEqual({ maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 30000, jitterMs: 500 });
    expect(config.allowUnknownDevices).toBe(true);
    expect(config.nodes).toEqual({});
    expect(config.statsIntervalMs).toBe(60000);
    expect(config.healthPort).toBe(0);
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      CALTOPO_CONNECT_KEY: 'TESTKEY',
      CALTOPO_URL: 'http://localhost:8080/api/',
      CALTOPO_ALLOWED_URL_PATTERNS: 'http://localhost:*, https://*.caltopo.com/*',
      MQTT_URL: 'mqtts://broker.local:8883',
      MQTT_USERNAME: 'gateway',
      MQTT_PASSWORD: 'test-secret',
      ALLOW_UNKNOWN_DEVICES: 'no',
      RETRY_MAX_ATTEMPTS: '2',
      HEALTH_PORT: '8080',
    });
    expect(config.caltopo.baseUrl).toBe('http://localhost:8080/api');
    expect(config.caltopo.allowedUrlPatterns).toEqual(['http://localhost:*', 'https://*.caltopo.com/*']);
    expect(config.mqtt.url).toBe('mqtts://broker.local:8883');
    expect(config.mqtt.password).toBe('test-secret');
    expect(config.allowUnknownDevices).toBe(false);
    expect(config.caltopo.retry.maxAttempts).toBe(2);
    expect(config.healthPort).toBe(8080);
  });

  it('should reject malformed numbers and flags', () => {
    expect(() => loadConfig({ CALTOPO_GROUP: 'G', RETRY_MAX_ATTEMPTS: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ CALTOPO_GROUP: 'G', HTTP_TIMEOUT_MS: 'soon' })).toThrow(ConfigError);
    expect(() => loadConfig({ CALTOPO_GROUP: 'G', ALLOW_UNKNOWN_DEVICES: 'maybe' })).toThrow(
      'ALLOW_UNKNOWN_DEVICES must be a boolean, got "maybe"'
    );
  });

  it('should load the nodes file', () => {
    const file = path.join(dir, 'nodes.json');
    writeFileSync(file, JSON.stringify({ '!1234ABCD': { device_id: 'RESCUE-7', group: 'SAR_TEAM' }, '!0000abcd': { device_id: 'Trail Lead' } }));
    const config = loadConfig({ CALTOPO_GROUP: 'G', NODES_FILE: file });
    expect(config.nodes).toEqual({
      '!1234abcd': { deviceId: 'RESCUE-7', group: 'SAR_TEAM' },
      '!0000abcd': { deviceId: 'Trail Lead' },
    });
  });

  it('should fail on a missing or invalid nodes file', () => {
    expect(() => loadConfig({ CALTOPO_GROUP: 'G', NODES_FILE: path.join(dir, 'missing.json') })).toThrow(ConfigError);
    const file = path.join(dir, 'nodes.json');
    writeFileSync(file, '{ nope');
    expect(() => loadConfig({ CALTOPO_GROUP: 'G', NODES_FILE: file })).toThrow(ConfigError);
  });
});

describe('parseNodes', () => {
  it('should reject entries without a device_id', () => {
    expect(() => parseNodes({ '!1234abcd': { group: 'G' } })).toThrow('nodes: entry "!1234abcd" needs a non-empty device_id');
    expect(() => parseNodes([])).toThrow(ConfigError);
    expect(() => parseNodes({ '!1234abcd': { device_id: 'A', group: 5 } })).toThrow(ConfigError);
  });
});
