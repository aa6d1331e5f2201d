// gateway-service entrypoint
// Subscribes to mesh JSON uplink topics and forwards position reports to CalTopo.

/**
 * Mesh Position Gateway
 * ---------------------------------------------
 * Purpose
 * - Relay GPS positions from mesh radios, as published on an MQTT broker,
 *   to CalTopo position-report endpoints under a human-readable callsign.
 *
 * Responsibilities
 * - Consume `msh/<region>/2/json/...` messages (nodeinfo, position, telemetry, traceroute)
 * - Learn numeric id -> hardware id -> callsign mappings and persist them in SQLite
 * - Send position reports to the connect-key and/or group endpoint with retry
 *
 * Environment & Dependencies
 * - MQTT_URL, MQTT_TOPIC, MQTT_USERNAME, MQTT_PASSWORD: broker connection
 * - CALTOPO_CONNECT_KEY and/or CALTOPO_GROUP: destinations (one is required)
 * - NODES_FILE: optional JSON map of hardware id -> { device_id, group }
 * - STATE_DB: SQLite file for learned mappings
 *
 * Security Notes
 * - Connect keys and group ids are credentials; they are redacted from logs
 * - Device-supplied strings are escaped before logging
 */
import dotenv from 'dotenv';
import { SERVICE, loadConfig } from './config.js';
import { Gateway } from './gateway.js';
import { startHealthServer } from './http.js';
import { parseLevel, setLogLevel } from './log.js';
import { registerShutdown } from './shutdown.js';

dotenv.config();

async function main() {
  setLogLevel(parseLevel(process.env.LOG_LEVEL));
  console.log(`[${SERVICE}] starting (${process.env.NODE_ENV || 'development'})...`);

  const config = loadConfig();
  const gateway = new Gateway(config);
  await gateway.start();

  const server = config.healthPort > 0 ? startHealthServer(() => gateway.stats(), { port: config.healthPort }) : undefined;
  registerShutdown(gateway, server);

  await gateway.wait();
}

main().catch((e) => {
  console.error(`[${SERVICE}] startup failed:`, e);
  process.exitCode = 1;
});
