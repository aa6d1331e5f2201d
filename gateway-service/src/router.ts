import type { ReportDispatcher } from './dispatcher.js';
import { errorMessage } from './errors.js';
import type { IdentityResolver } from './identity.js';
import { createLogger, isLevelEnabled, sanitizeForLog } from './log.js';

const log = createLogger('router');

const MAX_SENDER_ID = 0xffffffff;

export type InboundMessage =
  | { kind: 'nodeinfo'; from: number; hardwareId: unknown; longName?: string; shortName?: string; hardware?: unknown; role?: unknown }
  | { kind: 'position'; from: number; latitude: number; longitude: number }
  | { kind: 'telemetry'; from: number; metrics: Record<string, unknown> }
  | { kind: 'traceroute'; from: number; route: unknown[] }
  | { kind: 'unrecognized'; from: number; type: string };

export type DecodeResult = { ok: true; message: InboundMessage } | { ok: false; error: string };

export interface GatewayStats {
  messagesReceived: number;
  messagesProcessed: number;
  reportsSent: number;
  reportsFailed: number;
  rejected: number;
  errors: number;
}

export interface MessageMeta {
  topic?: string;
  retain?: boolean;
}

export interface RouterDeps {
  resolver: IdentityResolver;
  dispatcher: Pick<ReportDispatcher, 'sendPositionUpdate'>;
  allowUnknownDevices: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function parseSenderId(value: unknown): number | undefined {
  const n = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value.trim()) : value;
  if (typeof n !== 'number' || !Number.isInteger(n) || n < 0 || n > MAX_SENDER_ID) return undefined;
  return n;
}

/**
 * Decode a parsed JSON envelope once, at the boundary, into a closed union.
 * The optional `sender` field is never used for identity: it can name a relay.
 */
export function decodeEnvelope(raw: unknown): DecodeResult {
  if (!isRecord(raw)) return { ok: false, error: 'envelope is not a JSON object' };
  const from = parseSenderId(raw.from);
  if (from === undefined) return { ok: false, error: `missing or invalid from field: ${sanitizeForLog(raw.from)}` };

  const type = typeof raw.type === 'string' ? raw.type : '';
  const payload = raw.payload;

  switch (type) {
    case 'nodeinfo': {
      if (!isRecord(payload)) return { ok: false, error: `nodeinfo from ${from} without payload` };
      return {
        ok: true,
        message: {
          kind: 'nodeinfo',
          from,
          hardwareId: payload.id,
          longName: optionalString(payload.longname),
          shortName: optionalString(payload.shortname),
          hardware: payload.hardware,
          role: payload.role,
        },
      };
    }
    case 'position': {
      if (!isRecord(payload)) return { ok: false, error: `position from ${from} without payload` };
      const lat = payload.latitude_i;
      const lon = payload.longitude_i;
      if (typeof lat !== 'number' || typeof lon !== 'number' || !Number.isInteger(lat) || !Number.isInteger(lon)) {
        return { ok: false, error: `position from ${from} without coordinates` };
      }
      const latitude = lat / 1e7;
      const longitude = lon / 1e7;
      if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
        return { ok: false, error: `position from ${from} out of range: ${latitude}, ${longitude}` };
      }
      return { ok: true, message: { kind: 'position', from, latitude, longitude } };
    }
    case 'telemetry': {
      if (!isRecord(payload)) return { ok: false, error: `telemetry from ${from} without payload` };
      return { ok: true, message: { kind: 'telemetry', from, metrics: payload } };
    }
    case 'traceroute': {
      if (!isRecord(payload)) return { ok: false, error: `traceroute from ${from} without payload` };
      return { ok: true, message: { kind: 'traceroute', from, route: Array.isArray(payload.route) ? payload.route : [] } };
    }
    default:
      return { ok: true, message: { kind: 'unrecognized', from, type } };
  }
}

/**
 * Handles one inbound payload at a time. Never throws: malformed input and
 * handler failures are logged and counted.
 */
export class MessageRouter {
  private readonly deps: RouterDeps;
  private readonly counters: GatewayStats = {
    messagesReceived: 0,
    messagesProcessed: 0,
    reportsSent: 0,
    reportsFailed: 0,
    rejected: 0,
    errors: 0,
  };

  constructor(deps: RouterDeps) {
    this.deps = deps;
  }

  stats(): GatewayStats {
    return { ...this.counters };
  }

  async handle(payload: Buffer | string, meta: MessageMeta = {}): Promise<void> {
    this.counters.messagesReceived++;
    const text = typeof payload === 'string' ? payload : payload.toString('utf-8');
    if (isLevelEnabled('debug')) {
      log.debug(`message on ${sanitizeForLog(meta.topic ?? '?')}: ${sanitizeForLog(text)}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e) {
      log.warn(`failed to parse JSON message: ${errorMessage(e)}. Payload: ${sanitizeForLog(text.slice(0, 200))}`);
      this.counters.errors++;
      return;
    }

    const decoded = decodeEnvelope(raw);
    if (!decoded.ok) {
      log.warn(`discarding message: ${decoded.error}`);
      this.counters.errors++;
      return;
    }

    try {
      const handled = await this.route(decoded.message, meta);
      if (handled) this.counters.messagesProcessed++;
    } catch (e) {
      log.error(`error processing ${decoded.message.kind} message from ${decoded.message.from}: ${errorMessage(e)}`);
      this.counters.errors++;
    }
  }

  private async route(message: InboundMessage, meta: MessageMeta): Promise<boolean> {
    switch (message.kind) {
      case 'nodeinfo':
        this.onNodeInfo(message);
        return true;
      case 'position':
        await this.onPosition(message, meta);
        return true;
      case 'telemetry':
        this.onTelemetry(message);
        return true;
      case 'traceroute':
        log.info(`traceroute from ${message.from}: route=${sanitizeForLog(message.route)}`);
        return true;
      case 'unrecognized':
        log.debug(`unsupported message type from ${message.from}: ${sanitizeForLog(message.type || '(empty)')}`);
        return false;
    }
  }

  private onNodeInfo(message: Extract<InboundMessage, { kind: 'nodeinfo' }>): void {
    const { hardwareId, callsign } = this.deps.resolver.onMetadata(message.from, message.hardwareId, message.longName, message.shortName);
    log.info(
      `node info from ${message.from}: id=${hardwareId} name=${sanitizeForLog(message.longName)} ` +
      `(${sanitizeForLog(message.shortName)}) callsign=${sanitizeForLog(callsign ?? hardwareId)} ` +
      `hardware=${sanitizeForLog(message.hardware)} role=${sanitizeForLog(message.role)}`
    );
  }

  private async onPosition(message: Extract<InboundMessage, { kind: 'position' }>, meta: MessageMeta): Promise<void> {
    if (meta.retain) {
      log.info(`skipping retained position message from ${message.from}`);
      return;
    }
    const { resolver, dispatcher, allowUnknownDevices } = this.deps;
    const hardwareId = resolver.resolveHardwareId(message.from);

    if (!allowUnknownDevices && !resolver.isRegistered(hardwareId)) {
      log.info(`unknown device ${hardwareId} position update blocked (ALLOW_UNKNOWN_DEVICES=false)`);
      this.counters.rejected++;
      return;
    }

    const { callsign, source } = resolver.getOrCreateCallsign(hardwareId);
    const group = resolver.resolveGroup(hardwareId);
    log.debug(`position from ${message.from} (${hardwareId} -> ${sanitizeForLog(callsign)} [${source}]): ${message.latitude}, ${message.longitude}`);

    const ok = await dispatcher.sendPositionUpdate(callsign, message.latitude, message.longitude, group);
    if (ok) this.counters.reportsSent++;
    else this.counters.reportsFailed++;
  }

  private onTelemetry(message: Extract<InboundMessage, { kind: 'telemetry' }>): void {
    const m = message.metrics;
    log.info(
      `telemetry from ${message.from}: battery=${sanitizeForLog(m.battery_level)}% voltage=${sanitizeForLog(m.voltage)}V ` +
      `uptime=${sanitizeForLog(m.uptime_seconds)}s airUtilTx=${sanitizeForLog(m.air_util_tx)} ` +
      `channelUtil=${sanitizeForLog(m.channel_utilization)}%`
    );
  }
}
