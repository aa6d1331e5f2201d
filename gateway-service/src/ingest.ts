import { connectAsync, type IClientOptions } from 'mqtt';
import { existsSync, readFileSync } from 'fs';
import type { MqttSettings } from './config.js';
import { errorMessage } from './errors.js';
import { createLogger } from './log.js';
import type { MessageMeta } from './router.js';
import { abortableSleep, type Sleep } from './timers.js';

const log = createLogger('ingest');

export type IngestState = 'disconnected' | 'connecting' | 'subscribed' | 'stopped';

/** One live broker session. A new one is made for every (re)connect. */
export interface InboundConnection {
  subscribe(topicFilter: string): Promise<void>;
  onMessage(handler: (topic: string, payload: Buffer, retain: boolean) => void): void;
  /** Settles when the session is lost, with the reason when known. */
  readonly closed: Promise<Error | undefined>;
  end(): Promise<void>;
}

export type Connector = () => Promise<InboundConnection>;

export type MessageHandler = (payload: Buffer, meta: MessageMeta) => Promise<void>;

export interface IngestOptions {
  topic: string;
  connector: Connector;
  handler: MessageHandler;
  signal?: AbortSignal;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  sleep?: Sleep;
  onStateChange?: (state: IngestState) => void;
}

function readTlsFile(label: string, file: string | undefined): Buffer | undefined {
  if (!file) return undefined;
  try {
    if (existsSync(file)) return readFileSync(file);
    log.warn(`WARNING: ${label} path set but file not found: ${file}`);
  } catch (e) {
    log.warn(`WARNING: failed to read ${label} (${file}): ${errorMessage(e)}`);
  }
  return undefined;
}

/**
 * Connector over mqtt.js. Automatic reconnection is disabled: the ingest
 * loop owns reconnect timing.
 */
export function mqttConnector(settings: MqttSettings): Connector {
  const usingTls = settings.url.startsWith('mqtts://');
  const ca = usingTls ? readTlsFile('MQTT_TLS_CA', settings.tlsCa) : undefined;
  const cert = usingTls ? readTlsFile('MQTT_TLS_CERT', settings.tlsCert) : undefined;
  const key = usingTls ? readTlsFile('MQTT_TLS_KEY', settings.tlsKey) : undefined;

  // Only send credentials if both username and password are set.
  const auth: Partial<IClientOptions> = {};
  if (settings.username && settings.password) {
    auth.username = settings.username;
    auth.password = settings.password;
  } else if (settings.username) {
    log.warn('WARNING: MQTT_USERNAME is set but MQTT_PASSWORD is missing; connecting without credentials');
  }

  const options: IClientOptions = {
    ...auth,
    keepalive: settings.keepalive,
    reconnectPeriod: 0,
    ca,
    cert,
    key,
    rejectUnauthorized: settings.tlsRejectUnauthorized,
  };

  return async () => {
    // allowRetries=false: a close before CONNACK rejects instead of hanging
    const client = await connectAsync(settings.url, options, false);
    let lastError: Error | undefined;
    client.on('error', (err) => {
      lastError = err;
      log.warn(`mqtt error: ${err.message}`);
    });
    const closed = new Promise<Error | undefined>((resolve) => {
      client.once('close', () => resolve(lastError ?? new Error('connection closed')));
    });
    return {
      async subscribe(topicFilter) {
        await client.subscribeAsync(topicFilter, { qos: 1 });
      },
      onMessage(handler) {
        client.on('message', (topic, payload, packet) => handler(topic, payload, packet.retain));
      },
      closed,
      async end() {
        await client.endAsync();
      },
    };
  };
}

/**
 * Connect, subscribe, consume; on any transport failure wait and reconnect
 * (backoff doubles up to the cap and resets after a successful subscribe).
 * Messages are handled one at a time in arrival order.
 */
export class IngestLoop {
  private readonly options: IngestOptions;
  private readonly controller = new AbortController();
  private readonly aborted: Promise<undefined>;
  private readonly sleep: Sleep;
  private queue: Promise<void> = Promise.resolve();
  private running: Promise<void> | null = null;
  private current: IngestState = 'disconnected';

  constructor(options: IngestOptions) {
    this.options = options;
    this.sleep = options.sleep ?? abortableSleep;
    const signal = this.controller.signal;
    this.aborted = new Promise((resolve) => signal.addEventListener('abort', () => resolve(undefined), { once: true }));
    if (options.signal) {
      if (options.signal.aborted) this.controller.abort();
      else options.signal.addEventListener('abort', () => this.controller.abort(), { once: true });
    }
  }

  get state(): IngestState {
    return this.current;
  }

  /** Start the loop once; later calls return the same promise. */
  run(): Promise<void> {
    if (!this.running) this.running = this.loop();
    return this.running;
  }

  /** Cancel the loop and wait for it to unwind. */
  async stop(): Promise<void> {
    this.controller.abort();
    if (this.running) await this.running;
    else this.setState('stopped');
  }

  private setState(state: IngestState): void {
    if (state === this.current) return;
    this.current = state;
    this.options.onStateChange?.(state);
  }

  private enqueue(payload: Buffer, meta: MessageMeta): void {
    this.queue = this.queue
      .then(() => this.options.handler(payload, meta))
      .catch((e) => log.error(`message handler failed: ${errorMessage(e)}`));
  }

  private async loop(): Promise<void> {
    const signal = this.controller.signal;
    const initial = this.options.initialBackoffMs ?? 1000;
    const max = this.options.maxBackoffMs ?? 60000;
    let backoff = initial;

    while (!signal.aborted) {
      this.setState('connecting');
      try {
        const pending = this.options.connector();
        const connection = await Promise.race([pending, this.aborted]);
        if (!connection) {
          void pending.then(
            (late) => late.end(),
            () => undefined
          ).catch((e) => log.warn(`error closing MQTT connection: ${errorMessage(e)}`));
          break;
        }
        try {
          if (signal.aborted) break;
          log.info('connected to MQTT');
          connection.onMessage((topic, payload, retain) => this.enqueue(payload, { topic, retain }));
          const lost = connection.closed.then((reason) => {
            throw reason ?? new Error('connection closed');
          });
          await Promise.race([connection.subscribe(this.options.topic), lost, this.aborted]);
          if (signal.aborted) break;
          this.setState('subscribed');
          log.info(`subscribed to ${this.options.topic}`);
          backoff = initial;

          const reason = await Promise.race([connection.closed, this.aborted]);
          if (reason && !signal.aborted) log.warn(`mqtt connection lost: ${reason.message}`);
        } finally {
          await connection.end().catch((e) => log.warn(`error closing MQTT connection: ${errorMessage(e)}`));
          await this.queue;
        }
      } catch (e) {
        log.warn(`mqtt connect/subscribe failed: ${errorMessage(e)}`);
      }

      if (signal.aborted) break;
      this.setState('disconnected');
      log.info(`reconnecting in ${backoff / 1000}s...`);
      try {
        await this.sleep(backoff, signal);
      } catch {
        break;
      }
      backoff = Math.min(backoff * 2, max);
    }

    this.setState('stopped');
    log.info('ingest loop stopped');
  }
}
