import type Database from 'better-sqlite3';
import type { AxiosInstance } from 'axios';
import { EventEmitter } from 'eventemitter3';
import type { GatewayConfig } from './config.js';
import { ReportDispatcher } from './dispatcher.js';
import { IdentityResolver } from './identity.js';
import { IngestLoop, mqttConnector, type Connector, type IngestState } from './ingest.js';
import { createLogger } from './log.js';
import { MessageRouter, type GatewayStats } from './router.js';
import { KeyValueStore, openDatabase } from './store.js';
import type { Sleep } from './timers.js';

const log = createLogger('gateway');

export const NODE_ID_NAMESPACE = 'node_id_mapping';
export const CALLSIGN_NAMESPACE = 'callsign_mapping';

export interface StatsSnapshot extends GatewayStats {
  ingest: IngestState;
  uptimeSeconds: number;
}

export interface GatewayEvents {
  stats: (snapshot: StatsSnapshot) => void;
  state: (state: IngestState) => void;
}

export interface GatewayDeps {
  connector?: Connector;
  /** Shared HTTP client; left open by `stop()`. */
  httpClient?: AxiosInstance;
  sleep?: Sleep;
}

/**
 * Wires store, resolver, dispatcher, router and ingest loop together and
 * owns their lifetimes.
 */
export class Gateway extends EventEmitter<GatewayEvents> {
  private readonly config: GatewayConfig;
  private readonly deps: GatewayDeps;
  private readonly controller = new AbortController();
  private db: Database.Database | null = null;
  private stores: KeyValueStore[] = [];
  private dispatcher: ReportDispatcher | null = null;
  private router: MessageRouter | null = null;
  private ingest: IngestLoop | null = null;
  private loop: Promise<void> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private startedAt = 0;
  private stopping: Promise<void> | null = null;

  constructor(config: GatewayConfig, deps: GatewayDeps = {}) {
    super();
    this.config = config;
    this.deps = deps;
  }

  /** Open state, probe destinations, and start consuming. Storage failures propagate. */
  async start(): Promise<void> {
    if (this.ingest) return;
    const { config } = this;

    log.info(`using state database ${config.stateDb}`);
    const db = openDatabase(config.stateDb);
    let resolver: IdentityResolver;
    try {
      const nodeIds = new KeyValueStore(db, NODE_ID_NAMESPACE);
      const callsigns = new KeyValueStore(db, CALLSIGN_NAMESPACE);
      resolver = new IdentityResolver({ nodeIds, callsigns }, { nodes: config.nodes, defaultGroup: config.caltopo.group });
      this.stores = [nodeIds, callsigns];
    } catch (e) {
      db.close();
      throw e;
    }
    this.db = db;
    log.info(`configured devices: ${Object.keys(config.nodes).join(', ') || '(none)'}`);

    const dispatcher = new ReportDispatcher(config.caltopo, {
      client: this.deps.httpClient,
      signal: this.controller.signal,
      sleep: this.deps.sleep,
    });
    this.dispatcher = dispatcher;
    await dispatcher.start();
    if (!(await dispatcher.testConnection())) {
      log.warn('CalTopo API connectivity test failed, but continuing...');
    }

    const router = new MessageRouter({ resolver, dispatcher, allowUnknownDevices: config.allowUnknownDevices });
    this.router = router;

    this.ingest = new IngestLoop({
      topic: config.mqtt.topic,
      connector: this.deps.connector ?? mqttConnector(config.mqtt),
      handler: (payload, meta) => router.handle(payload, meta),
      signal: this.controller.signal,
      sleep: this.deps.sleep,
      onStateChange: (state) => this.emit('state', state),
    });

    this.startedAt = Date.now();
    this.loop = this.ingest.run();
    if (config.statsIntervalMs > 0) {
      this.timer = setInterval(() => this.reportStats(), config.statsIntervalMs);
      this.timer.unref();
    }
    log.info('gateway service started');
  }

  /** Resolves when the ingest loop exits (after `stop()`). */
  async wait(): Promise<void> {
    if (this.loop) await this.loop;
  }

  stats(): StatsSnapshot {
    const base: GatewayStats = this.router?.stats() ?? {
      messagesReceived: 0,
      messagesProcessed: 0,
      reportsSent: 0,
      reportsFailed: 0,
      rejected: 0,
      errors: 0,
    };
    return {
      ...base,
      ingest: this.ingest?.state ?? 'disconnected',
      uptimeSeconds: this.startedAt ? Math.round((Date.now() - this.startedAt) / 1000) : 0,
    };
  }

  stop(): Promise<void> {
    if (!this.stopping) this.stopping = this.shutdown();
    return this.stopping;
  }

  private reportStats(): void {
    const s = this.stats();
    log.info(
      `statistics - uptime: ${s.uptimeSeconds}s, messages received: ${s.messagesReceived}, ` +
      `processed: ${s.messagesProcessed}, position updates sent: ${s.reportsSent}, ` +
      `failed: ${s.reportsFailed}, rejected: ${s.rejected}, errors: ${s.errors}`
    );
    this.emit('stats', s);
  }

  private async shutdown(): Promise<void> {
    log.info('stopping gateway service...');
    this.controller.abort();
    if (this.timer) clearInterval(this.timer);
    this.timer = null;

    if (this.ingest) await this.ingest.stop();
    if (this.dispatcher) await this.dispatcher.close();

    log.info('closing state database...');
    for (const store of this.stores) store.close();
    this.stores = [];
    if (this.db?.open) this.db.close();
    this.db = null;

    if (this.startedAt) this.reportStats();
    log.info('gateway service stopped');
  }
}
