import type { NodeOverride } from './config.js';
import { createLogger, sanitizeForLog } from './log.js';
import type { KeyValueStore } from './store.js';

const log = createLogger('identity');

const HARDWARE_ID_RE = /^![0-9a-f]{8}$/;

export type IdentityState = 'Unknown' | 'HardwareIdKnown' | 'CallsignKnown';
export type CallsignSource = 'override' | 'learned' | 'default';

export interface CallsignResolution {
  callsign: string;
  source: CallsignSource;
}

export interface IdentityStores {
  /** NumericSenderId (decimal string) -> HardwareId */
  nodeIds: KeyValueStore;
  /** HardwareId -> Callsign */
  callsigns: KeyValueStore;
}

export interface IdentityOptions {
  nodes: Record<string, NodeOverride>;
  defaultGroup?: string;
}

/** `"!" + 8 lower-case hex digits` of the unsigned 32-bit id. */
export function deriveHardwareId(numericId: number): string {
  return `!${(numericId >>> 0).toString(16).padStart(8, '0')}`;
}

/** Lower-cases a reported hardware id; undefined when it is not `!xxxxxxxx`. */
export function normalizeHardwareId(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const id = value.trim().toLowerCase();
  return HARDWARE_ID_RE.test(id) ? id : undefined;
}

/**
 * Callsign precedence: configured override, then long name, then short name.
 * Blank candidates are skipped. Returns undefined when none is usable; callers
 * fall back to the hardware id.
 */
export function selectCallsign(candidates: { override?: string; longName?: string; shortName?: string }): string | undefined {
  for (const c of [candidates.override, candidates.longName, candidates.shortName]) {
    const v = c?.trim();
    if (v) return v;
  }
  return undefined;
}

/**
 * Maps NumericSenderId -> HardwareId -> Callsign. Owns its caches; every
 * mutation goes through here so cache and store never disagree.
 */
export class IdentityResolver {
  private readonly stores: IdentityStores;
  private readonly nodes: Record<string, NodeOverride>;
  private readonly defaultGroup: string | undefined;
  private readonly nodeIdCache = new Map<string, string>();
  private readonly callsignCache = new Map<string, string>();

  constructor(stores: IdentityStores, options: IdentityOptions) {
    this.stores = stores;
    this.nodes = options.nodes;
    this.defaultGroup = options.defaultGroup;
    for (const [k, v] of stores.nodeIds.entries()) {
      const hw = normalizeHardwareId(v);
      if (hw) this.nodeIdCache.set(k, hw);
    }
    for (const [k, v] of stores.callsigns.entries()) if (typeof v === 'string') this.callsignCache.set(k, v);
    log.info(`loaded ${this.nodeIdCache.size} node id and ${this.callsignCache.size} callsign mappings`);
  }

  /**
   * Learn from a nodeinfo message. An absent or malformed reported id falls
   * back to the derived one.
   */
  onMetadata(numericId: number, hardwareId: unknown, longName?: string, shortName?: string): { hardwareId: string; callsign?: string } {
    let hw = normalizeHardwareId(hardwareId);
    if (!hw) {
      hw = deriveHardwareId(numericId);
      if (hardwareId !== undefined && hardwareId !== null) {
        log.warn(`ignoring malformed hardware id ${sanitizeForLog(hardwareId)} from ${numericId}; using ${hw}`);
      }
    }
    this.persistNodeId(String(numericId), hw);

    const callsign = selectCallsign({ override: this.override(hw), longName, shortName });
    if (callsign) this.persistCallsign(hw, callsign);
    log.debug(`mapped ${numericId} -> ${hw} -> ${sanitizeForLog(callsign ?? hw)}`);
    return callsign ? { hardwareId: hw, callsign } : { hardwareId: hw };
  }

  resolveHardwareId(numericId: number): string {
    const key = String(numericId);
    const cached = this.nodeIdCache.get(key);
    if (cached) return cached;

    const stored = normalizeHardwareId(this.stores.nodeIds.get(key));
    if (stored) {
      this.nodeIdCache.set(key, stored);
      return stored;
    }

    const derived = deriveHardwareId(numericId);
    this.persistNodeId(key, derived);
    log.debug(`derived hardware id ${derived} for ${numericId}`);
    return derived;
  }

  resolveCallsign(hardwareId: string): string {
    return this.getOrCreateCallsign(hardwareId).callsign;
  }

  getOrCreateCallsign(hardwareId: string): CallsignResolution {
    const override = selectCallsign({ override: this.override(hardwareId) });
    if (override) return { callsign: override, source: 'override' };
    const learned = this.learnedCallsign(hardwareId);
    if (learned) return { callsign: learned, source: 'learned' };
    return { callsign: hardwareId, source: 'default' };
  }

  /** Per-device group override, else the configured default group. */
  resolveGroup(hardwareId: string): string | undefined {
    return this.nodeOverride(hardwareId)?.group ?? this.defaultGroup;
  }

  isRegistered(hardwareId: string): boolean {
    return this.nodeOverride(hardwareId) !== undefined;
  }

  stateOf(numericId: number): IdentityState {
    const key = String(numericId);
    const hw = this.nodeIdCache.get(key) ?? normalizeHardwareId(this.stores.nodeIds.get(key));
    if (!hw) return 'Unknown';
    return this.learnedCallsign(hw) ? 'CallsignKnown' : 'HardwareIdKnown';
  }

  private nodeOverride(hardwareId: string): NodeOverride | undefined {
    return Object.hasOwn(this.nodes, hardwareId) ? this.nodes[hardwareId] : undefined;
  }

  private override(hardwareId: string): string | undefined {
    return this.nodeOverride(hardwareId)?.deviceId;
  }

  private learnedCallsign(hardwareId: string): string | undefined {
    const cached = this.callsignCache.get(hardwareId);
    if (cached) return cached;
    const stored = this.stores.callsigns.get(hardwareId);
    if (typeof stored === 'string' && stored) {
      this.callsignCache.set(hardwareId, stored);
      return stored;
    }
    return undefined;
  }

  private persistNodeId(key: string, hardwareId: string): void {
    if (this.nodeIdCache.get(key) === hardwareId) return;
    this.stores.nodeIds.set(key, hardwareId);
    this.nodeIdCache.set(key, hardwareId);
  }

  private persistCallsign(hardwareId: string, callsign: string): void {
    if (this.callsignCache.get(hardwareId) === callsign) return;
    this.stores.callsigns.set(hardwareId, callsign);
    this.callsignCache.set(hardwareId, callsign);
  }
}
