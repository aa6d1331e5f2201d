import { beforeEach, describe, expect, it, vi } from 'vitest';
import { IdentityResolver, deriveHardwareId, normalizeHardwareId, selectCallsign } from './identity.js';
import { KeyValueStore, openDatabase } from './store.js';

function makeStores() {
  const db = openDatabase(':memory:');
  return {
    db,
    nodeIds: new KeyValueStore(db, 'node_id_mapping'),
    callsigns: new KeyValueStore(db, 'callsign_mapping'),
  };
}

describe('identity helpers', () => {
  it('should derive a zero-padded lower-case hardware id', () => {
    expect(deriveHardwareId(305419896)).toBe('!12345678');
    expect(deriveHardwareId(0x1234abcd)).toBe('!1234abcd');
    expect(deriveHardwareId(255)).toBe('!000000ff');
    expect(deriveHardwareId(0xffffffff)).toBe('!ffffffff');
  });

  it('should normalize reported hardware ids', () => {
    expect(normalizeHardwareId(' !1234ABCD ')).toBe('!1234abcd');
    expect(normalizeHardwareId('1234abcd')).toBeUndefined();
    expect(normalizeHardwareId('!1234abc')).toBeUndefined();
    expect(normalizeHardwareId(42)).toBeUndefined();
  });

  it('should pick override, then long name, then short name', () => {
    expect(selectCallsign({ override: 'TEAM-1', longName: 'Long', shortName: 'S' })).toBe('TEAM-1');
    expect(selectCallsign({ override: '  ', longName: ' Long ', shortName: 'S' })).toBe('Long');
    expect(selectCallsign({ longName: '', shortName: 'S' })).toBe('S');
    expect(selectCallsign({})).toBeUndefined();
  });
});

describe('IdentityResolver', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  it('should learn hardware id and callsign from metadata', () => {
    const stores = makeStores();
    const resolver = new IdentityResolver(stores, { nodes: {} });

    const learned = resolver.onMetadata(305419896, '!1234ABCD', 'Base Camp', 'BC');
    expect(learned).toEqual({ hardwareId: '!1234abcd', callsign: 'Base Camp' });
    expect(stores.nodeIds.get('305419896')).toBe('!1234abcd');
    expect(stores.callsigns.get('!1234abcd')).toBe('Base Camp');
    expect(resolver.resolveHardwareId(305419896)).toBe('!1234abcd');
    expect(resolver.getOrCreateCallsign('!1234abcd')).toEqual({ callsign: 'Base Camp', source: 'learned' });
    expect(resolver.stateOf(305419896)).toBe('CallsignKnown');
  });

  it('should fall back to the derived id when the reported one is malformed', () => {
    const stores = makeStores();
    const resolver = new IdentityResolver(stores, { nodes: {} });
    const learned = resolver.onMetadata(255, 'garbage', undefined, undefined);
    expect(learned).toEqual({ hardwareId: '!000000ff' });
    expect(stores.callsigns.has('!000000ff')).toBe(false);
    expect(resolver.stateOf(255)).toBe('HardwareIdKnown');
  });

  it('should derive and persist an id for unseen senders', () => {
    const stores = makeStores();
    const resolver = new IdentityResolver(stores, { nodes: {} });
    expect(resolver.stateOf(16)).toBe('Unknown');
    expect(resolver.resolveHardwareId(16)).toBe('!00000010');
    expect(stores.nodeIds.get('16')).toBe('!00000010');
    expect(resolver.getOrCreateCallsign('!00000010')).toEqual({ callsign: '!00000010', source: 'default' });
  });

  it('should write a derived id to the store exactly once', () => {
    const stores = makeStores();
    const resolver = new IdentityResolver(stores, { nodes: {} });
    const setSpy = vi.spyOn(stores.nodeIds, 'set');

    expect(resolver.resolveHardwareId(16)).toBe('!00000010');
    expect(resolver.resolveHardwareId(16)).toBe('!00000010');
    expect(setSpy).toHaveBeenCalledTimes(1);
    expect(setSpy).toHaveBeenCalledWith('16', '!00000010');
  });

  it('should ignore malformed stored hardware ids when warming the cache', () => {
    const stores = makeStores();
    stores.nodeIds.set('7', 'not-a-hardware-id');
    stores.nodeIds.set('8', '!0000ABCD');
    const resolver = new IdentityResolver(stores, { nodes: {} });

    expect(resolver.resolveHardwareId(7)).toBe('!00000007');
    expect(resolver.resolveHardwareId(8)).toBe('!0000abcd');
  });

  it('should prefer the configured override over learned names', () => {
    const stores = makeStores();
    const resolver = new IdentityResolver(stores, {
      nodes: { '!1234abcd': { deviceId: 'RESCUE-7', group: 'SAR_TEAM' } },
      defaultGroup: 'DEFAULT_GROUP',
    });
    const learned = resolver.onMetadata(0x1234abcd, '!1234abcd', 'Some Radio', 'SR');
    expect(learned.callsign).toBe('RESCUE-7');
    expect(resolver.getOrCreateCallsign('!1234abcd')).toEqual({ callsign: 'RESCUE-7', source: 'override' });
    expect(resolver.resolveCallsign('!1234abcd')).toBe('RESCUE-7');
    expect(resolver.resolveGroup('!1234abcd')).toBe('SAR_TEAM');
    expect(resolver.resolveGroup('!00000001')).toBe('DEFAULT_GROUP');
    expect(resolver.isRegistered('!1234abcd')).toBe(true);
    expect(resolver.isRegistered('!00000001')).toBe(false);
  });

  it('should not treat inherited properties as registered devices', () => {
    const resolver = new IdentityResolver(makeStores(), { nodes: {} });
    expect(resolver.isRegistered('constructor')).toBe(false);
  });

  it('should reload persisted mappings in a new resolver', () => {
    const stores = makeStores();
    new IdentityResolver(stores, { nodes: {} }).onMetadata(7, '!0000abcd', 'Trail Lead', undefined);

    const reloaded = new IdentityResolver(stores, { nodes: {} });
    expect(reloaded.resolveHardwareId(7)).toBe('!0000abcd');
    expect(reloaded.resolveCallsign('!0000abcd')).toBe('Trail Lead');
  });

  it('should skip writes when the mapping is unchanged', () => {
    const stores = makeStores();
    const resolver = new IdentityResolver(stores, { nodes: {} });
    resolver.onMetadata(7, '!0000abcd', 'Trail Lead', undefined);
    const setSpy = vi.spyOn(stores.nodeIds, 'set');
    const callsignSpy = vi.spyOn(stores.callsigns, 'set');
    resolver.onMetadata(7, '!0000abcd', 'Trail Lead', undefined);
    expect(setSpy).not.toHaveBeenCalled();
    expect(callsignSpy).not.toHaveBeenCalled();
  });
});
