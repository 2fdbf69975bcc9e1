import { ConnectionRegistry } from '../src/modules/rpc/connection-registry';

describe('ConnectionRegistry', () => {
  let registry: ConnectionRegistry<{ name: string }>;
  const oldConn = { name: 'old' };
  const newConn = { name: 'new' };

  beforeEach(() => {
    registry = new ConnectionRegistry();
  });

  it('registers and looks up a connection by key', () => {
    expect(registry.register(7, oldConn)).toBeUndefined();
    expect(registry.get(7)).toBe(oldConn);
    expect(registry.isConnected(7)).toBe(true);
    expect(registry.isConnected(8)).toBe(false);
    expect(registry.get(8)).toBeUndefined();
  });

  it('returns the superseded connection when a new one registers for the same key', () => {
    registry.register(7, oldConn);
    expect(registry.register(7, newConn)).toBe(oldConn);
    expect(registry.get(7)).toBe(newConn);
    expect(registry.size).toBe(1);
  });

  it('re-registering the same instance supersedes nothing', () => {
    registry.register(7, oldConn);
    expect(registry.register(7, oldConn)).toBeUndefined();
  });

  it('unregister removes the entry only for the instance on record', () => {
    registry.register(7, oldConn);
    registry.register(7, newConn);
    expect(registry.unregister(7, oldConn)).toBe(false);
    expect(registry.get(7)).toBe(newConn);
    expect(registry.unregister(7, newConn)).toBe(true);
    expect(registry.isConnected(7)).toBe(false);
  });

  it('unregister of an unknown key is a no-op', () => {
    expect(registry.unregister(99, oldConn)).toBe(false);
  });

  it('lists keys of all connected nodes', () => {
    registry.register(3, oldConn);
    registry.register(1, newConn);
    expect(registry.keys().sort()).toEqual([1, 3]);
  });
});
