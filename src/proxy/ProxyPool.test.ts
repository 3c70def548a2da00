import { describe, expect, it } from 'vitest';
import type { ProxyEndpoint } from '../types.js';
import { ProxyPool } from './ProxyPool.js';

const endpoint = (name: string): ProxyEndpoint => ({ name, server: `http://${name}.test:8080` });

describe('ProxyPool', () => {
  describe('acquire', () => {
    it('picks among free endpoints using the random source', () => {
      const pool = new ProxyPool([endpoint('a'), endpoint('b'), endpoint('c')], { random: () => 0.5 });
      expect(pool.acquire()?.name).toBe('b');
      // a and c remain; 0.5 * 2 = 1 -> c
      expect(pool.acquire()?.name).toBe('c');
      expect(pool.acquire()?.name).toBe('a');
    });

    it('never hands out a held endpoint', () => {
      const pool = new ProxyPool([endpoint('a'), endpoint('b')], { random: () => 0 });
      const first = pool.acquire();
      const second = pool.acquire();
      expect(first?.name).toBe('a');
      expect(second?.name).toBe('b');
      expect(pool.inUseCount).toBe(2);
    });

    it('returns null when every endpoint is held', () => {
      const pool = new ProxyPool([endpoint('a')]);
      expect(pool.acquire()?.name).toBe('a');
      expect(pool.acquire()).toBeNull();
    });

    it('returns null for an empty pool', () => {
      expect(new ProxyPool([]).acquire()).toBeNull();
    });

    it('clamps a random source that returns 1', () => {
      const pool = new ProxyPool([endpoint('a'), endpoint('b')], { random: () => 1 });
      expect(pool.acquire()?.name).toBe('b');
    });
  });

  describe('release', () => {
    it('makes the endpoint available again', () => {
      const pool = new ProxyPool([endpoint('a')]);
      const proxy = pool.acquire();
      pool.release(proxy);
      expect(pool.isHeld(endpoint('a'))).toBe(false);
      expect(pool.acquire()?.name).toBe('a');
    });

    it('ignores null and unheld endpoints', () => {
      const pool = new ProxyPool([endpoint('a')]);
      pool.release(null);
      pool.release(endpoint('a'));
      expect(pool.getStats()).toEqual({ total: 1, inUse: 0, available: 1 });
    });
  });

  describe('markFailed', () => {
    it('drops a held endpoint from rotation', () => {
      const pool = new ProxyPool([endpoint('a'), endpoint('b')], { random: () => 0 });
      const proxy = pool.acquire();
      pool.markFailed(proxy);
      expect(pool.size).toBe(1);
      expect(pool.inUseCount).toBe(0);
      expect(pool.acquire()?.name).toBe('b');
      expect(pool.acquire()).toBeNull();
    });

    it('is a no-op for unknown endpoints', () => {
      const pool = new ProxyPool([endpoint('a')]);
      pool.markFailed(endpoint('zzz'));
      pool.markFailed(null);
      expect(pool.size).toBe(1);
    });
  });

  it('deduplicates endpoints by name', () => {
    const pool = new ProxyPool([endpoint('a'), endpoint('a'), endpoint('b')]);
    expect(pool.size).toBe(2);
    expect(pool.availableCount).toBe(2);
  });
});
