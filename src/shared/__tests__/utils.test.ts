import { describe, it, expect, vi, afterEach } from 'vitest';
import { resolvePath, generateId, getRelayDir, jitter, sleep } from '../utils.js';
import { homedir } from 'node:os';
import path from 'node:path';

describe('resolvePath', () => {
  it('expands ~ to home directory', () => {
    expect(resolvePath('~/test')).toBe(path.join(homedir(), 'test'));
  });

  it('expands bare ~ to home directory', () => {
    expect(resolvePath('~')).toBe(path.join(homedir(), ''));
  });

  it('resolves relative paths', () => {
    expect(path.isAbsolute(resolvePath('./foo/bar'))).toBe(true);
  });

  it('returns absolute paths as-is', () => {
    expect(resolvePath('/absolute/path')).toBe('/absolute/path');
  });
});

describe('getRelayDir', () => {
  it('lives under the home directory', () => {
    expect(getRelayDir()).toBe(path.join(homedir(), '.postrelay'));
  });
});

describe('generateId', () => {
  it('produces 21-char IDs by default', () => {
    expect(generateId()).toHaveLength(21);
  });

  it('respects custom size', () => {
    expect(generateId(8)).toHaveLength(8);
  });

  it('produces unique IDs', () => {
    const ids = new Set(Array.from({ length: 100 }, () => generateId()));
    expect(ids.size).toBe(100);
  });
});

describe('jitter', () => {
  it('covers both ends of the range', () => {
    expect(jitter(1000, 3000, () => 0)).toBe(1000);
    expect(jitter(1000, 3000, () => 0.9999999)).toBe(3000);
  });

  it('swaps a reversed range', () => {
    expect(jitter(3000, 1000, () => 0)).toBe(1000);
  });

  it('returns the bound for an empty range', () => {
    expect(jitter(500, 500, () => 0.5)).toBe(500);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('resolves early when the signal aborts', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    let done = false;
    const pending = sleep(60_000, controller.signal).then(() => {
      done = true;
    });

    controller.abort();
    await pending;
    expect(done).toBe(true);
  });

  it('resolves immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(60_000, controller.signal)).resolves.toBeUndefined();
  });
});
