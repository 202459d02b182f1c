import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FileLedgerStore } from '../store.js';
import { LedgerError } from '../../shared/errors.js';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-store-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('FileLedgerStore', () => {
  it('reads an empty list when nothing has been stored', async () => {
    const store = new FileLedgerStore(dir);
    await expect(store.read('acct')).resolves.toEqual([]);
  });

  it('writes newline-delimited ids and reads them back', async () => {
    const store = new FileLedgerStore(dir);
    await store.write('acct', ['1', '2', '3']);

    expect(fs.readFileSync(path.join(dir, 'acct.txt'), 'utf-8')).toBe('1\n2\n3');
    await expect(store.read('acct')).resolves.toEqual(['1', '2', '3']);
  });

  it('ignores blank lines and surrounding whitespace', async () => {
    fs.writeFileSync(path.join(dir, 'acct.txt'), '1\n\n 2 \r\n3\n', 'utf-8');
    await expect(new FileLedgerStore(dir).read('acct')).resolves.toEqual(['1', '2', '3']);
  });

  it('replaces the file without leaving temporary files behind', async () => {
    const store = new FileLedgerStore(dir);
    await store.write('acct', ['1']);
    await store.write('acct', ['1', '2']);

    expect(fs.readdirSync(dir)).toEqual(['acct.txt']);
    await expect(store.read('acct')).resolves.toEqual(['1', '2']);
  });

  it('creates the ledger directory on first write', async () => {
    const nested = path.join(dir, 'nested', 'ledger');
    await new FileLedgerStore(nested).write('acct', ['9']);
    expect(fs.existsSync(path.join(nested, 'acct.txt'))).toBe(true);
  });

  it('keeps every handle inside the ledger directory', () => {
    const store = new FileLedgerStore(dir);
    const file = store.filePath('../escape');
    expect(path.dirname(file)).toBe(dir);
    expect(path.basename(file)).toBe('%2E%2E%2Fescape.txt');
  });

  it('treats handles that differ only in case as one account', async () => {
    const store = new FileLedgerStore(dir);
    await store.write('Acct', ['7']);

    expect(store.filePath('Acct')).toBe(store.filePath('acct'));
    expect(fs.readdirSync(dir)).toEqual(['acct.txt']);
    await expect(store.read('ACCT')).resolves.toEqual(['7']);
  });

  it('surfaces write failures as LedgerError', async () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory', 'utf-8');

    const store = new FileLedgerStore(path.join(blocker, 'ledger'));
    await expect(store.write('acct', ['1'])).rejects.toThrow(LedgerError);
  });
});
