import fs from 'node:fs';
import path from 'node:path';
import { LedgerError, errorMessage } from '../shared/errors.js';
import { generateId } from '../shared/utils.js';

/**
 * Persistence for forwarded post ids, one record per account, oldest first.
 */
export interface LedgerStore {
  read(account: string): Promise<string[]>;
  write(account: string, ids: readonly string[]): Promise<void>;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * One newline-delimited text file per account under `dir`.
 */
export class FileLedgerStore implements LedgerStore {
  constructor(private readonly dir: string) {}

  /**
   * Account handles become file names; percent-encode them (dots included)
   * so no handle can escape `dir`. Handles are case-insensitive, so `Acct`
   * and `acct` share one file.
   */
  filePath(account: string): string {
    const name = encodeURIComponent(account.toLowerCase()).replace(/\./g, '%2E');
    return path.join(this.dir, `${name}.txt`);
  }

  async read(account: string): Promise<string[]> {
    const file = this.filePath(account);
    let content: string;
    try {
      content = await fs.promises.readFile(file, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new LedgerError(`Failed to read ledger: ${errorMessage(err)}`, { account, path: file });
    }

    return content
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  async write(account: string, ids: readonly string[]): Promise<void> {
    const file = this.filePath(account);
    const tmp = `${file}.${generateId(8)}.tmp`;

    try {
      await fs.promises.mkdir(this.dir, { recursive: true });
    } catch (err) {
      throw new LedgerError(`Failed to create ledger directory: ${errorMessage(err)}`, { account, path: this.dir });
    }

    try {
      await fs.promises.writeFile(tmp, ids.join('\n'), 'utf-8');
      await fs.promises.rename(tmp, file);
    } catch (err) {
      await fs.promises.rm(tmp, { force: true });
      throw new LedgerError(`Failed to write ledger: ${errorMessage(err)}`, { account, path: file });
    }
  }
}
