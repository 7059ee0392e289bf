/**
 * Credential Store
 *
 * Reads and writes the API key file used at startup. The file holds the
 * bare key on a single line.
 *
 * @module credential-store
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import path from 'node:path';

export class CredentialStore {
  constructor(private readonly filePath: string) {}

  getPath(): string {
    return this.filePath;
  }

  /**
   * Load the stored key, or null when there is no usable file
   */
  async load(): Promise<string | null> {
    if (!existsSync(this.filePath)) {
      return null;
    }

    const content = await readFile(this.filePath, 'utf-8');
    const apiKey = content.trim();
    return apiKey.length > 0 ? apiKey : null;
  }

  /**
   * Persist a key, readable by the owner only
   */
  async save(apiKey: string): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${apiKey.trim()}\n`, { encoding: 'utf-8', mode: 0o600 });
  }
}
