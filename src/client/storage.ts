import { z } from 'zod';

import { decodeValue } from './decode.js';
import type { Session } from './session.js';

export type StorageArea = 'local_storage' | 'session_storage';

/** HTML5 web storage of the session's current page. */
export class WebStorage {
  private readonly session: Session;
  readonly area: StorageArea;

  constructor(session: Session, area: StorageArea) {
    this.session = session;
    this.area = area;
  }

  async keys(): Promise<string[]> {
    const raw = await this.session.command('GET', '/%s', [this.area]);
    return decodeValue(z.array(z.string()), raw, `${this.area} keys`);
  }

  async get(key: string): Promise<string | null> {
    const raw = await this.session.command('GET', '/%s/key/%s', [this.area, key]);
    return decodeValue(z.string().nullable(), raw, `${this.area} get`);
  }

  async set(key: string, value: string): Promise<void> {
    await this.session.command('POST', '/%s', [this.area], { key, value });
  }

  async remove(key: string): Promise<void> {
    await this.session.command('DELETE', '/%s/key/%s', [this.area, key]);
  }

  async clear(): Promise<void> {
    await this.session.command('DELETE', '/%s', [this.area]);
  }

  async size(): Promise<number> {
    const raw = await this.session.command('GET', '/%s/size', [this.area]);
    return decodeValue(z.number().int(), raw, `${this.area} size`);
  }
}
