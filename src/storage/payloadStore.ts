import fs from 'fs/promises';
import path from 'path';
import { artifactName } from './artifactNames';
import { isMissingFile } from './files';

export type StoredPayloadInfo = {
  name: string;
  createdAt: string;
  size: number;
};

type StatEntry = { name: string; mtimeMs: number; size: number };

export type StoredPayload =
  | { found: false }
  | { found: true; fileName: string; content: unknown };

/** Reduces a client-supplied name to a plain file name inside the store. */
export function safeFileName(name: string): string | null {
  const base = path.basename(name);
  if (!base || base === '.' || base === '..') return null;
  return base;
}

/**
 * Flat directory of raw webhook payloads, one pretty-printed JSON file per
 * submission. Names are timestamped and random, so writes never collide.
 */
export class PayloadStore {
  constructor(private dir: string) {}

  private async ensureDir(): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
  }

  async save(payload: unknown, now: Date = new Date()): Promise<string> {
    await this.ensureDir();
    const fileName = artifactName('Webhook', 'json', now);
    await fs.writeFile(path.join(this.dir, fileName), JSON.stringify(payload ?? null, null, 2), 'utf8');
    return fileName;
  }

  async list(): Promise<StoredPayloadInfo[]> {
    await this.ensureDir();
    const names = (await fs.readdir(this.dir, { withFileTypes: true }))
      .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
      .map((entry) => entry.name);
    const entries = await Promise.all(names.map((name) => this.statEntry(name)));
    return entries
      .filter((entry): entry is StatEntry => entry !== null)
      .sort((a, b) => b.mtimeMs - a.mtimeMs || b.name.localeCompare(a.name))
      .map(({ name, mtimeMs, size }) => ({ name, createdAt: new Date(mtimeMs).toISOString(), size }));
  }

  // a file removed between readdir and stat is skipped
  private async statEntry(name: string): Promise<StatEntry | null> {
    try {
      const stat = await fs.stat(path.join(this.dir, name));
      return { name, mtimeMs: stat.mtimeMs, size: stat.size };
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async readText(name: string): Promise<string | undefined> {
    const fileName = safeFileName(name);
    if (!fileName) return undefined;
    try {
      return await fs.readFile(path.join(this.dir, fileName), 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return undefined;
      throw err;
    }
  }

  /** Parsed content; a file that is not valid JSON comes back as its raw text. */
  async read(name: string): Promise<StoredPayload> {
    const fileName = safeFileName(name);
    if (!fileName) return { found: false };
    const text = await this.readText(fileName);
    if (text === undefined) return { found: false };
    try {
      const content: unknown = JSON.parse(text);
      return { found: true, fileName, content };
    } catch {
      return { found: true, fileName, content: text };
    }
  }
}
