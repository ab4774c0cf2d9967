/**
 * ContextStore - Persistent credential contexts
 *
 * Holds every named context plus the "current context" pointer in a single
 * JSON document. The file is loaded on first access and rewritten in full
 * after every mutation, via a temp file and rename so a crash never leaves a
 * half-written store behind.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { CloudContext, ContextStoreData } from '../config/types';
import { ConfigError, NotFoundError, errorMessage } from '../errors';

export class ContextStore {
  private readonly storePath: string;
  private data: ContextStoreData | null = null;

  constructor(storePath: string) {
    this.storePath = storePath;
  }

  /**
   * Get the current context.
   * Fails when the store is empty or the pointer no longer matches a context.
   */
  getCurrentContext(): CloudContext {
    const data = this.ensureLoaded();
    if (data.currentContextName === null) {
      throw new NotFoundError('no current context is set; run "cloudctx login" first');
    }
    const current = data.contexts.find((ctx) => ctx.name === data.currentContextName);
    if (!current) {
      throw new NotFoundError(`current context not found: ${data.currentContextName}`);
    }
    return { ...current };
  }

  getCurrentContextName(): string | null {
    return this.ensureLoaded().currentContextName;
  }

  /**
   * Get a specific context by exact name
   */
  getContext(name: string): CloudContext {
    const found = this.ensureLoaded().contexts.find((ctx) => ctx.name === name);
    if (!found) {
      throw new NotFoundError(`context not found: ${name}`);
    }
    return { ...found };
  }

  /**
   * Context names in store order
   */
  listContextNames(): string[] {
    return this.ensureLoaded().contexts.map((ctx) => ctx.name);
  }

  listContexts(): CloudContext[] {
    return this.ensureLoaded().contexts.map((ctx) => ({ ...ctx }));
  }

  /**
   * Insert or replace a context and make it current.
   * A context that already exists keeps its position.
   */
  addContext(ctx: CloudContext): void {
    const data = this.ensureLoaded();
    const record: CloudContext = { ...ctx };
    const index = data.contexts.findIndex((existing) => existing.name === record.name);
    const contexts =
      index === -1
        ? [...data.contexts, record]
        : data.contexts.map((existing, i) => (i === index ? record : existing));

    this.commit({ currentContextName: record.name, contexts });
  }

  /**
   * Point the store at an existing context
   */
  setCurrentContext(name: string): CloudContext {
    const data = this.ensureLoaded();
    const target = data.contexts.find((ctx) => ctx.name === name);
    if (!target) {
      throw new NotFoundError(`context not found: ${name}`);
    }

    this.commit({ currentContextName: name, contexts: data.contexts });
    return { ...target };
  }

  private ensureLoaded(): ContextStoreData {
    if (!this.data) {
      this.data = this.load();
    }
    return this.data;
  }

  /**
   * Persist first, then swap the in-memory state, so memory never runs ahead
   * of what is on disk.
   */
  private commit(next: ContextStoreData): void {
    this.save(next);
    this.data = next;
  }

  /**
   * Load contexts from disk
   */
  private load(): ContextStoreData {
    if (!fs.existsSync(this.storePath)) {
      return createEmptyData();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.storePath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Failed to read context store ${this.storePath}: ${errorMessage(error)}`);
    }
    return parseStoreData(raw, this.storePath);
  }

  /**
   * Save contexts to disk
   */
  private save(data: ContextStoreData): void {
    const dir = path.dirname(this.storePath);
    const tempPath = path.join(dir, `.${path.basename(this.storePath)}.${process.pid}.tmp`);
    const content = JSON.stringify(data, null, 2) + '\n';

    try {
      fs.mkdirSync(dir, { recursive: true });
      fs.writeFileSync(tempPath, content, { encoding: 'utf-8', mode: 0o600 });
      fs.renameSync(tempPath, this.storePath);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw new Error(`Failed to save contexts to ${this.storePath}: ${errorMessage(error)}`);
    }
  }
}

function createEmptyData(): ContextStoreData {
  return {
    currentContextName: null,
    contexts: [],
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate the persisted document. Duplicate names keep the first record.
 */
export function parseStoreData(raw: unknown, source: string): ContextStoreData {
  if (!isRecord(raw)) {
    throw new ConfigError(`Malformed context store ${source}: expected a JSON object`);
  }

  const current = raw.currentContextName;
  if (current !== null && current !== undefined && typeof current !== 'string') {
    throw new ConfigError(`Malformed context store ${source}: currentContextName must be a string`);
  }

  const entries = raw.contexts ?? [];
  if (!Array.isArray(entries)) {
    throw new ConfigError(`Malformed context store ${source}: contexts must be an array`);
  }

  const contexts: CloudContext[] = [];
  entries.forEach((entry: unknown, index) => {
    if (
      !isRecord(entry) ||
      typeof entry.name !== 'string' ||
      typeof entry.endpoint !== 'string' ||
      typeof entry.apiToken !== 'string' ||
      typeof entry.email !== 'string'
    ) {
      throw new ConfigError(
        `Malformed context store ${source}: contexts[${index}] must have string name, endpoint, apiToken and email`
      );
    }
    if (contexts.some((ctx) => ctx.name === entry.name)) {
      return;
    }
    contexts.push({
      name: entry.name,
      endpoint: entry.endpoint,
      apiToken: entry.apiToken,
      email: entry.email,
    });
  });

  return {
    currentContextName: typeof current === 'string' ? current : null,
    contexts,
  };
}
