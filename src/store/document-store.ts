/**
 * Document Store
 *
 * Keeps one JSON document in memory and writes the whole document back after
 * each change. All reads and read-modify-write cycles go through a mutex, so
 * concurrent updates to the same document are applied one at a time.
 */

import fs from 'fs';
import path from 'path';
import { Mutex } from './mutex';
import { PersistenceError, toError } from '../system/error-handling';
import { BroadcastLogger, createComponentLogger } from '../utils/logger';

export interface StoredDocument {
  lastUpdated: string;
}

/** Where the serialized document lives. */
export interface DocumentPersistence {
  readonly location: string;
  /** Resolves to null when the document does not exist yet */
  read(): Promise<string | null>;
  write(contents: string): Promise<void>;
}

export class FileDocumentPersistence implements DocumentPersistence {
  readonly location: string;

  constructor(filePath: string) {
    this.location = path.resolve(filePath);
  }

  async read(): Promise<string | null> {
    try {
      return await fs.promises.readFile(this.location, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  async write(contents: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.location), { recursive: true });
    const tempPath = `${this.location}.${process.pid}.tmp`;
    await fs.promises.writeFile(tempPath, contents, 'utf-8');
    await fs.promises.rename(tempPath, this.location);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export interface DocumentStoreOptions<T extends StoredDocument> {
  name: string;
  persistence: DocumentPersistence;
  createDefault: (now: Date) => T;
  /** Turns parsed JSON into a document, or returns null when the shape is unusable */
  normalize: (raw: unknown, now: Date) => T | null;
  logger?: BroadcastLogger;
  clock?: () => Date;
}

export class DocumentStore<T extends StoredDocument> {
  private readonly options: DocumentStoreOptions<T>;
  private readonly logger: BroadcastLogger;
  private readonly clock: () => Date;
  private readonly mutex = new Mutex();
  private document: T | null = null;
  private lastWriteError: PersistenceError | null = null;

  constructor(options: DocumentStoreOptions<T>) {
    this.options = options;
    this.logger = options.logger ?? createComponentLogger(`store.${options.name}`);
    this.clock = options.clock ?? (() => new Date());
  }

  get name(): string {
    return this.options.name;
  }

  /**
   * Returns a snapshot of the document. Changes to the snapshot are not saved.
   */
  async read(): Promise<T> {
    return this.mutex.runExclusive(async () => structuredClone(await this.ensureLoaded()));
  }

  /**
   * Applies `mutator` to a working copy and, if it returns without throwing,
   * makes the copy current and persists it. A throwing mutator leaves the
   * document untouched.
   */
  async transact<R>(mutator: (document: T) => R | Promise<R>): Promise<R> {
    return this.mutex.runExclusive(async () => {
      const current = await this.ensureLoaded();
      const working = structuredClone(current);
      const result = await mutator(working);

      working.lastUpdated = this.clock().toISOString();
      this.document = working;
      await this.persist(working);

      return result;
    });
  }

  /** Forces the next access to re-read the persisted document. */
  async reload(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.document = null;
      await this.ensureLoaded();
    });
  }

  getLastWriteError(): PersistenceError | null {
    return this.lastWriteError;
  }

  private async ensureLoaded(): Promise<T> {
    if (this.document) {
      return this.document;
    }

    const now = this.clock();
    let raw: string | null;

    try {
      raw = await this.options.persistence.read();
    } catch (error) {
      this.reportReadFailure('Failed to read document', error);
      this.document = this.options.createDefault(now);
      return this.document;
    }

    if (raw === null) {
      this.document = this.options.createDefault(now);
      this.logger.info(`Initializing ${this.options.name} document`, {
        location: this.options.persistence.location
      }, 'load');
      await this.persist(this.document);
      return this.document;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.reportReadFailure('Document is not valid JSON', error);
      this.document = this.options.createDefault(now);
      return this.document;
    }

    const normalized = this.options.normalize(parsed, now);
    if (!normalized) {
      this.reportReadFailure('Document has an unexpected shape', undefined);
      this.document = this.options.createDefault(now);
      return this.document;
    }

    this.document = normalized;
    return this.document;
  }

  private async persist(document: T): Promise<void> {
    try {
      await this.options.persistence.write(JSON.stringify(document, null, 2));
      this.lastWriteError = null;
    } catch (error) {
      // In-memory state is kept; the next successful write carries it.
      this.lastWriteError = new PersistenceError(`Failed to write ${this.options.name} document`, {
        operation: 'save',
        details: { location: this.options.persistence.location },
        cause: error
      });
      this.logger.error(this.lastWriteError.message, toError(error), undefined, 'save');
    }
  }

  private reportReadFailure(message: string, cause: unknown): void {
    const error = new PersistenceError(`${message}; falling back to an empty ${this.options.name} document`, {
      operation: 'load',
      details: { location: this.options.persistence.location },
      cause
    });
    this.logger.error(error.message, cause === undefined ? undefined : toError(cause), undefined, 'load');
  }
}
