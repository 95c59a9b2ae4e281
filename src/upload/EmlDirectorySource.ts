/**
 * EML Directory Source
 * Walks a converted export and loads its `.eml` files back as message units.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { FileSystemError } from '../errors';
import { FolderResolver } from '../labels/FolderResolver';
import { readMessageHeaders } from '../labels/LabelExtractor';
import {
  IDENTITY_PATTERN,
  MessageUnit,
  computeFileIdentity,
  createMessageUnit,
} from '../ingestion/MessageUnit';
import { EML_EXTENSION } from '../ingestion/MboxConverter';

export interface PendingMessage {
  /** Identity known before the content is read, null when it has to be computed */
  identity: string | null;
  /** Where the message comes from, for logs and failure records */
  location: string;
}

export interface MessageSource<T extends PendingMessage = PendingMessage> {
  entries(): AsyncIterable<T>;
  load(entry: T): Promise<MessageUnit>;
  count?(): Promise<number>;
}

export interface EmlFile extends PendingMessage {
  path: string;
  relativePath: string;
}

function byCodeUnit(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export class EmlDirectorySource implements MessageSource<EmlFile> {
  readonly rootDir: string;
  private readonly resolver: FolderResolver;

  /**
   * @param resolver - drops ignored labels from loaded units, the same way
   *   the converter does
   */
  constructor(rootDir: string, resolver: FolderResolver) {
    this.rootDir = path.resolve(rootDir);
    this.resolver = resolver;
  }

  async assertReadable(): Promise<void> {
    const stats = await fs.stat(this.rootDir).catch(() => null);
    if (!stats?.isDirectory()) {
      throw FileSystemError.notADirectory(this.rootDir);
    }
  }

  /**
   * `.eml` files in a stable order: names sorted by code unit, depth first.
   */
  async *entries(): AsyncGenerator<EmlFile, void, undefined> {
    yield* this.walk(this.rootDir);
  }

  async count(): Promise<number> {
    let total = 0;
    for await (const _file of this.walk(this.rootDir)) {
      total++;
    }
    return total;
  }

  async load(file: EmlFile): Promise<MessageUnit> {
    const content = await fs.readFile(file.path);
    const identity = file.identity ?? computeFileIdentity(file.relativePath, content);
    const headers = await readMessageHeaders(content, { identity, filePath: file.path });

    return createMessageUnit({
      identity,
      rawContent: content,
      labels: this.resolver.filter(headers.labels),
      origin: { kind: 'file', source: this.rootDir, relativePath: file.relativePath },
      date: headers.date,
    });
  }

  private async *walk(directory: string): AsyncGenerator<EmlFile, void, undefined> {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    entries.sort((a, b) => byCodeUnit(a.name, b.name));

    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        yield* this.walk(fullPath);
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith(EML_EXTENSION)) {
        const stem = entry.name.slice(0, -EML_EXTENSION.length);
        const relativePath = path.relative(this.rootDir, fullPath);
        yield {
          path: fullPath,
          relativePath,
          location: relativePath,
          identity: IDENTITY_PATTERN.test(stem) ? stem : null,
        };
      }
    }
  }
}
