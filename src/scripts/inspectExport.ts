#!/usr/bin/env node
import { promises as fs } from 'fs';
import path from 'path';
import { ConfigurationError, FileSystemError } from '../errors';
import logger from '../utils/logger';
import { logFailure } from './cliSupport';

const USAGE = 'inspectExport <directory>';

export interface DirectoryNode {
  name: string;
  /** Files directly inside the directory */
  fileCount: number;
  /** Bytes of every file below the directory, symlinks excluded */
  totalBytes: number;
  children: DirectoryNode[];
}

function byCodeUnit(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export async function buildTree(dirPath: string): Promise<DirectoryNode> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  entries.sort((a, b) => byCodeUnit(a.name, b.name));

  const node: DirectoryNode = {
    name: path.basename(path.resolve(dirPath)) || dirPath,
    fileCount: 0,
    totalBytes: 0,
    children: [],
  };

  for (const entry of entries) {
    const entryPath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      const child = await buildTree(entryPath);
      node.children.push(child);
      node.totalBytes += child.totalBytes;
    } else if (entry.isFile()) {
      node.fileCount++;
      node.totalBytes += (await fs.stat(entryPath)).size;
    }
  }

  return node;
}

export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

function label(node: DirectoryNode): string {
  return `${node.name} (${formatMegabytes(node.totalBytes)}, ${node.fileCount} files)`;
}

/**
 * Render a tree with box-drawing branches, root first.
 */
export function renderTree(root: DirectoryNode): string[] {
  const lines = [label(root)];

  const visit = (node: DirectoryNode, prefix: string) => {
    node.children.forEach((child, index) => {
      const isLast = index === node.children.length - 1;
      lines.push(`${prefix}${isLast ? '└── ' : '├── '}${label(child)}`);
      visit(child, prefix + (isLast ? '    ' : '│   '));
    });
  };
  visit(root, '');

  return lines;
}

export interface CliOptions {
  directory?: string;
}

export async function main(options?: CliOptions): Promise<string[]> {
  const { directory } = options ?? { directory: process.argv[2] };
  if (!directory) {
    throw ConfigurationError.usage('No directory provided', USAGE);
  }

  const stats = await fs.stat(directory).catch(() => null);
  if (!stats?.isDirectory()) {
    throw FileSystemError.notADirectory(directory);
  }

  logger.info('Inspecting export directory', { directory });
  const lines = renderTree(await buildTree(directory));
  lines.forEach((line) => console.log(line));
  return lines;
}

if (require.main === module) {
  main().catch((error) => {
    logFailure('Export inspection failed', error);
    process.exit(1);
  });
}
