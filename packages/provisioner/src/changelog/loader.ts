/**
 * Changelog loader
 *
 * Reads every `.sql` file in the step-collection directory, in file-name
 * order, and assigns each change set its ledger name. Every tenant schema
 * receives the same sequence.
 *
 * @module packages/provisioner/changelog/loader
 */

import { readdir, readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';

import { ChangelogError, describeError } from '../types.js';
import { parseChangelog, type ChangeSet } from './parser.js';

/**
 * A change set with its position in the global order
 */
export interface OrderedChangeSet extends ChangeSet {
  /** Ledger name: `<file stem>/<ordinal>_<id>` */
  name: string;
}

/**
 * Builds the ledger name for a change set
 *
 * The zero-padded in-file ordinal keeps lexical order equal to changelog
 * order, which is what the migration runner sorts by.
 */
export function stepName(source: string, ordinal: number, id: string): string {
  const stem = basename(source).replace(/\.sql$/i, '');
  return `${stem}/${String(ordinal).padStart(3, '0')}_${id}`;
}

/**
 * Orders parsed files into the global step sequence
 *
 * @param files - Parsed change sets keyed by file name
 */
export function orderChangeSets(files: Map<string, ChangeSet[]>): OrderedChangeSet[] {
  const ordered: OrderedChangeSet[] = [];
  const sources = [...files.keys()].sort();

  for (const source of sources) {
    const changeSets = files.get(source) ?? [];
    changeSets.forEach((changeSet, index) => {
      ordered.push({ ...changeSet, name: stepName(source, index + 1, changeSet.id) });
    });
  }

  return ordered;
}

/**
 * Loads the step collection from a directory
 *
 * @param dir - Step-collection locator
 * @throws ChangelogError if the directory is unreadable, empty or malformed
 */
export async function loadChangelog(dir: string): Promise<OrderedChangeSet[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    throw new ChangelogError(dir, `Cannot read changelog directory ${dir}: ${describeError(error)}`, {
      cause: error,
    });
  }

  const sqlFiles = entries.filter((entry) => entry.toLowerCase().endsWith('.sql'));
  if (sqlFiles.length === 0) {
    throw new ChangelogError(dir, `No .sql changelog files in ${dir}`);
  }

  const files = new Map<string, ChangeSet[]>();
  for (const file of sqlFiles) {
    const text = await readFile(join(dir, file), 'utf8');
    files.set(file, parseChangelog(text, file));
  }

  return orderChangeSets(files);
}
