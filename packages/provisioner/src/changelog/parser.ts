/**
 * Formatted SQL changelog parser
 *
 * Parses the changelog file format the step collection is written in:
 *
 * ```sql
 * --liquibase formatted sql
 *
 * --changeset platform:create-users-table
 * CREATE TABLE IF NOT EXISTS users (...);
 * --rollback DROP TABLE IF EXISTS users;
 * ```
 *
 * Statements are split on a `;` that ends a line. `--rollback` lines are
 * concatenated and split the same way. `--rollback empty` declares a reverse
 * action that does nothing; a change set with no `--rollback` line has no
 * reverse action at all.
 *
 * @module packages/provisioner/changelog/parser
 */

import { ChangelogError } from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * One change set from a changelog file
 */
export interface ChangeSet {
  /** Change set id (unique within its file) */
  id: string;

  author: string;

  /** File the change set was read from */
  source: string;

  /** Forward statements, in order */
  statements: string[];

  /**
   * Reverse statements; an empty array is an explicit no-op, null means the
   * change set cannot be reverted
   */
  rollback: string[] | null;
}

// =============================================================================
// Parser
// =============================================================================

const HEADER = /^--\s*liquibase formatted sql\s*$/i;
const CHANGESET = /^--\s*changeset\s+([^:\s]+):(\S+)/i;
const ROLLBACK = /^--\s*rollback\b\s?(.*)$/i;
const COMMENT_DIRECTIVE = /^--\s*comment:/i;

/** Ledger ordinals are three digits wide; more would break their lexical order */
export const MAX_CHANGE_SETS_PER_FILE = 999;

/** Reverse-action values that mean "nothing to undo" */
const EMPTY_ROLLBACK = new Set(['empty', 'not required']);

interface PendingChangeSet {
  id: string;
  author: string;
  body: string[];
  rollback: string[] | null;
}

/**
 * Splits SQL text into statements on line-terminating semicolons
 */
export function splitStatements(text: string): string[] {
  return text
    .split(/;[ \t]*(?:\r?\n|$)/)
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

/**
 * Parses one changelog file
 *
 * @param text - File contents
 * @param source - File name, used in errors and ledger names
 * @throws ChangelogError if the header is missing, a change set is empty,
 *   the file holds more than MAX_CHANGE_SETS_PER_FILE change sets,
 *   or an id repeats within the file
 */
export function parseChangelog(text: string, source: string): ChangeSet[] {
  const lines = text.split(/\r?\n/);
  const firstLine = lines.find((line) => line.trim().length > 0);

  if (!firstLine || !HEADER.test(firstLine.trim())) {
    throw new ChangelogError(source, `${source}: missing '--liquibase formatted sql' header`);
  }

  const changeSets: ChangeSet[] = [];
  const seen = new Set<string>();
  let current: PendingChangeSet | null = null;

  const flush = (): void => {
    if (!current) return;

    const statements = splitStatements(current.body.join('\n'));
    if (statements.length === 0) {
      throw new ChangelogError(source, `${source}: change set '${current.id}' has no statements`);
    }

    let rollback: string[] | null = null;
    if (current.rollback) {
      const joined = current.rollback.join('\n').trim();
      rollback = EMPTY_ROLLBACK.has(joined.toLowerCase()) ? [] : splitStatements(joined);
    }

    changeSets.push({
      id: current.id,
      author: current.author,
      source,
      statements,
      rollback,
    });
    current = null;
  };

  for (const line of lines) {
    const trimmed = line.trim();

    const changeSetMatch = CHANGESET.exec(trimmed);
    if (changeSetMatch) {
      flush();
      const [, author, id] = changeSetMatch;
      if (seen.has(id)) {
        throw new ChangelogError(source, `${source}: duplicate change set id '${id}'`);
      }
      seen.add(id);
      current = { id, author, body: [], rollback: null };
      continue;
    }

    if (!current) {
      // Only the header, blank lines and comments may precede the first change set
      if (trimmed.length > 0 && !trimmed.startsWith('--')) {
        throw new ChangelogError(source, `${source}: SQL found before the first change set`);
      }
      continue;
    }

    const rollbackMatch = ROLLBACK.exec(trimmed);
    if (rollbackMatch) {
      current.rollback = [...(current.rollback ?? []), rollbackMatch[1]];
      continue;
    }

    if (COMMENT_DIRECTIVE.test(trimmed)) continue;

    current.body.push(line);
  }

  flush();

  if (changeSets.length === 0) {
    throw new ChangelogError(source, `${source}: no change sets found`);
  }
  if (changeSets.length > MAX_CHANGE_SETS_PER_FILE) {
    throw new ChangelogError(
      source,
      `${source}: ${changeSets.length} change sets exceed the limit of ${MAX_CHANGE_SETS_PER_FILE} per file`
    );
  }

  return changeSets;
}
