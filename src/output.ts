import chalk, { Chalk, type ChalkInstance } from 'chalk';
import Table from 'cli-table3';
import type { Card, Column, Tag } from './schemas.js';
import type { CandidateSummary, EntityKind, ResolutionFailure } from './resolvers/types.js';
import { FavroError } from './favro-client.js';

export interface TextSink {
  write(text: string): unknown;
}

export interface OutputOptions {
  json?: boolean;
  color?: boolean;
  stdout?: TextSink;
  stderr?: TextSink;
}

export type TableColumn<T> = [header: string, value: (row: T) => string | number | null | undefined];

// ============================================
// RESOLUTION FAILURE MESSAGES
// ============================================

const ENTITY_LABELS: Record<EntityKind, string> = {
  organization: 'Organization',
  board: 'Board',
  column: 'Column',
  card: 'Card',
  tag: 'Tag',
  user: 'User',
};

// Where a missing scope comes from on the command line
const SCOPE_HINTS: Partial<Record<EntityKind, string>> = {
  board: "pass --board <id or name>, or set a default with 'favro board select <board>'",
  organization: "select one with 'favro org select <organization>'",
};

export function formatCandidate(candidate: CandidateSummary): string {
  return candidate.context
    ? `${candidate.id}  ${candidate.name} (${candidate.context})`
    : `${candidate.id}  ${candidate.name}`;
}

export function describeFailure(failure: ResolutionFailure): { message: string; details: string[] } {
  const label = ENTITY_LABELS[failure.entityKind];

  switch (failure.type) {
    case 'not_found':
      return { message: `${label} "${failure.input}" not found`, details: [] };

    case 'ambiguous':
      return {
        message: `${label} "${failure.input}" is ambiguous (${failure.candidates.length} matches); use one of these IDs:`,
        details: failure.candidates.map((candidate) => `  ${formatCandidate(candidate)}`),
      };

    case 'scope_required': {
      const scope = ENTITY_LABELS[failure.missingScope].toLowerCase();
      const hint = SCOPE_HINTS[failure.missingScope] ?? `pass the ${scope}`;
      return {
        message: `${label} "${failure.input}" can only be found by name within a ${scope}: ${hint}`,
        details: [],
      };
    }
  }
}

// ============================================
// BOARD VIEW LAYOUT
// ============================================

export interface BoardLayout {
  headers: string[];
  rows: string[][];
  more: string[] | null;
}

const MAX_CARD_NAME = 200;

export function formatCardCell(card: Card, tagsById: ReadonlyMap<string, Tag> = new Map()): string {
  const name = card.name.length > MAX_CARD_NAME ? `${card.name.slice(0, MAX_CARD_NAME - 3)}...` : card.name;
  const lines = [`[#${card.sequentialId}] ${name}`];

  if (card.dueDate) lines.push(`Due: ${card.dueDate.slice(0, 10)}`);
  if (card.assignments.length > 0) lines.push(`${card.assignments.length} assigned`);
  if (card.tasksTotal > 0) lines.push(`Tasks: ${card.tasksDone}/${card.tasksTotal}`);

  const tagNames = card.tags.flatMap((tagId) => {
    const tag = tagsById.get(tagId);
    return tag ? [tag.name] : [];
  });
  if (tagNames.length > 0) {
    lines.push('', tagNames.join(', '));
  }

  return lines.join('\n');
}

/** Columns by position, cards by list position, at most `maxCards` per column. */
export function layoutBoard(
  columns: readonly Column[],
  cards: readonly Card[],
  maxCards: number,
  tagsById?: ReadonlyMap<string, Tag>
): BoardLayout {
  const sortedColumns = [...columns].sort((a, b) => a.position - b.position);

  const cardsByColumn = new Map<string, Card[]>();
  for (const card of cards) {
    if (!card.columnId) continue;
    const bucket = cardsByColumn.get(card.columnId) ?? [];
    bucket.push(card);
    cardsByColumn.set(card.columnId, bucket);
  }
  for (const bucket of cardsByColumn.values()) {
    bucket.sort((a, b) => (a.listPosition ?? 0) - (b.listPosition ?? 0));
  }

  const columnCards = sortedColumns.map((column) => cardsByColumn.get(column.columnId) ?? []);
  const headers = sortedColumns.map((column, i) => `${column.name} (${columnCards[i].length})`);

  const rowCount = Math.max(0, ...columnCards.map((list) => Math.min(list.length, maxCards)));
  const rows: string[][] = [];
  for (let row = 0; row < rowCount; row++) {
    rows.push(columnCards.map((list) => (row < list.length ? formatCardCell(list[row], tagsById) : '')));
  }

  const remaining = columnCards.map((list) => list.length - maxCards);
  const more = remaining.some((count) => count > 0)
    ? remaining.map((count) => (count > 0 ? `... +${count} more` : ''))
    : null;

  return { headers, rows, more };
}

// ============================================
// OUTPUT
// ============================================

export class Output {
  // Set from the global --json flag once arguments are parsed
  json: boolean;
  private readonly stdout: TextSink;
  private readonly stderr: TextSink;
  private readonly chalk: ChalkInstance;

  constructor(options: OutputOptions = {}) {
    this.json = options.json ?? false;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    const color = options.color ?? Boolean(process.stdout.isTTY);
    this.chalk = new Chalk({ level: color ? chalk.level : 0 });
  }

  private out(line: string): void {
    this.stdout.write(`${line}\n`);
  }

  private err(line: string): void {
    this.stderr.write(`${line}\n`);
  }

  printJson(data: unknown): void {
    this.out(JSON.stringify(data, null, 2));
  }

  table<T>(rows: readonly T[], columns: TableColumn<T>[], title?: string): void {
    if (title) this.out(this.chalk.bold(title));

    const table = new Table({
      head: columns.map(([header]) => this.chalk.bold(header)),
      style: { head: [], border: [] },
    });
    for (const row of rows) {
      table.push(columns.map(([, value]) => String(value(row) ?? '')));
    }
    this.out(table.toString());
  }

  panel(title: string, fields: [label: string, value: string | number | null | undefined][]): void {
    this.out(this.chalk.bold(title));
    this.out(this.chalk.gray('─'.repeat(Math.max(title.length, 40))));
    for (const [label, value] of fields) {
      if (value === null || value === undefined || value === '') continue;
      this.out(`${this.chalk.dim(`${label}:`)} ${value}`);
    }
  }

  board(title: string, layout: BoardLayout): void {
    const table = new Table({
      head: layout.headers.map((header) => this.chalk.bold(header)),
      style: { head: [], border: [] },
      wordWrap: true,
    });
    for (const row of layout.rows) {
      table.push(row);
    }
    if (layout.more) {
      table.push(layout.more.map((cell) => this.chalk.dim(cell)));
    }

    this.out(this.chalk.bold(title));
    this.out(table.toString());
  }

  text(message: string): void {
    this.out(message);
  }

  success(message: string): void {
    this.out(this.chalk.green(message));
  }

  warning(message: string): void {
    this.err(this.chalk.yellow(message));
  }

  error(message: string, hint?: string): void {
    this.err(`${this.chalk.red('Error:')} ${message}`);
    if (hint) this.err(this.chalk.dim(`Hint: ${hint}`));
  }

  /** Human message on stderr, or a structured document on stdout in JSON mode. */
  resolutionFailure(failure: ResolutionFailure): void {
    const { message, details } = describeFailure(failure);

    if (this.json) {
      this.printJson({
        error: {
          type: failure.type,
          entity: failure.entityKind,
          input: failure.input,
          message,
          ...(failure.type === 'ambiguous' ? { candidates: failure.candidates } : {}),
          ...(failure.type === 'scope_required' ? { missing_scope: failure.missingScope } : {}),
        },
      });
      return;
    }

    this.error(message);
    for (const line of details) {
      this.err(line);
    }
  }

  apiError(error: FavroError): void {
    if (this.json) {
      this.printJson({ error: error.toJSON() });
      return;
    }
    this.error(error.message, error.hint);
  }
}
