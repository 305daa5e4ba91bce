/**
 * Schema Context Provider.
 *
 * Turns the curated schema catalog into the bounded text block embedded in
 * generation prompts, and answers catalog lookups for the validator's
 * uniqueness checks. Only allow-listed objects are ever described.
 */

import type { SchemaObject } from '../../shared/types';
import { ConfigurationError } from '../errors';
import type { SchemaCatalog } from '../validators/sql-validator';
import type { AllowListRegistry } from './allow-list';

const STOP_WORDS = new Set([
  'a', 'an', 'the', 'and', 'or', 'of', 'in', 'on', 'for', 'to', 'by', 'with',
  'what', 'which', 'who', 'how', 'many', 'much', 'is', 'are', 'was', 'were',
  'show', 'list', 'give', 'me', 'find', 'get', 'all', 'each', 'per', 'top',
  'most', 'than', 'from', 'that', 'have', 'has', 'do', 'does', 'my', 'our',
]);

/** Naive singular form: `categories` → `category`, `orders` → `order`. */
export function foldPlural(word: string): string {
  if (word.length > 4 && word.endsWith('ies')) return `${word.slice(0, -3)}y`;
  if (word.length > 3 && word.endsWith('s') && !word.endsWith('ss')) return word.slice(0, -1);
  return word;
}

/** Lower-cased, de-pluralized keywords of a question, stop words removed. */
export function extractHints(question: string): string[] {
  const hints: string[] = [];
  for (const raw of question.toLowerCase().split(/[^a-z0-9_]+/)) {
    if (raw.length < 2 || STOP_WORDS.has(raw)) continue;
    const hint = foldPlural(raw);
    if (!hints.includes(hint)) hints.push(hint);
  }
  return hints;
}

function vocabulary(object: SchemaObject): Set<string> {
  const words = new Set<string>();
  for (const segment of object.name.split(/[._]/)) words.add(foldPlural(segment));
  for (const synonym of object.synonyms) {
    for (const word of synonym.toLowerCase().split(/\s+/)) words.add(foldPlural(word));
  }
  return words;
}

function describeObject(object: SchemaObject): string {
  const label = object.kind === 'view' ? 'View' : 'Table';
  const lines = [`-- ${label}: ${object.name} -- ${object.description}`];
  for (const column of object.columns) {
    const note = column.description ? ` -- ${column.description}` : '';
    lines.push(`--   ${column.name} ${column.type}${note}`);
  }
  if (object.primaryKey.length > 0) {
    lines.push(`--   PK: ${object.primaryKey.join(', ')}`);
  }
  for (const key of object.uniqueKeys) {
    lines.push(`--   UNIQUE: ${key.join(', ')}`);
  }
  for (const fk of object.foreignKeys) {
    lines.push(`--   FK: ${fk.columns.join(', ')} -> ${fk.references}(${fk.referencedColumns.join(', ')})`);
  }
  return lines.join('\n');
}

export class SchemaContextProvider implements SchemaCatalog {
  private readonly catalog: ReadonlyMap<string, SchemaObject>;
  private readonly allowed: readonly SchemaObject[];
  private readonly vocabularies: ReadonlyMap<string, Set<string>>;
  private readonly header: string;

  constructor(
    objects: readonly SchemaObject[],
    allowList: AllowListRegistry,
    private readonly maxChars: number,
  ) {
    this.catalog = new Map(objects.map((o) => [o.name, o]));

    const missing = allowList.names().filter((name) => !this.catalog.has(name));
    if (missing.length > 0) {
      throw new ConfigurationError(missing.map((name) => `allow-listed object ${name} is not described in the schema context`));
    }

    this.allowed = objects.filter((o) => allowList.has(o.name));
    this.vocabularies = new Map(this.allowed.map((o) => [o.name, vocabulary(o)]));
    this.header = `-- Allowed objects: ${this.allowed.map((o) => o.name).join(', ')}`;

    if (this.header.length > maxChars) {
      throw new ConfigurationError([
        `schema context budget of ${maxChars} characters cannot hold the allowed object list (${this.header.length})`,
      ]);
    }
  }

  lookup(name: string): SchemaObject | undefined {
    return this.catalog.get(name);
  }

  allowedObjects(): readonly SchemaObject[] {
    return this.allowed;
  }

  /** Allow-listed objects matching the hints, plus their foreign-key neighbours. */
  relevantObjects(hints: readonly string[]): SchemaObject[] {
    const matched = this.allowed.filter((o) => {
      const words = this.vocabularies.get(o.name);
      return words !== undefined && hints.some((hint) => words.has(hint));
    });
    if (matched.length === 0) return [...this.allowed];

    const names = new Set(matched.map((o) => o.name));
    const neighbours = this.allowed.filter(
      (o) =>
        !names.has(o.name) &&
        (o.foreignKeys.some((fk) => names.has(fk.references)) ||
          matched.some((m) => m.foreignKeys.some((fk) => fk.references === o.name))),
    );
    return [...matched, ...neighbours];
  }

  /**
   * Bounded schema text for a prompt. The allowed-objects line always comes
   * first; object sections follow while they fit in the budget.
   */
  contextFor(hints: readonly string[]): string {
    let text = this.header;
    for (const object of this.relevantObjects(hints)) {
      const section = `\n\n${describeObject(object)}`;
      if (text.length + section.length > this.maxChars) continue;
      text += section;
    }
    return text;
  }
}
