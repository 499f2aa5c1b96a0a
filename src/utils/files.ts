/**
 * JSON / JSONL helpers shared by every stage. Reads validate against a zod
 * schema and surface problems as InvalidInputError.
 */
import * as fs from 'fs';
import * as path from 'path';
import type { z } from 'zod';
import { InvalidInputError } from './errors.js';

export function readTextFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new InvalidInputError(`Cannot read ${filePath}`, err);
  }
}

export function parseJson(raw: string, source: string): unknown {
  if (raw.trim().length === 0) throw new InvalidInputError(`${source} is empty`);
  try {
    return JSON.parse(raw) as unknown;
  } catch (err) {
    throw new InvalidInputError(`${source} is not valid JSON`, err);
  }
}

export function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S): z.output<S> {
  const data = parseJson(readTextFile(filePath), filePath);
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new InvalidInputError(`${filePath} has an unexpected shape${where}: ${issue?.message ?? 'invalid'}`, result.error);
  }
  return result.data;
}

/** Parse non-blank lines of a JSONL file. Line numbers in errors are 1-based. */
export function readJsonLines(filePath: string): unknown[] {
  const rows: unknown[] = [];
  readTextFile(filePath).split('\n').forEach((line, i) => {
    if (!line.trim()) return;
    rows.push(parseJson(line, `${filePath}:${i + 1}`));
  });
  return rows;
}

export function writeJsonFile(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
}
