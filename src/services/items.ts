/** Loads work items from a file: one URL per line, or a JSON array */
import fs from 'fs/promises';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { WorkItem } from '../types.js';
import { identityOf } from '../types.js';

const RequestDescriptorSchema = z.object({
  url: z.string().url(),
  method: z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS']).optional(),
  params: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  headers: z.record(z.string()).optional(),
  data: z.unknown().optional(),
  requestId: z.string().optional(),
});

const WorkItemsSchema = z.array(z.union([z.string().url(), RequestDescriptorSchema]));

export function parseItems(raw: string, source = 'items'): WorkItem[] {
  const text = raw.trim();
  if (!text.startsWith('[')) {
    return text.split(/\r?\n/).map(l => l.trim()).filter(l => l && !l.startsWith('#'));
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = WorkItemsSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`${source}: item ${issue.path.join('.')} ${issue.message}`);
  }
  return parsed.data;
}

export async function loadItems(filePath: string): Promise<WorkItem[]> {
  return parseItems(await fs.readFile(filePath, 'utf-8'), filePath);
}

/** Keeps the first item per identity, so each identity yields one record. */
export function dedupeItems(items: readonly WorkItem[]): { unique: WorkItem[]; duplicates: number } {
  const seen = new Set<string>();
  const unique = items.filter(item => {
    const id = identityOf(item);
    if (seen.has(id)) return false;
    seen.add(id);
    return true;
  });
  return { unique, duplicates: items.length - unique.length };
}
