// core/template-store.ts
// Named template storage as one JSON file per template

import * as fs from 'fs/promises';
import * as path from 'path';
import type { StoredTemplate, TemplateDraft, TemplateStore } from '../types/index.js';
import { InputError, MergeError, NotFoundError, describeError } from '../types/index.js';
import { describeSchemaErrors, validateStoredTemplate } from './schema-registry.js';

/**
 * File name for a template name: letters, digits, space, '-' and '_' kept,
 * spaces then turned into '_'.
 */
export function templateFileStem(name: string): string {
  const stem = name
    .replace(/[^\p{L}\p{N} _-]/gu, '')
    .trimEnd()
    .replace(/ /g, '_');

  if (!stem) {
    throw new InputError('Invalid template name', `"${name}" has no usable characters`);
  }
  return stem;
}

export function parseStoredTemplate(content: string, source: string): StoredTemplate {
  let json: unknown;

  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new MergeError('Invalid JSON in stored template', 'INVALID_TEMPLATE', `${source}: ${describeError(error)}`);
  }

  if (!validateStoredTemplate(json)) {
    throw new MergeError(
      'Stored template validation failed',
      'INVALID_TEMPLATE',
      `${source}: ${describeSchemaErrors(validateStoredTemplate)}`
    );
  }

  return json;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileTemplateStore implements TemplateStore {
  constructor(
    private readonly dir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async save(name: string, draft: TemplateDraft): Promise<StoredTemplate> {
    const filePath = this.filePath(name);
    await fs.mkdir(this.dir, { recursive: true });

    const timestamp = this.now().toISOString();
    const previous = await this.readIfExists(filePath);

    const record: StoredTemplate = {
      schema: 'docmerge-template/v1',
      ...draft,
      name,
      created_at: previous?.created_at ?? timestamp,
      updated_at: timestamp,
    };

    // Atomic write
    const tempPath = `${filePath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(record, null, 2), 'utf-8');
    await fs.rename(tempPath, filePath);

    console.log(`Template saved: ${filePath}`);
    return record;
  }

  async load(name: string): Promise<StoredTemplate> {
    const filePath = this.filePath(name);
    const record = await this.readIfExists(filePath);
    if (!record) {
      throw new NotFoundError(`Template not found: ${name}`, filePath);
    }
    return record;
  }

  async list(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.dir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const names: string[] = [];
    for (const file of files.filter(f => f.endsWith('.json')).sort()) {
      const filePath = path.join(this.dir, file);
      try {
        const record = parseStoredTemplate(await fs.readFile(filePath, 'utf-8'), filePath);
        names.push(record.name);
      } catch (error) {
        console.warn(`Skipping unreadable template ${file}: ${describeError(error)}`);
      }
    }
    return names;
  }

  async delete(name: string): Promise<void> {
    const filePath = this.filePath(name);
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError(`Template not found: ${name}`, filePath);
      }
      throw error;
    }
    console.log(`Template deleted: ${filePath}`);
  }

  private filePath(name: string): string {
    return path.join(this.dir, `${templateFileStem(name)}.json`);
  }

  private async readIfExists(filePath: string): Promise<StoredTemplate | null> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
    return parseStoredTemplate(content, filePath);
  }
}
