import fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { QueryConfigSchema, type QueryConfig, type QueryConfigInput } from './config.js';
import { templateLogger } from '../utils/logger.js';

export interface TemplateSummary {
  name: string;
}

/** Named query configurations. Kept outside the core so it never touches the filesystem itself. */
export interface TemplateStore {
  get(name: string): QueryConfig | undefined;
  put(name: string, config: QueryConfigInput): void;
  delete(name: string): boolean;
  listAll(): TemplateSummary[];
}

const byName = (a: TemplateSummary, b: TemplateSummary) => a.name.localeCompare(b.name);

export class InMemoryTemplateStore implements TemplateStore {
  private templates = new Map<string, QueryConfig>();

  get(name: string): QueryConfig | undefined {
    const stored = this.templates.get(name);
    // parse again so callers get their own copy
    return stored && QueryConfigSchema.parse(stored);
  }

  put(name: string, config: QueryConfigInput): void {
    this.templates.set(name, QueryConfigSchema.parse(config));
  }

  delete(name: string): boolean {
    return this.templates.delete(name);
  }

  listAll(): TemplateSummary[] {
    return Array.from(this.templates.keys(), (name) => ({ name })).sort(byName);
  }
}

/** Keeps letters, digits, spaces, `-` and `_`. */
export function safeTemplateName(name: string): string {
  return Array.from(name)
    .filter((c) => /[\p{L}\p{N} _-]/u.test(c))
    .join('')
    .trim();
}

const TemplateHeaderSchema = z.object({ name: z.string() });

/**
 * One `<safe name>.json` file per template holding `{ name, ...config }`.
 */
export class FileTemplateStore implements TemplateStore {
  constructor(private readonly dir: string) {
    fs.ensureDirSync(dir);
  }

  private fileFor(name: string): string | undefined {
    const safe = safeTemplateName(name);
    return safe ? path.join(this.dir, `${safe}.json`) : undefined;
  }

  get(name: string): QueryConfig | undefined {
    const file = this.fileFor(name);
    if (!file || !fs.pathExistsSync(file)) return undefined;
    return QueryConfigSchema.parse(fs.readJsonSync(file));
  }

  put(name: string, config: QueryConfigInput): void {
    const file = this.fileFor(name);
    if (!file) {
      throw new Error(`Template name '${name}' has no usable characters (letters, digits, space, - or _)`);
    }
    fs.writeJsonSync(file, { name, ...QueryConfigSchema.parse(config) }, { spaces: 2 });
    templateLogger.info('Template saved', { name, file });
  }

  delete(name: string): boolean {
    const file = this.fileFor(name);
    if (!file || !fs.pathExistsSync(file)) return false;
    fs.removeSync(file);
    templateLogger.info('Template deleted', { name });
    return true;
  }

  listAll(): TemplateSummary[] {
    const templates: TemplateSummary[] = [];
    for (const entry of fs.readdirSync(this.dir)) {
      if (!entry.endsWith('.json')) continue;
      const file = path.join(this.dir, entry);
      try {
        const header = TemplateHeaderSchema.safeParse(fs.readJsonSync(file));
        templates.push({ name: header.success ? header.data.name : path.basename(entry, '.json') });
      } catch (error) {
        templateLogger.warn(`Skipping unreadable template file: ${file}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return templates.sort(byName);
  }
}
