/**
 * Template Registry - in-process counterpart of the generated lookup function
 */

import type { TemplateEntry } from '../types.js';

export class TemplateNotFoundError extends Error {
  public templateName: string;

  constructor(templateName: string) {
    super(`Template not found: ${templateName}`);
    this.name = 'TemplateNotFoundError';
    this.templateName = templateName;
  }
}

export class TemplateRegistry<T extends TemplateEntry = TemplateEntry> {
  private templates: Map<string, T> = new Map();

  constructor(entries: Iterable<T> = []) {
    for (const entry of entries) {
      // First match arm wins, so the first entry for a name is the one served
      if (!this.templates.has(entry.name)) {
        this.templates.set(entry.name, entry);
      }
    }
  }

  public has(name: string): boolean {
    return this.templates.has(name);
  }

  public get(name: string): T {
    const entry = this.templates.get(name);
    if (!entry) {
      throw new TemplateNotFoundError(name);
    }
    return entry;
  }

  /**
   * Content of a template, or TemplateNotFoundError for unknown names
   */
  public load(name: string): string {
    return this.get(name).content;
  }

  public names(): string[] {
    return [...this.templates.keys()];
  }

  public get size(): number {
    return this.templates.size;
  }
}
