import fs from 'fs';
import path from 'path';
import Mustache from 'mustache';
import { findPackageRoot } from './paths.js';

export type TemplateData = Record<string, string | number | boolean>;

export interface ITemplateRenderer {
  render(templateName: string, data: TemplateData): string;
}

/**
 * Renders the configuration files written to the target host from
 * templates/<name>.mustache. Values are inserted verbatim: these are config
 * files, not HTML.
 */
export class TemplateManager implements ITemplateRenderer {
  private static instance: TemplateManager | undefined;
  private cache = new Map<string, string>();

  constructor(private templateDir: string = path.join(findPackageRoot(), 'templates')) {}

  public static getInstance(): TemplateManager {
    if (!TemplateManager.instance) {
      TemplateManager.instance = new TemplateManager();
    }
    return TemplateManager.instance;
  }

  public render(templateName: string, data: TemplateData): string {
    return Mustache.render(this.load(templateName), data, {}, {
      escape: (value: unknown) => String(value),
    });
  }

  private load(templateName: string): string {
    const cached = this.cache.get(templateName);
    if (cached !== undefined) {
      return cached;
    }

    const filePath = path.join(this.templateDir, `${templateName}.mustache`);
    if (!fs.existsSync(filePath)) {
      throw new Error(`Template not found: ${filePath}`);
    }
    const template = fs.readFileSync(filePath, 'utf-8');
    this.cache.set(templateName, template);
    return template;
  }
}
