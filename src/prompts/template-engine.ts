import { readFileSync, statSync } from 'node:fs';
import path from 'node:path';

import { Liquid, type Template } from 'liquidjs';

export interface LoadedTemplate {
  name: string;
  source: string;
  parsed: Template[];
}

export interface TemplateEngine {
  engine: Liquid;
  templates: Record<string, string>;
}

const INCLUDE_TAG_REGEX = /\{%-?\s*(?:render|include)\s+(['"])([^'"]+)\1[^%]*-?%\}/g;
const INCLUDE_ANY_TAG_REGEX = /\{%-?\s*(render|include)\s+([^%]+)-?%\}/g;
const MAX_INCLUDE_DEPTH = 4;

const assertStaticIncludes = (source: string, filePath: string): void => {
  Array.from(source.matchAll(INCLUDE_ANY_TAG_REGEX)).forEach((match) => {
    const args = typeof match[2] === 'string' ? match[2].trim() : '';
    if (args.startsWith('"') || args.startsWith("'")) return;
    throw new Error(`${filePath}: include/render must use a static quoted path: ${match[0].trim()}`);
  });
};

const toPosixPath = (value: string): string => value.split(path.sep).join('/');

export const templateKeyFromFilePath = (rootDir: string, filePath: string): string => {
  const normalized = toPosixPath(path.relative(rootDir, filePath));
  if (normalized.length === 0 || normalized.startsWith('..')) {
    throw new Error(`template ${filePath} lies outside ${rootDir}`);
  }
  return normalized;
};

const includedFiles = (source: string, filePath: string): string[] => {
  assertStaticIncludes(source, filePath);
  return Array.from(source.matchAll(INCLUDE_TAG_REGEX)).map((match) => {
    const resolved = path.resolve(path.dirname(filePath), match[2].trim());
    const stat = statSync(resolved, { throwIfNoEntry: false });
    if (stat?.isFile() !== true) {
      throw new Error(`${filePath}: included template not found: ${match[2]}`);
    }
    return resolved;
  });
};

/**
 * Read the entry templates and everything they render, keyed by path
 * relative to `rootDir`. Templates are read once, at load time.
 */
export const collectTemplateSources = (rootDir: string, entryFiles: readonly string[]): Record<string, string> => {
  const templates: Record<string, string> = {};
  const visit = (filePath: string, depth: number): void => {
    const key = templateKeyFromFilePath(rootDir, filePath);
    if (Object.prototype.hasOwnProperty.call(templates, key)) return;
    if (depth > MAX_INCLUDE_DEPTH) {
      throw new Error(`maximum include depth (${String(MAX_INCLUDE_DEPTH)}) exceeded at ${filePath}`);
    }
    const source = readFileSync(filePath, 'utf-8');
    templates[key] = source;
    includedFiles(source, filePath).forEach((resolved) => { visit(resolved, depth + 1); });
  };
  entryFiles.forEach((entry) => { visit(path.resolve(rootDir, entry), 0); });
  return templates;
};

export const createTemplateEngine = (templates: Record<string, string>): TemplateEngine => {
  const engine = new Liquid({
    templates,
    extname: '',
    cache: false,
    strictFilters: true,
    strictVariables: true,
  });
  return { engine, templates };
};

export const loadTemplate = (templateEngine: TemplateEngine, templateKey: string): LoadedTemplate => {
  if (!Object.prototype.hasOwnProperty.call(templateEngine.templates, templateKey)) {
    throw new Error(`template source missing for key: ${templateKey}`);
  }
  return {
    name: templateKey,
    source: templateEngine.templates[templateKey],
    parsed: templateEngine.engine.parseFileSync(templateKey),
  };
};

export const renderTemplate = (
  templateEngine: TemplateEngine,
  template: LoadedTemplate,
  context: Record<string, unknown>,
): string => {
  const rendered: unknown = templateEngine.engine.renderSync(template.parsed, context);
  return typeof rendered === 'string' ? rendered : String(rendered);
};
