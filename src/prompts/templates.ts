import { fileURLToPath } from 'node:url';

import type { LoadedTemplate, TemplateEngine } from './template-engine.js';
import type { WorkingStepKind } from '../types.js';

import { collectTemplateSources, createTemplateEngine, loadTemplate, renderTemplate } from './template-engine.js';

const PROMPTS_DIR = fileURLToPath(new URL('.', import.meta.url));

const TEMPLATE_FILES = {
  system: 'system.md',
  UNDERSTAND: 'understand.md',
  PLAN: 'plan.md',
  EXECUTE: 'execute.md',
  VERIFY: 'verify.md',
} as const;

type TemplateKey = keyof typeof TEMPLATE_FILES;

const TEMPLATE_KEYS: readonly TemplateKey[] = ['system', 'UNDERSTAND', 'PLAN', 'EXECUTE', 'VERIFY'];

export interface StepPromptContext {
  UNDERSTAND: { task: string };
  PLAN: { task: string; understanding: string };
  EXECUTE: { task: string; plan: string; feedback: string; previous_attempt: number };
  VERIFY: { task: string; result: string };
}

const TEMPLATE_SOURCES = collectTemplateSources(PROMPTS_DIR, Object.values(TEMPLATE_FILES));
const PROMPT_ENGINE: TemplateEngine = createTemplateEngine(TEMPLATE_SOURCES);

const TEMPLATE_REGISTRY = new Map<TemplateKey, LoadedTemplate>(
  TEMPLATE_KEYS.map((key) => [key, loadTemplate(PROMPT_ENGINE, TEMPLATE_FILES[key])])
);

const render = (key: TemplateKey, context: Record<string, unknown>): string => {
  const template = TEMPLATE_REGISTRY.get(key);
  if (template === undefined) throw new Error(`prompt template '${key}' is not loaded`);
  return renderTemplate(PROMPT_ENGINE, template, context).trim();
};

export const renderSystemPrompt = (): string => render('system', {});

export const renderStepPrompt = <K extends WorkingStepKind>(step: K, context: StepPromptContext[K]): string => (
  render(step, { ...context })
);
