import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { FieldDefinition, PatternRule, Template } from '../types/template.types';
import { defaultNormalizerFor, isNormalizerId } from './extraction/normalizers';
import { TemplateError, errorMessage } from '../utils/errors';

const ALLOWED_FLAGS = /^[imsu]*$/;
const DEFAULT_FLAGS = 'im';

const patternRuleSchema = z.object({
  regex: z.string().min(1),
  priority: z.number().int(),
  group: z.number().int().min(0).optional(),
  normalizer: z.string().optional(),
  flags: z.string().optional(),
});

const fieldSchema = z.object({
  key: z.string().min(1),
  label: z.string().optional(),
  type: z.enum(['text', 'date', 'currency', 'composite']).default('text'),
  description: z.string().optional(),
  patterns: z.array(patternRuleSchema).min(1),
});

const templateSchema = z.object({
  template_id: z.string().optional(),
  description: z.string().optional(),
  fields: z.array(fieldSchema).min(1),
});

export type TemplateDefinition = z.input<typeof templateSchema>;

function countCaptureGroups(source: string, flags: string): number {
  // an empty alternative always matches, exposing every group slot
  const probe = new RegExp(`${source}|`, flags).exec('');
  return probe ? probe.length - 1 : 0;
}

function compileRule(
  fieldKey: string,
  fieldType: FieldDefinition['type'],
  rule: z.infer<typeof patternRuleSchema>,
  issues: string[]
): Omit<PatternRule, 'rank'> | null {
  const flags = rule.flags ?? DEFAULT_FLAGS;
  if (!ALLOWED_FLAGS.test(flags)) {
    issues.push(`${fieldKey}: unsupported regex flags "${flags}"`);
    return null;
  }

  let groupCount: number;
  let matcher: RegExp;
  try {
    matcher = new RegExp(rule.regex, `${flags}gd`);
    groupCount = countCaptureGroups(rule.regex, flags);
  } catch (error) {
    issues.push(`${fieldKey}: pattern /${rule.regex}/ does not compile (${errorMessage(error)})`);
    return null;
  }

  const group = rule.group ?? (groupCount > 0 ? 1 : 0);
  if (group > groupCount) {
    issues.push(`${fieldKey}: group ${group} exceeds the ${groupCount} group(s) of /${rule.regex}/`);
    return null;
  }

  const normalizer = rule.normalizer ?? defaultNormalizerFor(fieldType);
  if (!isNormalizerId(normalizer)) {
    issues.push(`${fieldKey}: unknown normalizer "${normalizer}"`);
    return null;
  }

  return {
    source: rule.regex,
    flags,
    priority: rule.priority,
    group,
    normalizer,
    matcher,
  };
}

/**
 * Validates a parsed template definition and compiles every pattern once.
 * Collects all problems before throwing so a broken file is fixed in one pass.
 */
export function compileTemplate(definition: unknown, fallbackId = 'template'): Template {
  const parsed = templateSchema.safeParse(definition);
  if (!parsed.success) {
    throw new TemplateError(
      'Template definition is malformed',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const issues: string[] = [];
  const seenKeys = new Set<string>();
  const fields: FieldDefinition[] = [];

  for (const rawField of parsed.data.fields) {
    if (seenKeys.has(rawField.key)) {
      issues.push(`duplicate field key "${rawField.key}"`);
      continue;
    }
    seenKeys.add(rawField.key);

    const priorities = new Set<number>();
    const rules: Omit<PatternRule, 'rank'>[] = [];
    for (const rawRule of rawField.patterns) {
      if (priorities.has(rawRule.priority)) {
        issues.push(`${rawField.key}: priority ${rawRule.priority} is used by more than one pattern`);
        continue;
      }
      priorities.add(rawRule.priority);

      const rule = compileRule(rawField.key, rawField.type, rawRule, issues);
      if (rule) rules.push(rule);
    }

    const ranked = rules
      .sort((a, b) => b.priority - a.priority)
      .map((rule, rank): PatternRule => Object.freeze({ ...rule, rank }));

    fields.push(
      Object.freeze({
        key: rawField.key,
        label: rawField.label ?? rawField.key,
        type: rawField.type,
        description: rawField.description ?? '',
        rules: Object.freeze(ranked),
      })
    );
  }

  if (issues.length > 0) {
    throw new TemplateError('Template failed validation', issues);
  }

  return Object.freeze({
    id: parsed.data.template_id ?? fallbackId,
    description: parsed.data.description ?? '',
    fields: Object.freeze(fields),
  });
}

export async function loadTemplate(filePath: string): Promise<Template> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new TemplateError(`Template file cannot be read: ${filePath} (${errorMessage(error)})`);
  }

  let definition: unknown;
  try {
    definition = JSON.parse(content);
  } catch (error) {
    throw new TemplateError(`Template file is not valid JSON: ${filePath} (${errorMessage(error)})`);
  }

  const template = compileTemplate(definition, path.basename(filePath, path.extname(filePath)));
  console.log(`[Template] Loaded ${template.id} with ${template.fields.length} fields`);
  return template;
}
