/**
 * Skill Activation Feature
 *
 * Matches the user's prompt against skill-rules.json and tells the model
 * which skills to load before it answers.
 *
 * The prompt goes through four stages:
 *   1. Sanitize — strip code blocks, URLs, paths
 *   2. Match    — keywords (substring) then intent patterns (regex)
 *   3. Group    — by priority: critical, high, medium, low
 *   4. Build    — format the banner injected as additionalContext
 *
 * Stateless: nothing here reads or writes the session cache.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { isPlainObject } from '../config/loader.js';
import type {
  PluginConfig,
  SkillMatch,
  SkillPriority,
  SkillRule,
  SkillRules,
  UserPromptSubmitOutput,
} from '../shared/types.js';

const PRIORITIES: readonly SkillPriority[] = ['critical', 'high', 'medium', 'low'];

const PRIORITY_HEADINGS: Record<SkillPriority, string> = {
  critical: '⚠️ CRITICAL SKILLS (REQUIRED):',
  high: '📚 RECOMMENDED SKILLS:',
  medium: '💡 SUGGESTED SKILLS:',
  low: '📌 OPTIONAL SKILLS:',
};

const RULE = '━'.repeat(45);

// ---------------------------------------------------------------------------
// Rule loading
// ---------------------------------------------------------------------------

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isSkillPriority(value: unknown): value is SkillPriority {
  return PRIORITIES.some((p) => p === value);
}

/**
 * Validate one rule. Rules with an unknown priority are dropped; unknown
 * type or enforcement fall back to "domain" / "suggest".
 */
export function parseSkillRule(value: unknown): SkillRule | null {
  if (!isPlainObject(value)) return null;
  const priority = value.priority;
  if (!isSkillPriority(priority)) return null;

  const { enforcement, description, promptTriggers } = value;
  const rule: SkillRule = {
    type: value.type === 'guardrail' ? 'guardrail' : 'domain',
    enforcement:
      enforcement === 'block' || enforcement === 'warn' ? enforcement : 'suggest',
    priority,
  };
  if (typeof description === 'string') rule.description = description;

  if (isPlainObject(promptTriggers)) {
    const { keywords, intentPatterns } = promptTriggers;
    rule.promptTriggers = {
      keywords: isStringArray(keywords) ? keywords : undefined,
      intentPatterns: isStringArray(intentPatterns) ? intentPatterns : undefined,
    };
  }
  return rule;
}

/**
 * Load rules from a JSON file.
 * Returns null if the file doesn't exist, can't be parsed, or has no skills object.
 */
export function loadSkillRulesFromFile(filePath: string): SkillRules | null {
  try {
    if (!existsSync(filePath)) return null;
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
    if (!isPlainObject(parsed)) return null;
    const { version, skills: rawSkills } = parsed;
    if (!isPlainObject(rawSkills)) return null;

    const skills: Record<string, SkillRule> = {};
    for (const [name, raw] of Object.entries(rawSkills)) {
      const rule = parseSkillRule(raw);
      if (rule) skills[name] = rule;
    }
    return {
      version: typeof version === 'string' ? version : '1.0',
      skills,
    };
  } catch {
    return null;
  }
}

/** Load the project's rules file named in config. */
export function loadSkillRules(config: PluginConfig): SkillRules | null {
  if (!config.projectRoot) return null;
  const relative = config.skillRulesFile ?? join('.claude', 'skills', 'skill-rules.json');
  return loadSkillRulesFromFile(join(config.projectRoot, relative));
}

/**
 * Replace a skill's keywords with the ones configured under skillKeywords.
 */
export function applyKeywordOverrides(
  rules: SkillRules,
  overrides?: Record<string, string[]>
): SkillRules {
  if (!overrides) return rules;

  const skills: Record<string, SkillRule> = {};
  for (const [name, rule] of Object.entries(rules.skills)) {
    const keywords = overrides[name];
    skills[name] = keywords
      ? { ...rule, promptTriggers: { ...rule.promptTriggers, keywords } }
      : rule;
  }
  return { ...rules, skills };
}

// ---------------------------------------------------------------------------
// Prompt sanitization
// ---------------------------------------------------------------------------

/**
 * Remove content that tends to produce false matches: fenced and inline
 * code, URLs, multi-segment paths, XML-style tags.
 */
export function sanitizePrompt(prompt: string): string {
  return prompt
    .replace(/```[\s\S]*?```/g, '')
    .replace(/`[^`]+`/g, '')
    .replace(/https?:\/\/\S+/g, '')
    .replace(/(?:\.?\/[\w.-]+){2,}/g, '')
    .replace(/<[^>]+>/g, '');
}

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

function compilePattern(pattern: string): RegExp | null {
  try {
    return new RegExp(pattern, 'i');
  } catch {
    return null;
  }
}

/**
 * Match a prompt against every rule. A keyword hit takes precedence over an
 * intent hit for the same skill. Results keep the rule file's order.
 */
export function matchSkills(prompt: string, rules: SkillRules): SkillMatch[] {
  const text = sanitizePrompt(prompt).toLowerCase();
  const matches: SkillMatch[] = [];

  for (const [name, rule] of Object.entries(rules.skills)) {
    const keywords = rule.promptTriggers?.keywords ?? [];
    if (keywords.some((kw) => kw.length > 0 && text.includes(kw.toLowerCase()))) {
      matches.push({ name, rule, matchType: 'keyword' });
      continue;
    }

    const patterns = rule.promptTriggers?.intentPatterns ?? [];
    if (patterns.some((p) => compilePattern(p)?.test(text) ?? false)) {
      matches.push({ name, rule, matchType: 'intent' });
    }
  }

  return matches;
}

/** Group matches by priority, highest first. Empty groups are left out. */
export function groupByPriority(
  matches: SkillMatch[]
): Array<{ priority: SkillPriority; matches: SkillMatch[] }> {
  return PRIORITIES.map((priority) => ({
    priority,
    matches: matches.filter((m) => m.rule.priority === priority),
  })).filter((g) => g.matches.length > 0);
}

// ---------------------------------------------------------------------------
// Output building
// ---------------------------------------------------------------------------

export function formatBanner(matches: SkillMatch[]): string {
  const lines: string[] = [RULE, '🎯 SKILL ACTIVATION CHECK', RULE, ''];

  for (const group of groupByPriority(matches)) {
    lines.push(PRIORITY_HEADINGS[group.priority]);
    for (const m of group.matches) {
      lines.push(`  → ${m.name}`);
    }
    lines.push('');
  }

  lines.push('ACTION: Use Skill tool BEFORE responding');
  lines.push(RULE);
  return lines.join('\n');
}

export function buildSkillOutput(matches: SkillMatch[]): UserPromptSubmitOutput {
  if (matches.length === 0) {
    return { continue: true };
  }
  return {
    continue: true,
    hookSpecificOutput: {
      hookEventName: 'UserPromptSubmit',
      additionalContext: formatBanner(matches),
    },
  };
}

// ---------------------------------------------------------------------------
// Main processor (called by the CLI)
// ---------------------------------------------------------------------------

/**
 * Process a prompt through the skill rules.
 *
 * @param rules - Pre-loaded rules; read from the project when omitted
 */
export function processPrompt(
  prompt: string,
  config: PluginConfig,
  rules?: SkillRules | null
): UserPromptSubmitOutput {
  if (config.features?.skillActivation === false) {
    return { continue: true };
  }

  const loaded = rules === undefined ? loadSkillRules(config) : rules;
  if (!loaded) {
    return { continue: true };
  }

  const effective = applyKeywordOverrides(loaded, config.skillKeywords);
  return buildSkillOutput(matchSkills(prompt, effective));
}
