import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import {
  loadSkillRulesFromFile,
  loadSkillRules,
  parseSkillRule,
  applyKeywordOverrides,
  sanitizePrompt,
  matchSkills,
  groupByPriority,
  formatBanner,
  buildSkillOutput,
  processPrompt,
} from '../features/skill-activation.js';
import { DEFAULT_CONFIG } from '../config/loader.js';
import type { SkillRules } from '../shared/types.js';

// ---------------------------------------------------------------------------
// Test fixtures — rules used across tests
// ---------------------------------------------------------------------------

const TEST_RULES: SkillRules = {
  version: '1.0',
  skills: {
    'backend-guidelines': {
      type: 'domain',
      enforcement: 'suggest',
      priority: 'high',
      promptTriggers: {
        keywords: ['controller', 'route handler'],
        intentPatterns: ['(create|add).*?endpoint'],
      },
    },
    'db-guard': {
      type: 'guardrail',
      enforcement: 'block',
      priority: 'critical',
      promptTriggers: { keywords: ['migration'] },
    },
    'style-tips': {
      type: 'domain',
      enforcement: 'suggest',
      priority: 'low',
      promptTriggers: { intentPatterns: ['\\bstyl(e|ing)\\b', '(unclosed'] },
    },
  },
};

const RULE = '━'.repeat(45);

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

describe('parseSkillRule', () => {
  it('should drop rules with an unknown priority', () => {
    expect(parseSkillRule({ priority: 'urgent' })).toBeNull();
    expect(parseSkillRule('high')).toBeNull();
  });

  it('should default type and enforcement', () => {
    expect(parseSkillRule({ priority: 'medium' })).toEqual({
      type: 'domain',
      enforcement: 'suggest',
      priority: 'medium',
    });
  });

  it('should drop trigger lists that are not string arrays', () => {
    const rule = parseSkillRule({
      priority: 'low',
      promptTriggers: { keywords: 'deploy', intentPatterns: ['ship'] },
    });
    expect(rule?.promptTriggers).toEqual({ keywords: undefined, intentPatterns: ['ship'] });
  });
});

describe('loadSkillRulesFromFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'bit-skills-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load rules from a JSON file', () => {
    const filePath = join(tempDir, 'skill-rules.json');
    writeFileSync(filePath, JSON.stringify(TEST_RULES));

    const rules = loadSkillRulesFromFile(filePath);
    expect(Object.keys(rules?.skills ?? {})).toEqual([
      'backend-guidelines',
      'db-guard',
      'style-tips',
    ]);
  });

  it('should return null for nonexistent file', () => {
    expect(loadSkillRulesFromFile(join(tempDir, 'nope.json'))).toBeNull();
  });

  it('should return null for invalid JSON', () => {
    const filePath = join(tempDir, 'bad.json');
    writeFileSync(filePath, 'not json{{{');
    expect(loadSkillRulesFromFile(filePath)).toBeNull();
  });

  it('should return null without a skills object', () => {
    const filePath = join(tempDir, 'list.json');
    writeFileSync(filePath, '{ "skills": [] }');
    expect(loadSkillRulesFromFile(filePath)).toBeNull();
  });
});

describe('loadSkillRules', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'bit-skills-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read the rules file under the project root', () => {
    mkdirSync(join(tempDir, '.claude', 'skills'), { recursive: true });
    writeFileSync(
      join(tempDir, '.claude', 'skills', 'skill-rules.json'),
      JSON.stringify(TEST_RULES)
    );

    const rules = loadSkillRules({ ...DEFAULT_CONFIG, projectRoot: tempDir });
    expect(rules?.version).toBe('1.0');
  });

  it('should return null without a project root', () => {
    expect(loadSkillRules(DEFAULT_CONFIG)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

describe('sanitizePrompt', () => {
  it('should strip code, URLs and paths', () => {
    const prompt = 'fix `migration` in ./db/migrations/001.sql see https://example.com/migration';
    expect(sanitizePrompt(prompt)).toBe('fix  in  see ');
  });
});

describe('matchSkills', () => {
  it('should match keywords case-insensitively', () => {
    const matches = matchSkills('Write a new MIGRATION for users', TEST_RULES);
    expect(matches.map((m) => [m.name, m.matchType])).toEqual([['db-guard', 'keyword']]);
  });

  it('should match intent patterns', () => {
    const matches = matchSkills('please create a health endpoint', TEST_RULES);
    expect(matches.map((m) => [m.name, m.matchType])).toEqual([
      ['backend-guidelines', 'intent'],
    ]);
  });

  it('should prefer a keyword hit over an intent hit', () => {
    const matches = matchSkills('add a controller for the users endpoint', TEST_RULES);
    expect(matches.map((m) => m.matchType)).toEqual(['keyword']);
  });

  it('should skip invalid patterns and keep valid ones', () => {
    const matches = matchSkills('tweak the styling of the header', TEST_RULES);
    expect(matches.map((m) => m.name)).toEqual(['style-tips']);
  });

  it('should ignore keywords that only appear in code', () => {
    expect(matchSkills('look at ```run migration now```', TEST_RULES)).toEqual([]);
  });

  it('should return nothing for an unrelated prompt', () => {
    expect(matchSkills('what time is it', TEST_RULES)).toEqual([]);
  });
});

describe('applyKeywordOverrides', () => {
  it('should replace keywords and keep intent patterns', () => {
    const rules = applyKeywordOverrides(TEST_RULES, { 'backend-guidelines': ['api'] });
    expect(rules.skills['backend-guidelines'].promptTriggers).toEqual({
      keywords: ['api'],
      intentPatterns: ['(create|add).*?endpoint'],
    });
    expect(rules.skills['db-guard']).toBe(TEST_RULES.skills['db-guard']);
  });

  it('should return the rules unchanged without overrides', () => {
    expect(applyKeywordOverrides(TEST_RULES)).toBe(TEST_RULES);
  });
});

describe('groupByPriority', () => {
  it('should order groups critical first and drop empty ones', () => {
    const matches = matchSkills('add a controller, a migration and some styling', TEST_RULES);
    expect(groupByPriority(matches).map((g) => g.priority)).toEqual(['critical', 'high', 'low']);
  });
});

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

describe('formatBanner', () => {
  it('should list matches under their priority heading', () => {
    const banner = formatBanner(matchSkills('new migration and controller', TEST_RULES));
    expect(banner.split('\n')).toEqual([
      RULE,
      '🎯 SKILL ACTIVATION CHECK',
      RULE,
      '',
      '⚠️ CRITICAL SKILLS (REQUIRED):',
      '  → db-guard',
      '',
      '📚 RECOMMENDED SKILLS:',
      '  → backend-guidelines',
      '',
      'ACTION: Use Skill tool BEFORE responding',
      RULE,
    ]);
  });
});

describe('buildSkillOutput', () => {
  it('should continue without context when nothing matched', () => {
    expect(buildSkillOutput([])).toEqual({ continue: true });
  });

  it('should inject the banner as UserPromptSubmit context', () => {
    const matches = matchSkills('run the migration', TEST_RULES);
    const output = buildSkillOutput(matches);
    expect(output.hookSpecificOutput?.hookEventName).toBe('UserPromptSubmit');
    expect(output.hookSpecificOutput?.additionalContext).toBe(formatBanner(matches));
  });
});

describe('processPrompt', () => {
  it('should respect the feature toggle', () => {
    const config = { ...DEFAULT_CONFIG, features: { skillActivation: false } };
    expect(processPrompt('run the migration', config, TEST_RULES)).toEqual({ continue: true });
  });

  it('should continue when no rules are available', () => {
    expect(processPrompt('run the migration', DEFAULT_CONFIG, null)).toEqual({ continue: true });
  });

  it('should apply configured keyword overrides', () => {
    const config = { ...DEFAULT_CONFIG, skillKeywords: { 'db-guard': ['schema change'] } };
    expect(processPrompt('run the migration', config, TEST_RULES)).toEqual({ continue: true });

    const output = processPrompt('a schema change is needed', config, TEST_RULES);
    expect(output.hookSpecificOutput?.additionalContext).toContain('  → db-guard');
  });
});
