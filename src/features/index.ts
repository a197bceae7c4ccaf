/**
 * Features Module
 *
 * Each feature is a self-contained module that plugs into the hook system.
 */

export {
  loadSkillRules,
  loadSkillRulesFromFile,
  parseSkillRule,
  applyKeywordOverrides,
  sanitizePrompt,
  matchSkills,
  groupByPriority,
  formatBanner,
  buildSkillOutput,
  processPrompt,
} from './skill-activation.js';
