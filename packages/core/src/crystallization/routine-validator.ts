import vm from 'node:vm';
import type { RoutineArtifact, ValidationIssue } from '@cairn/shared';

interface DenylistRule {
  pattern: RegExp;
  message: string;
}

/** Operations a routine may never reach for. Checked against code with string literals blanked. */
const DENYLIST: DenylistRule[] = [
  { pattern: /\beval\s*\(/, message: 'eval() call' },
  { pattern: /\bFunction\s*\(/, message: 'Function constructor' },
  { pattern: /\.constructor\b/, message: 'constructor access' },
  { pattern: /\brequire\b/, message: 'require reference' },
  { pattern: /\bimport\s*\(/, message: 'dynamic import()' },
  { pattern: /\bimport\s+[\w{*]/, message: 'static import' },
  { pattern: /\bprocess\b/, message: 'process reference' },
  { pattern: /\bchild_process\b/, message: 'child_process reference' },
  { pattern: /\bglobalThis\b/, message: 'globalThis reference' },
  { pattern: /\bglobal\b/, message: 'global reference' },
  { pattern: /__proto__/, message: '__proto__ access' },
  { pattern: /\bprototype\b/, message: 'prototype access' },
  { pattern: /\bfetch\s*\(/, message: 'fetch() call' },
  { pattern: /\bsetInterval\s*\(/, message: 'setInterval() call' },
  { pattern: /\bwhile\s*\(\s*true\s*\)/, message: 'while(true) loop' },
  { pattern: /\bfor\s*\(\s*;\s*;\s*\)/, message: 'for(;;) loop' },
];

const STRING_LITERAL = /"(?:[^"\\\n]|\\.)*"|'(?:[^'\\\n]|\\.)*'/g;

/** Structural pass/fail checks on a routine before it is registered. */
export class RoutineValidator {
  validate(artifact: RoutineArtifact): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const source = artifact.source.trim();

    if (source.length === 0) {
      return [{ category: 'shape', message: 'Routine source is empty' }];
    }

    try {
      new vm.Script(`(${source})`, { filename: `${artifact.goalKey}.check.js` });
    } catch (err) {
      issues.push({ category: 'syntax', message: err instanceof Error ? err.message : String(err) });
    }

    if (!/^(async\s+)?(function\b|\([^)]*\)\s*=>|[\w$]+\s*=>)/.test(source)) {
      issues.push({ category: 'shape', message: 'Routine must be a function expression' });
    }

    const code = source.replace(STRING_LITERAL, '""');
    if (code.includes('`')) {
      issues.push({ category: 'denylist', message: 'template literals are not allowed' });
    }
    for (const rule of DENYLIST) {
      if (rule.pattern.test(code)) {
        issues.push({ category: 'denylist', message: rule.message });
      }
    }

    return issues;
  }
}
