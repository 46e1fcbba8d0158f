/**
 * Static, pre-execution SQL check.
 *
 * This is a keyword screen, not a parser: obfuscated destructive SQL can get
 * through. Database permissions are the real boundary.
 */

import type { ValidationCategory, ValidationOutcome } from '../types/models.js';

export const ALLOWED_VERBS = ['SELECT', 'INSERT', 'UPDATE', 'DELETE', 'WITH'] as const;

export const DESTRUCTIVE_KEYWORDS = ['DROP', 'TRUNCATE', 'ALTER', 'GRANT', 'REVOKE'] as const;

const LEADING_VERB = new RegExp(`^(${ALLOWED_VERBS.join('|')})\\b`, 'i');

const DESTRUCTIVE_PATTERN = new RegExp(`\\b(${DESTRUCTIVE_KEYWORDS.join('|')})\\b`, 'i');

/**
 * Blank out string literals, quoted identifiers and comments so the verb and
 * parenthesis checks only see SQL structure. Quote characters are kept,
 * offsets preserved.
 */
export function maskLiterals(sql: string): string {
  let out = '';
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (ch === '-' && next === '-') {
      const end = sql.indexOf('\n', i);
      const stop = end === -1 ? sql.length : end;
      out += ' '.repeat(stop - i);
      i = stop;
      continue;
    }

    if (ch === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2);
      const stop = end === -1 ? sql.length : end + 2;
      out += ' '.repeat(stop - i);
      i = stop;
      continue;
    }

    if (ch === "'" || ch === '"') {
      out += ch;
      i++;
      while (i < sql.length) {
        if (sql[i] === ch) {
          // Doubled quote is an escaped quote inside the literal
          if (sql[i + 1] === ch) {
            out += '  ';
            i += 2;
            continue;
          }
          break;
        }
        out += ' ';
        i++;
      }
      if (i < sql.length) {
        out += ch;
        i++;
      }
      continue;
    }

    out += ch;
    i++;
  }

  return out;
}

function fail(category: ValidationCategory, reason: string): ValidationOutcome {
  return { passed: false, reason, category };
}

function hasBalancedParentheses(sql: string): boolean {
  let depth = 0;
  for (const ch of sql) {
    if (ch === '(') depth++;
    if (ch === ')') depth--;
    if (depth < 0) return false;
  }
  return depth === 0;
}

/**
 * Validate a SQL statement before execution.
 *
 * Checks run in order: emptiness, destructive keywords, leading verb,
 * parenthesis balance. The denylist reads the raw text, literals and
 * comments included. Deterministic and free of side effects.
 */
export function validateSql(sqlText: string): ValidationOutcome {
  if (!sqlText || !sqlText.trim()) {
    return fail('EMPTY_INPUT', 'Empty SQL query');
  }

  const destructive = DESTRUCTIVE_PATTERN.exec(sqlText);
  if (destructive) {
    return fail(
      'DESTRUCTIVE_OPERATION',
      `Statement contains destructive keyword: ${destructive[1].toUpperCase()}`
    );
  }

  const masked = maskLiterals(sqlText).trim();

  if (!LEADING_VERB.test(masked)) {
    return fail(
      'SYNTAX',
      `Statement must start with one of ${ALLOWED_VERBS.join(', ')}`
    );
  }

  if (!hasBalancedParentheses(masked)) {
    return fail('SYNTAX', 'Unbalanced parentheses detected');
  }

  return { passed: true, reason: null, category: null };
}
