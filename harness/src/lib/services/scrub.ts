import { readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  ScrubTarget,
  type CallerIdentity,
  type ScrubPlaceholders,
  type ScrubRule,
} from '@fixture-harness/shared';
import { ValidationError } from '../errors.js';

export interface ScrubIdentity {
  accountId: string;
  userId: string;
  localUser: string;
}

export function scrubIdentityOf(identity: CallerIdentity, localUser: string): ScrubIdentity {
  return { accountId: identity.account, userId: identity.userId, localUser };
}

/**
 * Build the substitutions applied to a recording before it is archived.
 *
 * Longest patterns go first so a value that contains another one is replaced
 * whole. A pattern found inside any replacement is rejected: a second pass
 * would rewrite the placeholder itself. So is a pattern containing another
 * target's placeholder.
 */
export function buildScrubRules(identity: ScrubIdentity, placeholders: ScrubPlaceholders): ScrubRule[] {
  const candidates: ScrubRule[] = [
    { target: ScrubTarget.ACCOUNT_ID, pattern: identity.accountId, replacement: placeholders.ACCOUNT_ID },
    { target: ScrubTarget.USER_ID, pattern: identity.userId, replacement: placeholders.USER_ID },
    { target: ScrubTarget.LOCAL_USER, pattern: identity.localUser, replacement: placeholders.LOCAL_USER },
  ];

  const rules = candidates.filter((rule) => rule.pattern !== '' && rule.pattern !== rule.replacement);

  for (const rule of rules) {
    const clash = candidates.find((other) => other.replacement.includes(rule.pattern));
    if (clash) {
      throw new ValidationError(
        `Scrub pattern for ${rule.target} occurs in the ${clash.target} placeholder "${clash.replacement}"`,
        { target: rule.target, placeholder: clash.target }
      );
    }
    // Scrubbing would leave a partial copy of the real value around another placeholder
    const inner = candidates.find(
      (other) => other.target !== rule.target && rule.pattern.includes(other.replacement)
    );
    if (inner) {
      throw new ValidationError(
        `Scrub pattern for ${rule.target} contains the ${inner.target} placeholder "${inner.replacement}"`,
        { target: rule.target, placeholder: inner.target }
      );
    }
  }

  return rules.sort((a, b) => b.pattern.length - a.pattern.length);
}

export function scrubText(text: string, rules: readonly ScrubRule[]): string {
  return rules.reduce((current, rule) => current.split(rule.pattern).join(rule.replacement), text);
}

// Rewrite every file of a directory in place; returns the names that changed
export async function scrubDirectory(dir: string, rules: readonly ScrubRule[]): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const changed: string[] = [];

  for (const entry of entries.filter((e) => e.isFile()).sort((a, b) => a.name.localeCompare(b.name))) {
    const path = join(dir, entry.name);
    const original = await readFile(path, 'utf8');
    const scrubbed = scrubText(original, rules);
    if (scrubbed !== original) {
      await writeFile(path, scrubbed, 'utf8');
      changed.push(entry.name);
    }
  }

  return changed;
}
