import type { ClassificationRules } from '../../config/settings';

export type AppRuleMatch = 'work' | 'private' | 'browser' | 'unknown';

export function normalizeAppName(app: string | null | undefined): string {
  return (app ?? '').trim().toLowerCase();
}

/** Case-insensitive substring match of a normalized app name against a rule list. */
export function matchesAny(normalizedApp: string, entries: readonly string[]): boolean {
  if (!normalizedApp) return false;
  return entries.some((entry) => entry.length > 0 && normalizedApp.includes(entry));
}

/**
 * Resolve which rule table an app falls into. Work wins over private, and both
 * win over the browser list.
 */
export function matchAppRule(app: string | null | undefined, rules: ClassificationRules): AppRuleMatch {
  const normalized = normalizeAppName(app);

  if (matchesAny(normalized, rules.workApps)) return 'work';
  if (matchesAny(normalized, rules.privateApps)) return 'private';
  if (matchesAny(normalized, rules.browsers)) return 'browser';
  return 'unknown';
}

/**
 * "<app> - <title>" when both are present, otherwise whichever one is.
 * Returns null when neither carries any text.
 */
export function composeDetails(app: string | null | undefined, title: string | null | undefined): string | null {
  const appText = app?.trim() ?? '';
  const titleText = title?.trim() ?? '';

  if (appText && titleText) return `${appText} - ${titleText}`;
  return titleText || appText || null;
}
