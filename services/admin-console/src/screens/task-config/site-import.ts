import {
  IMPORT_HARD_FAILURE_ERROR_LIMIT,
  IMPORT_WARNING_ERROR_LIMIT,
} from '../../constants/defaults.constants';

const HEADER_TOKENS = new Set(['site url', 'siteurl', 'url', 'site']);
const SURROUNDING_QUOTES = /^["']+|["']+$/g;

export interface SiteImportOutcome {
  imported: string[];
  errors: string[];
}

export type SiteImportReport =
  | { kind: 'failed'; error: string }
  | { kind: 'imported'; status: string; warning?: string };

export function isValidSiteUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === 'http:' || url.protocol === 'https:') && url.host.length > 0;
  } catch {
    return false;
  }
}

export function containsUrl(urls: readonly string[], url: string): boolean {
  const needle = url.toLowerCase();
  return urls.some((existing) => existing.toLowerCase() === needle);
}

/**
 * One or more URLs per line, separated by `,` or `;`. Header cells are skipped, invalid cells are
 * reported by line number, and URLs already known (in `existing` or earlier in the file) are
 * dropped without an error.
 */
export function parseSiteImport(content: string, existing: readonly string[]): SiteImportOutcome {
  const imported: string[] = [];
  const errors: string[] = [];

  content.split(/\r?\n/).forEach((line, index) => {
    if (!line.trim()) return;

    for (const cell of line.split(/[,;]/)) {
      const token = cell.trim().replace(SURROUNDING_QUOTES, '').trim();
      if (!token || HEADER_TOKENS.has(token.toLowerCase())) continue;

      if (!isValidSiteUrl(token)) {
        errors.push(`Line ${index + 1}: Invalid URL '${token}'`);
        continue;
      }
      if (!containsUrl(imported, token) && !containsUrl(existing, token)) {
        imported.push(token);
      }
    }
  });

  return { imported, errors };
}

export function describeSiteImport({ imported, errors }: SiteImportOutcome): SiteImportReport {
  if (errors.length > 0 && imported.length === 0) {
    const shown = errors.slice(0, IMPORT_HARD_FAILURE_ERROR_LIMIT);
    const remaining = errors.length - shown.length;
    const more = remaining > 0 ? `\n...and ${remaining} more` : '';
    return { kind: 'failed', error: `No valid URLs found in file.\n\n${shown.join('\n')}${more}` };
  }

  let status = `Imported ${imported.length} site(s).`;
  if (errors.length === 0) return { kind: 'imported', status };

  status += `\n\n${errors.length} line(s) had errors and were skipped.`;
  const warning = `${status}\n\nErrors:\n${errors.slice(0, IMPORT_WARNING_ERROR_LIMIT).join('\n')}`;
  return { kind: 'imported', status, warning };
}
