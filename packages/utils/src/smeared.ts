export const LogsDiagnosticDataPolicy = {
  CONCEAL: 'conceal',
  DISCLOSE: 'disclose',
} as const;

export type LogsDiagnosticDataPolicy =
  (typeof LogsDiagnosticDataPolicy)[keyof typeof LogsDiagnosticDataPolicy];

/**
 * Masks alphanumeric characters, keeping the last `leaveOver` characters readable.
 * Returns `[Smeared]` when fewer than three characters would be masked.
 *
 * @example
 * smear('finance'); // "***ance"
 * smear('abc');     // "[Smeared]"
 */
export function smear(text: string | null | undefined, leaveOver = 4): string {
  if (text === undefined || text === null) {
    return '__erroneous__';
  }
  if (text.length - leaveOver < 3) return '[Smeared]';

  const visible = text.slice(text.length - leaveOver);
  const masked = text.slice(0, text.length - leaveOver).replaceAll(/[a-zA-Z0-9_]/g, '*');
  return `${masked}${visible}`;
}

export function isSmearingActive(): boolean {
  return process.env.LOGS_DIAGNOSTICS_DATA_POLICY !== LogsDiagnosticDataPolicy.DISCLOSE;
}

/**
 * Keeps scheme and host of a site URL and smears every path segment after the managed path,
 * e.g. `https://contoso.sharepoint.com/sites/***ance`.
 */
export function smearSiteUrl(siteUrl: string, active = isSmearingActive()): string {
  if (!active) return siteUrl;

  let url: URL;
  try {
    url = new URL(siteUrl);
  } catch {
    return smear(siteUrl);
  }

  const segments = url.pathname.split('/').filter((segment) => segment.length > 0);
  const smearedSegments = segments.map((segment, index) =>
    index === 0 && (segment === 'sites' || segment === 'teams') ? segment : smear(segment),
  );
  return `${url.protocol}//${url.host}${smearedSegments.length ? `/${smearedSegments.join('/')}` : ''}`;
}
