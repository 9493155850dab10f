export { normalizeError, sanitizeError } from './normalize-error';
export { Redacted } from './redacted';
export { isSmearingActive, LogsDiagnosticDataPolicy, smear, smearSiteUrl } from './smeared';
export { elapsedMilliseconds, elapsedSeconds, elapsedSecondsLog } from './timing';
export { json, redacted } from './zod';
