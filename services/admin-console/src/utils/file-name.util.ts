// biome-ignore lint/suspicious/noControlCharactersInRegex: control characters are invalid in file names
const INVALID_FILE_NAME_CHARACTERS = /[<>:"/\\|?*\u0000-\u001f]/g;

export function toSafeFileName(name: string): string {
  return name.replace(INVALID_FILE_NAME_CHARACTERS, '_');
}

/**
 * Cookie files are keyed by domain; anything outside `[a-z0-9-.]` collapses to `_`.
 */
export function toSafeDomainFileName(domain: string): string {
  return `${domain.toLowerCase().replace(/[^a-z0-9\-.]/g, '_')}.dat`;
}
