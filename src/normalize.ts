// Verbatim and device markers, matched case-insensitively after separators are unified.
const PREFIXES: ReadonlyArray<[marker: string, replacement: string]> = [
  ['//?/unc/', '//'],
  ['//?/', ''],
  ['//./', ''],
];

const stripPrefix = (s: string): string | undefined => {
  const lower = s.toLowerCase();
  for (const [marker, replacement] of PREFIXES) {
    if (lower.startsWith(marker)) return replacement + s.slice(marker.length);
  }
  return undefined;
};

/**
 * Canonical form of a cwd for comparison: forward slashes, no verbatim prefix,
 * no trailing separator, lower case. Idempotent.
 */
export const normalizeCwd = (raw: string): string => {
  let s = raw.replace(/\\/g, '/');
  for (let next = stripPrefix(s); next !== undefined; next = stripPrefix(s)) {
    s = next;
  }
  s = s.replace(/\/+$/, '');
  return s.toLowerCase();
};
