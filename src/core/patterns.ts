/**
 * Shared detection patterns
 *
 * The posix-subsystem test is used by both the classifier (routing) and the
 * normalizer (to leave subsystem-native paths alone), so it lives here once.
 */

export const SUBSYSTEM_PATTERNS = Object.freeze({
  PREFIX: /^wsl(?:\.exe)?\s+/i,
  MOUNT_PATH: /\/mnt\/[a-zA-Z]\//,
  UNC_PATH: /\\\\wsl(?:\$|\.localhost)\\/i,
});

const POWERSHELL_VERBS = [
  'Add',
  'Clear',
  'Compare',
  'ConvertFrom',
  'ConvertTo',
  'Copy',
  'Export',
  'ForEach',
  'Format',
  'Get',
  'Import',
  'Invoke',
  'Join',
  'Measure',
  'Move',
  'New',
  'Out',
  'Remove',
  'Rename',
  'Resolve',
  'Restart',
  'Select',
  'Set',
  'Sort',
  'Split',
  'Start',
  'Stop',
  'Test',
  'Where',
  'Write',
];

export const POWERSHELL_PATTERNS = Object.freeze({
  CMDLET: new RegExp(`(?:^|[\\s;|({])(?:${POWERSHELL_VERBS.join('|')})-[A-Z][A-Za-z]+\\b`),
  SESSION_VARIABLE: /\$PSVersionTable\b/,
  MODULE_IMPORT: /\bImport-Module\b/,
});

export const ECOSYSTEM_PATTERNS = Object.freeze({
  VCS: /^git\s+/,
  NODE: /^(?:npm|npx|node|yarn|pnpm)\s+/,
  CONTAINER: /^docker\s+/,
  PYTHON: /^(?:python3?|py)\s+/,
});

/**
 * True when the text is an invocation of, or addresses paths inside, the POSIX subsystem
 */
export function isPosixSubsystemCommand(text: string): boolean {
  return (
    SUBSYSTEM_PATTERNS.PREFIX.test(text) ||
    SUBSYSTEM_PATTERNS.MOUNT_PATH.test(text) ||
    SUBSYSTEM_PATTERNS.UNC_PATH.test(text)
  );
}
