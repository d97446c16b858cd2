/**
 * Pattern-based rejection of a few destructive constructs
 *
 * Not a sandbox: this only stops the handful of commands that wipe a drive,
 * format a filesystem or fork-bomb the host.
 */

export interface GuardFinding {
  blocked: boolean;
  reasons: string[];
}

export interface CommandGuardOptions {
  enabled?: boolean;
  /**
   * Extra regular expression sources, matched case-insensitively
   */
  blockedPatterns?: readonly string[];
}

interface GuardRule {
  pattern: RegExp;
  reason: string;
}

export class CommandGuard {
  private readonly enabled: boolean;

  private rules: GuardRule[] = [
    { pattern: /\brm\s+-(?:[a-z]*r[a-z]*f|[a-z]*f[a-z]*r)[a-z]*\s+\/(?:\*)?(?:\s|$)/i, reason: 'Deletes root filesystem' },
    { pattern: /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/, reason: 'Fork bomb' },
    { pattern: /\bmkfs(?:\.\w+)?\b/, reason: 'Formats filesystem' },
    { pattern: /\bdd\s+.*\bof=\/dev\/(?:sd|hd|nvme|disk)/, reason: 'Direct disk write' },
    { pattern: /\bformat(?:\.com)?\s+[a-z]:/i, reason: 'Formats entire drive' },
    { pattern: /\b(?:del|erase|rd|rmdir)\s+(?:\/[a-z]\s+)*[a-z]:\\(?:\*)?(?:\s|$)/i, reason: 'Deletes drive root (Windows)' },
    {
      pattern: /\bRemove-Item\b(?=.*-Recurse)(?=.*\s[a-z]:\\(?:\*)?(?:\s|$))/i,
      reason: 'Recursively removes drive root (PowerShell)',
    },
  ];

  constructor(options: CommandGuardOptions = {}) {
    this.enabled = options.enabled ?? true;
    for (const source of options.blockedPatterns ?? []) {
      this.rules.push({ pattern: new RegExp(source, 'i'), reason: `Matches blocked pattern: ${source}` });
    }
  }

  /**
   * Check a command against the rules
   */
  inspect(command: string): GuardFinding {
    if (!this.enabled) {
      return { blocked: false, reasons: [] };
    }

    const reasons: string[] = [];
    for (const { pattern, reason } of this.rules) {
      if (pattern.test(command)) {
        reasons.push(reason);
      }
    }

    return { blocked: reasons.length > 0, reasons };
  }
}
