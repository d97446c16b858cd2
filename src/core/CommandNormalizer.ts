/**
 * CommandNormalizer - rewrites Unix idioms into the target shells' syntax
 *
 * Rewrites run in a fixed order, each guarded by a cheap presence check:
 * 1. ` && ` becomes ` ; ` (a lone `&` is left as is)
 * 2. `/x/...` drive paths become `X:\...`, except in posix-subsystem commands
 * 3. `pwsh ...` without a run flag becomes `<powershell> -NoProfile -Command ...`
 *
 * The output of normalize() is a fixed point: normalizing it again changes nothing.
 */

import type { Command } from './types.js';
import { isPosixSubsystemCommand } from './patterns.js';
import { toCommand } from './command.js';
import { FifoCache, type FifoCacheStats } from '../shared/utils/cache.js';

const NORMALIZER_PATTERNS = Object.freeze({
  // Trailing space is a lookahead so `a && && b` rewrites both operators in one pass
  SEQUENTIAL_AND: / &&(?= )/g,
  DRIVE_PATH: /(^|[\s"'=(])\/([a-zA-Z])\/([^\s"')]*)/g,
  PWSH_PREFIX: /^pwsh(?:\.exe)?\s+/i,
  PWSH_RUN_FLAG: /(?:^|\s)-(?:Command|c|File|f|EncodedCommand|e|ec)(?=\s|$)/i,
});

export interface CommandNormalizerOptions {
  /**
   * Rewrite `/x/...` drive paths (default: true)
   */
  rewriteDrivePaths?: boolean;

  /**
   * Executable used when rewriting `pwsh` invocations (default: powershell.exe)
   */
  powershellExecutable?: string;

  cacheSize?: number;
}

export class CommandNormalizer {
  private readonly cache: FifoCache<Command>;
  private readonly rewriteDrivePaths: boolean;
  private readonly powershellPrefix: string;

  constructor(options: CommandNormalizerOptions = {}) {
    this.rewriteDrivePaths = options.rewriteDrivePaths ?? true;
    this.powershellPrefix = `${options.powershellExecutable ?? 'powershell.exe'} -NoProfile -Command `;
    this.cache = new FifoCache<Command>({ capacity: options.cacheSize ?? 1000 });
  }

  /**
   * Normalize a raw command. Throws InvalidCommandError for empty or NUL-containing input.
   */
  normalize(raw: string): Command {
    return this.cache.getOrCompute(raw, (text) => this.rewrite(text));
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheStats(): FifoCacheStats {
    return this.cache.getStats();
  }

  private rewrite(raw: string): Command {
    let text = raw.trim();

    if (text.includes(' && ')) {
      text = text.replace(NORMALIZER_PATTERNS.SEQUENTIAL_AND, ' ;');
    }

    if (this.rewriteDrivePaths && text.includes('/') && !isPosixSubsystemCommand(text)) {
      text = text.replace(
        NORMALIZER_PATTERNS.DRIVE_PATH,
        (_match, lead: string, drive: string, rest: string) =>
          `${lead}${drive.toUpperCase()}:\\${rest.replace(/\//g, '\\')}`
      );
    }

    if (NORMALIZER_PATTERNS.PWSH_PREFIX.test(text) && !NORMALIZER_PATTERNS.PWSH_RUN_FLAG.test(text)) {
      text = text.replace(NORMALIZER_PATTERNS.PWSH_PREFIX, this.powershellPrefix);
    }

    return toCommand(text);
  }
}
