/**
 * ShellClassifier - routes a command to a shell backend
 *
 * Detection is an ordered, first-match list; ties go to whichever detector
 * comes first, not to the most specific one. The result depends only on the
 * command text, the override and the shell table given at construction.
 */

import path from 'path';
import type { BackendKind, Command, DetectorName, ShellPlan, ShellTable } from './types.js';
import { ECOSYSTEM_PATTERNS, POWERSHELL_PATTERNS, SUBSYSTEM_PATTERNS } from './patterns.js';
import { FifoCache, type FifoCacheStats } from '../shared/utils/cache.js';

export interface ShellClassifierOptions {
  cacheSize?: number;
  evictionRatio?: number;
}

export interface Detection {
  backend: BackendKind;
  commandText: string;
  detector: DetectorName;
}

interface Detector {
  detect(command: string): Detection | null;
}

const DETECTORS: readonly Detector[] = Object.freeze([
  {
    detect(command: string): Detection | null {
      const prefix = SUBSYSTEM_PATTERNS.PREFIX.exec(command);
      if (prefix) {
        return {
          backend: 'posix',
          commandText: command.slice(prefix[0].length),
          detector: 'posix-subsystem',
        };
      }
      if (SUBSYSTEM_PATTERNS.MOUNT_PATH.test(command) || SUBSYSTEM_PATTERNS.UNC_PATH.test(command)) {
        return { backend: 'posix', commandText: command, detector: 'posix-subsystem' };
      }
      return null;
    },
  },
  {
    detect(command: string): Detection | null {
      const matches =
        POWERSHELL_PATTERNS.CMDLET.test(command) ||
        POWERSHELL_PATTERNS.SESSION_VARIABLE.test(command) ||
        POWERSHELL_PATTERNS.MODULE_IMPORT.test(command);
      return matches ? { backend: 'powershell', commandText: command, detector: 'powershell' } : null;
    },
  },
  {
    detect(command: string): Detection | null {
      const matches = Object.values(ECOSYSTEM_PATTERNS).some((pattern) => pattern.test(command));
      return matches ? { backend: 'console', commandText: command, detector: 'ecosystem' } : null;
    },
  },
]);

export class ShellClassifier {
  private readonly cache: FifoCache<ShellPlan>;

  constructor(
    private readonly shells: ShellTable,
    options: ShellClassifierOptions = {}
  ) {
    this.cache = new FifoCache<ShellPlan>({
      capacity: options.cacheSize ?? 500,
      evictionRatio: options.evictionRatio ?? 0.2,
    });
  }

  /**
   * Resolve the shell plan for a command. An override always wins and is not cached.
   */
  classify(command: Command, override?: BackendKind): ShellPlan {
    if (override) {
      return this.buildPlan({ backend: override, commandText: command, detector: 'override' });
    }
    return this.cache.getOrCompute(command, (text) => this.buildPlan(ShellClassifier.detect(text)));
  }

  /**
   * Run the detectors without building a plan
   */
  static detect(command: string): Detection {
    for (const detector of DETECTORS) {
      const detection = detector.detect(command);
      if (detection) {
        return detection;
      }
    }
    return { backend: 'console', commandText: command, detector: 'default' };
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheStats(): FifoCacheStats {
    return this.cache.getStats();
  }

  private buildPlan(detection: Detection): ShellPlan {
    const shell = this.shells[detection.backend];
    return Object.freeze({
      backend: detection.backend,
      executable: shell.executable,
      prefixArgs: Object.freeze([...shell.args]),
      argumentMode: shell.argumentMode,
      commandText: detection.commandText,
      detector: detection.detector,
    });
  }
}

/**
 * Full argv for a plan (excluding the executable)
 */
export function planArguments(plan: ShellPlan): string[] {
  const trailing = plan.argumentMode === 'verbatim' ? `"${plan.commandText}"` : plan.commandText;
  return [...plan.prefixArgs, trailing];
}

const SUBSYSTEM_LAUNCHER = /^wsl(?:\.exe)?$/i;

/**
 * Target a named distribution when a posix plan runs through the wsl launcher.
 * Other plans are returned unchanged.
 */
export function withDistribution(plan: ShellPlan, distribution: string | undefined): ShellPlan {
  if (
    !distribution ||
    plan.backend !== 'posix' ||
    !SUBSYSTEM_LAUNCHER.test(path.win32.basename(plan.executable))
  ) {
    return plan;
  }
  return Object.freeze({
    ...plan,
    prefixArgs: Object.freeze(['-d', distribution, ...plan.prefixArgs]),
  });
}
