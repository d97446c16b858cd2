/**
 * Default configuration
 *
 * Shell executables depend on the host platform and are fixed here, once.
 * Classification only ever picks a backend out of this table.
 */

import path from 'path';
import type { EngineConfig, ShellTableConfig } from './schemas.js';

export const CONFIG_DIR_NAME = '.shellweave';
export const CONFIG_FILE_NAME = 'config.yml';

export function defaultShellTable(platform: NodeJS.Platform = process.platform): ShellTableConfig {
  if (platform === 'win32') {
    return {
      console: { executable: 'cmd.exe', args: ['/d', '/s', '/c'], argumentMode: 'verbatim' },
      powershell: {
        executable: 'powershell.exe',
        args: ['-NoProfile', '-Command'],
        argumentMode: 'append',
      },
      posix: { executable: 'wsl.exe', args: ['--', 'bash', '-c'], argumentMode: 'append' },
    };
  }

  return {
    console: { executable: '/bin/sh', args: ['-c'], argumentMode: 'append' },
    powershell: { executable: 'pwsh', args: ['-NoProfile', '-Command'], argumentMode: 'append' },
    posix: { executable: 'bash', args: ['-c'], argumentMode: 'append' },
  };
}

export function getDefaultConfig(platform: NodeJS.Platform = process.platform): EngineConfig {
  const isWindows = platform === 'win32';

  return {
    shells: defaultShellTable(platform),
    pool: {
      maxConcurrent: 10,
    },
    execution: {
      defaultTimeoutMs: 120_000,
      killGraceMs: 5_000,
      maxOutputBytes: 10 * 1024 * 1024,
      encoding: 'utf8',
    },
    normalizer: {
      // /c/Users style paths only mean something to a Windows console
      rewriteDrivePaths: isWindows,
      powershellExecutable: isWindows ? 'powershell.exe' : 'pwsh',
      cacheSize: 1000,
    },
    classifier: {
      cacheSize: 500,
      evictionRatio: 0.2,
    },
    guard: {
      enabled: true,
      blockedPatterns: [],
    },
    logging: {
      file: path.join(CONFIG_DIR_NAME, 'logs', 'audit.log'),
      level: 'info',
      console: false,
      bufferBytes: 16 * 1024,
      flushIntervalMs: 5_000,
      maxFileBytes: 50 * 1024 * 1024,
      maxBackups: 5,
    },
  };
}
