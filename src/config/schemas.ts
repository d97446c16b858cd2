/**
 * Configuration schemas with Zod validation
 *
 * Leaf fields carry no defaults. defaults.ts holds them, and each layer is
 * merged over it field by field.
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../shared/utils/logger.js';

const ENCODINGS = [
  'utf8',
  'utf-8',
  'utf16le',
  'utf-16le',
  'ucs2',
  'ucs-2',
  'latin1',
  'binary',
  'ascii',
  'base64',
  'base64url',
  'hex',
] as const satisfies readonly BufferEncoding[];

const positiveInt = z.number().int().positive();

export const ShellDefinitionSchema = z.object({
  executable: z.string().min(1),
  args: z.array(z.string()),
  argumentMode: z.enum(['append', 'verbatim']),
});

export const ShellTableSchema = z.object({
  console: ShellDefinitionSchema,
  powershell: ShellDefinitionSchema,
  posix: ShellDefinitionSchema,
});

export const PoolConfigSchema = z.object({
  maxConcurrent: positiveInt,
});

export const ExecutionConfigSchema = z.object({
  defaultTimeoutMs: positiveInt,
  killGraceMs: z.number().int().nonnegative(),
  maxOutputBytes: positiveInt,
  encoding: z.enum(ENCODINGS),
});

export const NormalizerConfigSchema = z.object({
  rewriteDrivePaths: z.boolean(),
  powershellExecutable: z.string().min(1),
  cacheSize: positiveInt,
});

export const ClassifierConfigSchema = z.object({
  cacheSize: positiveInt,
  evictionRatio: z.number().gt(0).max(1),
});

export const GuardConfigSchema = z.object({
  enabled: z.boolean(),
  blockedPatterns: z.array(
    z.string().refine(isValidPattern, { message: 'Invalid regular expression' })
  ),
});

export const LoggingConfigSchema = z.object({
  // null disables the audit file
  file: z.string().min(1).nullable(),
  level: z.enum(LOG_LEVELS),
  console: z.boolean(),
  bufferBytes: positiveInt,
  flushIntervalMs: positiveInt,
  maxFileBytes: positiveInt,
  maxBackups: positiveInt,
});

export const EngineConfigSchema = z.object({
  shells: ShellTableSchema,
  pool: PoolConfigSchema,
  execution: ExecutionConfigSchema,
  normalizer: NormalizerConfigSchema,
  classifier: ClassifierConfigSchema,
  guard: GuardConfigSchema,
  logging: LoggingConfigSchema,
});

/**
 * One configuration layer (file, environment or overrides)
 */
export const EngineConfigLayerSchema = EngineConfigSchema.deepPartial();

export type ShellDefinitionConfig = z.infer<typeof ShellDefinitionSchema>;
export type ShellTableConfig = z.infer<typeof ShellTableSchema>;
export type PoolConfig = z.infer<typeof PoolConfigSchema>;
export type ExecutionConfig = z.infer<typeof ExecutionConfigSchema>;
export type NormalizerConfig = z.infer<typeof NormalizerConfigSchema>;
export type ClassifierConfig = z.infer<typeof ClassifierConfigSchema>;
export type GuardConfig = z.infer<typeof GuardConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigLayer = z.infer<typeof EngineConfigLayerSchema>;

function isValidPattern(source: string): boolean {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
}
