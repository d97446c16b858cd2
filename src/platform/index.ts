/**
 * Platform abstraction exports
 */

export * from './IFileSystem.js';
export * from './FileSystemAdapter.js';
