/**
 * Common types and interfaces for the srcpack CLI application
 */

export * from './execution-context.js';
export * from './content.js';

// Core application types
export interface SrcpackDirectories {
  config: string;
}

export interface GameConfig {
  /** Game install directory (the one holding the mod directory) */
  dir?: string;
  /** Mod directory name inside the install, e.g. "garrysmod" */
  modDir?: string;
  /** Steam app id used to locate the install when no directory is given */
  appId?: number;
}

export interface SrcpackConfig {
  game?: GameConfig;
  /** Glob patterns (relative asset paths) never collected */
  exclude?: string[];
}

// Command option types

export interface CollectCommandOptions {
  sourcePath?: string[];
  outputPath: string;
  gameDir?: string;
  modDir?: string;
  /** Commander sets this to false for --no-game */
  game?: boolean;
  exclude?: string[];
  dryRun?: boolean;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class SrcpackError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SrcpackError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  MALFORMED_ASSET = 'MALFORMED_ASSET'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
