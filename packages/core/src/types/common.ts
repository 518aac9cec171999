/**
 * Common types used across the core package
 */

/**
 * Supported operating systems
 */
export enum OperatingSystem {
  LINUX = "linux",
  MACOS = "macos",
  WINDOWS = "windows",
  UNKNOWN = "unknown",
}

/**
 * System architecture
 */
export enum Architecture {
  X64 = "x64",
  ARM = "arm",
  ARM64 = "arm64",
  X86 = "x86",
  UNKNOWN = "unknown",
}

/**
 * System information
 */
export interface SystemInfo {
  os: OperatingSystem;
  arch: Architecture;
  platform: string;
  release: string;
}

/**
 * Result type for operations that can fail
 */
export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

/**
 * Execution result for commands
 */
export interface ExecutionResult {
  stdout: string;
  stderr: string;
  code: number;
  success: boolean;
  timedOut: boolean;
}

export const ok = <T>(data: T): Result<T, never> => ({ success: true, data });

export const fail = <E>(error: E): Result<never, E> => ({ success: false, error });
