/**
 * Service Module Errors
 */

import type { LifecycleOperation } from "./types.js";

export const describeCause = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause));

/**
 * The errno code of a filesystem error, if any
 */
export const errnoCode = (error: unknown): string | undefined => {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
};

/**
 * A definition file could not be read or parsed
 */
export class ParseError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Error parsing ${path}: ${describeCause(cause)}`, { cause });
    this.name = "ParseError";
    this.path = path;
  }
}

/**
 * A search root exists but could not be listed
 */
export class ScanRootError extends Error {
  readonly root: string;

  constructor(root: string, cause: unknown) {
    const code = errnoCode(cause);
    super(
      code === "EACCES" || code === "EPERM"
        ? `Permission denied accessing ${root}`
        : `Error loading ${root}: ${describeCause(cause)}`,
      { cause }
    );
    this.name = "ScanRootError";
    this.root = root;
  }
}

/**
 * launchctl rejected or did not complete a lifecycle command
 */
export class LifecycleError extends Error {
  readonly op: LifecycleOperation;
  readonly path: string;
  /** Diagnostic reported by launchctl */
  declare readonly cause: string;
  readonly code?: number;

  constructor(op: LifecycleOperation, path: string, cause: string, code?: number) {
    super(`Failed to ${op} ${path}: ${cause}`, { cause });
    this.name = "LifecycleError";
    this.op = op;
    this.path = path;
    this.code = code;
  }
}

/**
 * The target directory for a new definition is not writable
 */
export class PermissionError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Need sudo access to create daemon in ${path}`);
    this.name = "PermissionError";
    this.path = path;
  }
}

/**
 * A new definition could not be serialized or written
 */
export class CreateError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Error creating ${path}: ${describeCause(cause)}`, { cause });
    this.name = "CreateError";
    this.path = path;
  }
}
