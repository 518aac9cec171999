/**
 * Service Module - discovery, status, search and lifecycle of launchd definitions
 */

export { parseDefinition, decodePropertyList, toServiceDefinition } from './parser.js';
export { StatusProber, parseListOutput } from './prober.js';
export type { StatusProberOptions } from './prober.js';
export { DirectoryScanner, toServiceRecord } from './scanner.js';
export type { DirectoryScannerOptions, ScanResult, ScanWarning, StatusSource, DefinitionParser } from './scanner.js';
export { filterServices, ServiceFilter } from './filter.js';
export type { FilterOptions } from './filter.js';
export { LifecycleController } from './lifecycle.js';
export type { LifecycleControllerOptions } from './lifecycle.js';
export { ServiceFileManager, DEFAULT_TAIL_LINES } from './file-manager.js';
export type { DefinitionTemplate, LogTail } from './file-manager.js';
export { ServiceSession, NO_SELECTION } from './session.js';
export type { ServiceSessionOptions } from './session.js';
export {
  ParseError,
  ScanRootError,
  LifecycleError,
  PermissionError,
  CreateError,
  describeCause,
  errnoCode,
} from './errors.js';
export type {
  ServiceDefinition,
  KeepAlivePolicy,
  RuntimeStatus,
  ServiceRecord,
  ServiceSet,
  TemplateKind,
  LifecycleOperation,
} from './types.js';
