/**
 * Service Module Types
 */

/**
 * Structured KeepAlive policy (e.g. `{ SuccessfulExit: false }`), kept as declared
 */
export type KeepAlivePolicy = Readonly<Record<string, unknown>>;

/**
 * A parsed launchd definition file
 */
export interface ServiceDefinition {
  readonly label: string;
  /** `Program`, else the first argument, else empty */
  readonly programPath: string;
  readonly programArguments: readonly string[];
  readonly runAtLoad: boolean;
  readonly keepAlive: boolean | KeepAlivePolicy;
  readonly standardOutPath?: string;
  readonly standardErrorPath?: string;
  readonly workingDirectory?: string;
  readonly runAsUser?: string;
  readonly runAsGroup?: string;
  /** Every declared key, including the ones not modeled above */
  readonly raw: Readonly<Record<string, unknown>>;
}

/**
 * Live status reported by launchctl
 */
export type RuntimeStatus =
  | { readonly state: "stopped" }
  | { readonly state: "running"; readonly pid: number }
  | { readonly state: "unknown"; readonly reason: string };

/**
 * A definition reconciled with its live status
 */
export interface ServiceRecord {
  readonly definition: ServiceDefinition;
  /** Absolute path of the definition file; identifies the record and is the launchctl handle */
  readonly sourcePath: string;
  readonly status: RuntimeStatus;
}

/**
 * Records in discovery order, unique by sourcePath
 */
export type ServiceSet = readonly ServiceRecord[];

/**
 * Kind of definition produced by `create`
 */
export type TemplateKind = "user-agent" | "system-daemon";

/**
 * Lifecycle operations issued through launchctl
 */
export type LifecycleOperation = "start" | "stop" | "restart";
