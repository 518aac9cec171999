import { toServiceDefinition, toServiceRecord } from "@launchboard/core";
import type { RuntimeStatus, ServiceRecord } from "@launchboard/core";

export const record = (
  label: string,
  sourcePath: string,
  extra: Record<string, unknown> = {},
  status: RuntimeStatus = { state: "stopped" }
): ServiceRecord =>
  toServiceRecord(toServiceDefinition({ Label: label, ...extra }, sourcePath), status, sourcePath);
