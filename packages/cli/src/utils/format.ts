/**
 * Output formatting helpers
 */

import chalk from "chalk";
import type { LogTail, RuntimeStatus, ServiceRecord, ServiceSet } from "@launchboard/core";

/**
 * Plain status text, e.g. `Running (PID: 1234)`
 */
export function formatStatus(status: RuntimeStatus): string {
  switch (status.state) {
    case "running":
      return `Running (PID: ${status.pid})`;
    case "stopped":
      return "Stopped";
    default:
      return "Unknown";
  }
}

/**
 * Status text colored by state
 */
export function colorStatus(status: RuntimeStatus): string {
  const text = formatStatus(status);
  switch (status.state) {
    case "running":
      return chalk.green(text);
    case "stopped":
      return chalk.yellow(text);
    default:
      return chalk.gray(text);
  }
}

const pad = (value: string, width: number): string =>
  value.length >= width ? `${value} ` : value + " ".repeat(width - value.length);

export interface TableOptions {
  showProgram?: boolean;
  /** Color the status cell by state */
  colored?: boolean;
}

const statusCell = (status: RuntimeStatus, width: number, colored: boolean): string => {
  const text = formatStatus(status);
  const padded = pad(text, width);
  return colored ? colorStatus(status) + padded.slice(text.length) : padded;
};

/**
 * Table rows for a set of records; columns are sized on the plain text
 */
export function formatTable(services: ServiceSet, options: TableOptions = {}): string[] {
  const { showProgram = true, colored = false } = options;
  const labelWidth = Math.max(5, ...services.map((record) => record.definition.label.length)) + 2;
  const statusWidth = Math.max(6, ...services.map((record) => formatStatus(record.status).length)) + 2;

  const header = pad("Label", labelWidth) + pad("Status", statusWidth) + (showProgram ? "Program" : "");
  const rows = services.map(
    (record) =>
      pad(record.definition.label, labelWidth) +
      statusCell(record.status, statusWidth, colored) +
      (showProgram ? record.definition.programPath : "")
  );

  return [header.trimEnd(), ...rows.map((row) => row.trimEnd())];
}

const formatKeepAlive = (value: ServiceRecord["definition"]["keepAlive"]): string =>
  typeof value === "boolean" ? String(value) : JSON.stringify(value);

/**
 * Detail lines for one record
 */
export function formatDetails(record: ServiceRecord): string[] {
  const { definition } = record;
  const lines = [
    `Label:             ${definition.label}`,
    `Status:            ${formatStatus(record.status)}`,
    `Path:              ${record.sourcePath}`,
    `Program:           ${definition.programPath}`,
  ];

  if ("RunAtLoad" in definition.raw) {
    lines.push(`RunAtLoad:         ${definition.runAtLoad}`);
  }
  if ("KeepAlive" in definition.raw) {
    lines.push(`KeepAlive:         ${formatKeepAlive(definition.keepAlive)}`);
  }
  if (definition.standardOutPath) {
    lines.push(`StandardOutPath:   ${definition.standardOutPath}`);
  }
  if (definition.standardErrorPath) {
    lines.push(`StandardErrorPath: ${definition.standardErrorPath}`);
  }
  if (definition.workingDirectory) {
    lines.push(`WorkingDirectory:  ${definition.workingDirectory}`);
  }
  if (definition.runAsUser) {
    lines.push(`UserName:          ${definition.runAsUser}`);
  }
  if (definition.runAsGroup) {
    lines.push(`GroupName:         ${definition.runAsGroup}`);
  }
  if (definition.programArguments.length > 0) {
    lines.push("ProgramArguments:");
    for (const arg of definition.programArguments) {
      lines.push(`  ${arg}`);
    }
  }
  return lines;
}

/**
 * Lines shown for one log file
 */
export function formatLogTail(tail: LogTail, heading: string): string[] {
  const lines = [`${heading} (${tail.path}):`];
  if (tail.state !== "ok") {
    lines.push(tail.message ?? "No content or file not accessible");
    return lines;
  }
  if (tail.lines.length === 0) {
    lines.push("No content or file not accessible");
    return lines;
  }
  if (tail.truncated) {
    lines.push(`... showing last ${tail.lines.length} lines ...`);
  }
  lines.push(...tail.lines);
  return lines;
}
