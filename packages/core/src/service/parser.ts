/**
 * Definition Parser
 * Turns one launchd property list (binary or XML) into a ServiceDefinition
 */

import fs from "node:fs/promises";
import path from "node:path";
import plist from "plist";
import { parseBuffer } from "bplist-parser";
import { ParseError } from "./errors.js";
import type { KeepAlivePolicy, ServiceDefinition } from "./types.js";
import type { Result } from "../types/common.js";
import { fail, ok } from "../types/common.js";

const BINARY_MAGIC = "bplist";

type Dictionary = Record<string, unknown>;

const isDictionary = (value: unknown): value is Dictionary =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  !(value instanceof Date) &&
  !Buffer.isBuffer(value);

const optionalString = (value: unknown): string | undefined => (typeof value === "string" ? value : undefined);

/**
 * Decode property list bytes into a plain value
 */
export const decodePropertyList = (content: Buffer): unknown => {
  if (content.subarray(0, BINARY_MAGIC.length).toString("ascii") === BINARY_MAGIC) {
    const [root]: unknown[] = parseBuffer(content);
    return root;
  }
  return plist.parse(content.toString("utf8"));
};

/**
 * Build a definition from an already decoded dictionary
 */
export const toServiceDefinition = (data: Dictionary, filePath: string): ServiceDefinition => {
  const declaredLabel = optionalString(data.Label);
  const label = declaredLabel && declaredLabel.length > 0 ? declaredLabel : path.parse(filePath).name;

  const programArguments = Array.isArray(data.ProgramArguments)
    ? data.ProgramArguments.map((arg: unknown) => String(arg))
    : [];

  const program = optionalString(data.Program);
  const programPath = program ?? programArguments[0] ?? "";

  let keepAlive: boolean | KeepAlivePolicy = false;
  if (typeof data.KeepAlive === "boolean") {
    keepAlive = data.KeepAlive;
  } else if (isDictionary(data.KeepAlive)) {
    keepAlive = Object.freeze({ ...data.KeepAlive });
  }

  return Object.freeze({
    label,
    programPath,
    programArguments: Object.freeze(programArguments),
    runAtLoad: data.RunAtLoad === true,
    keepAlive,
    standardOutPath: optionalString(data.StandardOutPath),
    standardErrorPath: optionalString(data.StandardErrorPath),
    workingDirectory: optionalString(data.WorkingDirectory),
    runAsUser: optionalString(data.UserName),
    runAsGroup: optionalString(data.GroupName),
    raw: Object.freeze({ ...data }),
  });
};

/**
 * Parse a definition file. Never throws: every failure is a ParseError result.
 */
export const parseDefinition = async (filePath: string): Promise<Result<ServiceDefinition, ParseError>> => {
  try {
    const content = await fs.readFile(filePath);
    const decoded = decodePropertyList(content);

    if (!isDictionary(decoded)) {
      return fail(new ParseError(filePath, new Error("top-level value is not a dictionary")));
    }

    return ok(toServiceDefinition(decoded, filePath));
  } catch (error) {
    return fail(new ParseError(filePath, error));
  }
};
