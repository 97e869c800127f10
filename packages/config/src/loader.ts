/**
 * Loads `pequant.yaml` from disk and hands the text to parseConfigYaml().
 */

import { resolve } from "node:path";

import {
  ConfigFileNotFoundError,
  ConfigReadError,
  InputFileNotFoundError,
  InputReadError,
} from "@pequant/errors";
import { readTextFile } from "@pequant/io";

import { type ParseConfigOptions, parseConfigYaml } from "./parser.js";
import type { PequantConfig } from "./types.js";

export type LoadConfigOptions = Omit<ParseConfigOptions, "source">;

/**
 * Reads a configuration file and returns a validated, frozen
 * PequantConfig. Interpolation errors name the file.
 *
 * @throws {ConfigFileNotFoundError} if the file does not exist
 * @throws {ConfigReadError} if it is a directory, unreadable or binary
 */
export async function loadConfig(
  filePath: string,
  options?: LoadConfigOptions,
): Promise<PequantConfig> {
  const absolutePath = resolve(filePath);
  const content = await readConfigText(absolutePath);
  return parseConfigYaml(content, { ...options, source: absolutePath });
}

async function readConfigText(absolutePath: string): Promise<string> {
  try {
    return await readTextFile(absolutePath);
  } catch (error: unknown) {
    if (error instanceof InputFileNotFoundError) {
      throw new ConfigFileNotFoundError(absolutePath);
    }
    if (error instanceof InputReadError) {
      throw new ConfigReadError(absolutePath, error.reason, error);
    }
    throw error;
  }
}
