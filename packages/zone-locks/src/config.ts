/**
 * INI configuration loader.
 *
 * Reads the `[NIOS]` section:
 *
 * ```ini
 * [NIOS]
 * gm = 192.168.1.10
 * api_version = v2.12
 * valid_cert = false
 * user = admin
 * pass = test-secret
 * ```
 *
 * Missing keys, a missing section or a missing file never abort: they are
 * logged and the affected values default to "".
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import { ConfigFileUnreadableError, getErrorMessage } from "@zone-locks/errors";
import type { WapiConfig } from "@zone-locks/wapi";

import type { Logger } from "./logger.js";

export const DEFAULT_CONFIG_FILE = "gm.ini";
export const CONFIG_SECTION = "NIOS";
export const CONFIG_KEYS = ["gm", "api_version", "valid_cert", "user", "pass"] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

/** Section name to its keys (lower-cased) and values */
export type IniSections = ReadonlyMap<string, ReadonlyMap<string, string>>;

const SECRET_KEYS: ReadonlySet<ConfigKey> = new Set(["pass"]);

const SECTION_HEADER = /^\[(.+)\]/;
const COMMENT_PREFIXES = ["#", ";"] as const;
const KEY_VALUE = /^(.*?)\s*[=:]\s*(.*)$/;

/**
 * Strip any run of leading or trailing quote characters.
 */
export function stripQuotes(value: string): string {
  return value.replace(/^['"]+|['"]+$/g, "");
}

/**
 * Split INI text into sections.
 *
 * Values are kept exactly as written after the first `=` or `:`, trimmed:
 * `#` and `;` start a comment only at the beginning of a line, and
 * backslashes are literal. Key names are case-insensitive; section names
 * are not. A line indented deeper than its key continues that key's
 * value. Lines outside any section, or without a delimiter, are skipped.
 */
export function parseIniSections(content: string): IniSections {
  const sections = new Map<string, Map<string, string>>();
  let current: Map<string, string> | undefined;
  let lastKey: string | undefined;
  let keyIndent = 0;

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    const indent = line.length - line.trimStart().length;
    if (trimmed === "") {
      lastKey = undefined;
      continue;
    }
    if (COMMENT_PREFIXES.some((prefix) => trimmed.startsWith(prefix))) {
      continue;
    }

    if (current !== undefined && lastKey !== undefined && indent > keyIndent) {
      current.set(lastKey, `${current.get(lastKey) ?? ""}\n${trimmed}`);
      continue;
    }

    const header = SECTION_HEADER.exec(trimmed);
    if (header?.[1] !== undefined) {
      const name = header[1];
      current = sections.get(name) ?? new Map<string, string>();
      sections.set(name, current);
      lastKey = undefined;
      continue;
    }

    const pair = KEY_VALUE.exec(trimmed);
    const key = pair?.[1]?.toLowerCase();
    if (current === undefined || pair?.[2] === undefined || !key) {
      lastKey = undefined;
      continue;
    }
    current.set(key, pair[2]);
    lastKey = key;
    keyIndent = indent;
  }

  return sections;
}

/**
 * Parse INI text into a frozen WapiConfig.
 *
 * @param content - INI file contents
 * @param logger - receives warnings for missing keys and debug lines for found ones
 * @param source - file name used in log messages
 */
export function parseConfig(content: string, logger: Logger, source: string): WapiConfig {
  const values: Record<ConfigKey, string> = {
    gm: "",
    api_version: "",
    valid_cert: "",
    user: "",
    pass: "",
  };

  const section = parseIniSections(content).get(CONFIG_SECTION);
  if (section) {
    for (const key of CONFIG_KEYS) {
      const raw = section.get(key);
      if (raw !== undefined) {
        values[key] = stripQuotes(raw);
        const shown = SECRET_KEYS.has(key) ? "********" : values[key];
        logger.debug(`Key ${key} found in ${source}: ${shown}`);
      } else {
        logger.warn(`Key ${key} not found in ${CONFIG_SECTION} section.`);
      }
    }
  } else {
    logger.warn(`No ${CONFIG_SECTION} section in config file: ${source}`);
  }

  return Object.freeze({
    host: values.gm,
    apiVersion: values.api_version,
    username: values.user,
    password: values.pass,
    validateCert: values.valid_cert === "true",
  });
}

/**
 * Read and parse an INI file.
 *
 * @param filePath - path to the INI file (relative or absolute)
 */
export async function loadConfig(filePath: string, logger: Logger): Promise<WapiConfig> {
  const absolutePath = resolve(filePath);

  let content = "";
  try {
    content = await readFile(absolutePath, { encoding: "utf-8" });
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      logger.warn(`Config file not found: ${absolutePath}`);
    } else {
      const unreadable = new ConfigFileUnreadableError(
        absolutePath,
        getErrorMessage(error),
        error instanceof Error ? error : undefined,
      );
      logger.error(unreadable.message);
    }
  }

  return parseConfig(content, logger, filePath);
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
