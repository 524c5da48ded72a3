/**
 * Runtime configuration.
 *
 * Read from the environment; a `.env` file in the working directory is
 * loaded first when present.
 */

import dotenv from "dotenv";
import { ConfigError } from "./types/errors.js";

export interface MailboxConfig {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass: string;
  /** Folder searched for statements */
  folder: string;
}

export interface CutoffConfig {
  hour: number;
  minute: number;
  /** IANA zone the cutoff wall-clock time is expressed in */
  timeZone: string;
}

export interface ArchiverConfig {
  /** Workbook holding the rule sheet and named run cells */
  workbookPath: string;
  rulesSheet: string;
  archiveBaseDir: string;
  mailbox: MailboxConfig;
  cutoff: CutoffConfig;
}

type Env = Record<string, string | undefined>;

function getRequired(env: Env, name: string): string {
  const value = env[name];
  if (value && value.trim()) return value.trim();
  throw new ConfigError(`Missing required environment variable: ${name}`);
}

function getOptional(env: Env, name: string, fallback: string): string {
  const value = env[name];
  return value && value.trim() ? value.trim() : fallback;
}

function getInt(env: Env, name: string, fallback: number, min: number, max: number): number {
  const value = env[name];
  if (!value || !value.trim()) return fallback;
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new ConfigError(`Invalid integer for environment variable ${name}: ${value}`);
  }
  return parsed;
}

function getBool(env: Env, name: string, fallback: boolean): boolean {
  const value = env[name]?.trim().toLowerCase();
  if (!value) return fallback;
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  throw new ConfigError(`Invalid boolean for environment variable ${name}: ${value}`);
}

/**
 * Build the typed configuration from an environment map.
 *
 * @throws ConfigError naming the first missing or malformed variable
 */
export function loadConfig(env: Env = process.env): ArchiverConfig {
  return {
    workbookPath: getRequired(env, "WORKBOOK_PATH"),
    rulesSheet: getOptional(env, "RULES_SHEET", "Automated"),
    archiveBaseDir: getRequired(env, "ARCHIVE_BASE_DIR"),
    mailbox: {
      host: getRequired(env, "IMAP_HOST"),
      port: getInt(env, "IMAP_PORT", 993, 1, 65535),
      secure: getBool(env, "IMAP_SECURE", true),
      user: getRequired(env, "IMAP_USER"),
      pass: getRequired(env, "IMAP_PASS"),
      folder: getOptional(env, "IMAP_FOLDER", "INBOX"),
    },
    cutoff: {
      hour: getInt(env, "CUTOFF_HOUR", 16, 0, 23),
      minute: getInt(env, "CUTOFF_MINUTE", 0, 0, 59),
      timeZone: getOptional(env, "CUTOFF_TIMEZONE", "America/New_York"),
    },
  };
}

/**
 * Load `.env` into process.env, then read the configuration.
 */
export function loadConfigFromEnvironment(): ArchiverConfig {
  dotenv.config();
  return loadConfig(process.env);
}
