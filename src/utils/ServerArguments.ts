/**
 * @fileoverview CLI argument parser for the label dispatch server
 *
 * Parses startup overrides for the configuration. Values given on the command line replace
 * the stored ones for this run and are saved like any other configuration change.
 *
 * Examples:
 *   node dist/index.js --port=3200
 *   node dist/index.js --design-root=/srv/labels/design --web-root="/srv/labels/web"
 */

import type { AppConfig } from '../types/config';

/**
 * Overrides parsed from CLI arguments
 */
export interface ServerArguments {
  port?: number;
  designRoot?: string;
  webRoot?: string;
}

export interface ServerArgumentsValidation {
  valid: boolean;
  errors: string[];
}

/**
 * Parse command-line arguments
 *
 * @param args Process argv array
 */
export function parseServerArguments(args: readonly string[] = process.argv): ServerArguments {
  return {
    port: parseNumberArgument(args, '--port'),
    designRoot: parseStringArgument(args, '--design-root'),
    webRoot: parseStringArgument(args, '--web-root'),
  };
}

/**
 * Value of a `--flag=value` argument, without surrounding quotes
 */
function findArgumentValue(args: readonly string[], flag: string): string | undefined {
  const arg = args.find((a) => a.startsWith(`${flag}=`));
  if (!arg) {
    return undefined;
  }

  // Paths may contain '=' themselves
  const value = arg.slice(flag.length + 1);
  return value.replace(/^["']|["']$/g, '');
}

function parseNumberArgument(args: readonly string[], flag: string): number | undefined {
  const value = findArgumentValue(args, flag);
  if (value === undefined) {
    return undefined;
  }

  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function parseStringArgument(args: readonly string[], flag: string): string | undefined {
  const value = findArgumentValue(args, flag);
  return value === undefined || value.trim().length === 0 ? undefined : value.trim();
}

export function validateServerArguments(parsed: ServerArguments): ServerArgumentsValidation {
  const errors: string[] = [];

  if (parsed.port !== undefined && (parsed.port < 1 || parsed.port > 65535)) {
    errors.push('Port must be between 1 and 65535');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Configuration changes carried by the parsed arguments
 */
export function toConfigOverrides(parsed: ServerArguments): Partial<AppConfig> {
  const overrides: { -readonly [K in keyof AppConfig]?: AppConfig[K] } = {};

  if (parsed.port !== undefined) {
    overrides.ApiPort = parsed.port;
  }
  if (parsed.designRoot !== undefined) {
    overrides.DesignRoot = parsed.designRoot;
  }
  if (parsed.webRoot !== undefined) {
    overrides.WebRoot = parsed.webRoot;
  }

  return overrides;
}
