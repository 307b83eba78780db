/**
 * @fileoverview Application configuration type definitions for the label dispatch server
 *
 * Key Features:
 * - AppConfig interface with readonly properties for immutability
 * - DEFAULT_CONFIG with type-safe constant values
 * - Field-by-field sanitization with zod: an invalid value falls back to its default
 *
 * Configuration Categories:
 * - API Server: ApiPort
 * - Templates: DesignRoot, WebRoot
 * - Transport: RequestTimeoutMs
 * - Advanced: DebugMode
 *
 * @module types/config
 */

import { z } from 'zod';

/**
 * Application configuration interface
 * All properties are readonly to enforce immutability
 */
export interface AppConfig {
  // API Server
  readonly ApiPort: number;

  // Template search roots (design root is probed first)
  readonly DesignRoot: string;
  readonly WebRoot: string;

  // Outbound HTTP timeout towards print backends
  readonly RequestTimeoutMs: number;

  // Advanced
  readonly DebugMode: boolean;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: AppConfig = {
  ApiPort: 3100,
  DesignRoot: 'design',
  WebRoot: 'web',
  RequestTimeoutMs: 20000,
  DebugMode: false,
} as const;

const PortSchema = z.number().int().min(1).max(65535);

/**
 * Per-field schema; `.catch()` substitutes the default for an invalid value
 */
export const AppConfigSchema = z.object({
  ApiPort: PortSchema.catch(DEFAULT_CONFIG.ApiPort),
  DesignRoot: z.string().trim().min(1).catch(DEFAULT_CONFIG.DesignRoot),
  WebRoot: z.string().trim().min(1).catch(DEFAULT_CONFIG.WebRoot),
  RequestTimeoutMs: z.number().int().min(1000).max(300000).catch(DEFAULT_CONFIG.RequestTimeoutMs),
  DebugMode: z.boolean().catch(DEFAULT_CONFIG.DebugMode),
});

export const CONFIG_KEYS = Object.keys(DEFAULT_CONFIG).filter(isValidConfigKey);

/**
 * Type guard to validate config key
 */
export function isValidConfigKey(key: string): key is keyof AppConfig {
  return Object.prototype.hasOwnProperty.call(DEFAULT_CONFIG, key);
}

/**
 * Sanitizes an arbitrary value into a complete configuration.
 * Unknown keys are dropped, invalid or missing values take their defaults.
 */
export function sanitizeConfig(config: unknown): AppConfig {
  const source = typeof config === 'object' && config !== null ? config : {};
  const parsed = AppConfigSchema.safeParse(source);
  return parsed.success ? parsed.data : { ...DEFAULT_CONFIG };
}
