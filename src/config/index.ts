/**
 * Configuration System
 *
 * Centralized configuration management using:
 * - Default values (hardcoded)
 * - JSON config file (deployment overrides)
 * - Environment variables (per-process overrides)
 */

export * from './defaults';
export * from './loader';
