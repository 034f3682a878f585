import { InvalidFamilyError } from './errors.js';
import { ALL_FAMILIES, ExtractorConfig, Family, Logger } from './types.js';

export const DEFAULT_PROGRESS_INTERVALS: Readonly<Record<Family, number>> = {
  records: 100000,
  workouts: 1000,
  activity: 1000
};

// stdout belongs to the MCP transport and the CLI summary.
export const consoleLogger: Logger = {
  info: message => console.error(message),
  warn: message => console.warn(message)
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined
};

export function resolveConfig(config: Partial<ExtractorConfig> = {}): ExtractorConfig {
  return {
    outputDirectory: config.outputDirectory || process.env.HEALTH_EXPORT_OUTPUT_DIR || process.cwd(),
    progressIntervals: { ...DEFAULT_PROGRESS_INTERVALS, ...config.progressIntervals },
    flushThreshold: config.flushThreshold ?? 64 * 1024,
    maxSkipWarnings: config.maxSkipWarnings ?? 20,
    logger: config.logger ?? consoleLogger
  };
}

/**
 * Validate a family selection. Nothing selected means every family; the
 * result is de-duplicated and in canonical order.
 */
export function resolveFamilies(families?: readonly string[]): Family[] {
  if (!families || families.length === 0) {
    return [...ALL_FAMILIES];
  }

  for (const name of families) {
    if (!isFamily(name)) {
      throw new InvalidFamilyError(name);
    }
  }
  return ALL_FAMILIES.filter(family => families.includes(family));
}

export function isFamily(value: string): value is Family {
  return ALL_FAMILIES.some(family => family === value);
}
