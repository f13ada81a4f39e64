import { createModuleLogger } from '../utils/logger';

const log = createModuleLogger('matching');

/**
 * Runs an extractor and turns any unexpected failure into "no token".
 * The failure is logged at warn level.
 */
export function safeExtract<T>(name: string, extractor: () => T | null): T | null {
  try {
    return extractor();
  } catch (error) {
    log.warn(
      `Extractor "${name}" failed, treating as no match: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
    return null;
  }
}

export default safeExtract;
