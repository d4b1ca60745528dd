import type { Logger } from '../../src/types.js';

export interface RecordingLogger extends Logger {
  infos: string[];
  warnings: string[];
  errors: string[];
}

/**
 * Logger that keeps every message for assertions
 */
export function createRecordingLogger(): RecordingLogger {
  const infos: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    infos,
    warnings,
    errors,
    info: message => infos.push(message),
    warn: message => warnings.push(message),
    error: message => errors.push(message),
  };
}
