import {
  createWakeWordBackend,
  WakeWordUnavailableError,
  type WakeWordBackendFactory,
  type WakeWordSetup,
} from '@lightcue/wake-word';
import type { PipelineConfig } from './config';

export interface WakeWordSetupOptions {
  accessKey: string | undefined;
  wakeWord: PipelineConfig['wakeWord'];
  /** Builds the backend factory for an access key */
  backendFor: (accessKey: string) => WakeWordBackendFactory;
  available: readonly string[];
  pathExists?: (path: string) => boolean;
}

/** Builds the wake-word backend from the validated wake-word config */
export function setUpWakeWord(options: WakeWordSetupOptions): WakeWordSetup {
  if (!options.accessKey) {
    throw new WakeWordUnavailableError('PICOVOICE_ACCESS_KEY is not set');
  }
  return createWakeWordBackend(options.backendFor(options.accessKey), {
    keyword: options.wakeWord.keyword,
    keywordPath: options.wakeWord.keywordPath,
    sensitivity: options.wakeWord.sensitivity,
    available: options.available,
    pathExists: options.pathExists,
  });
}
