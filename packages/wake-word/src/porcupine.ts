import { BuiltinKeyword, Porcupine } from '@picovoice/porcupine-node';
import type { IWakeWordBackend, WakeWordBackendFactory } from './backend';

/** Built-in keyword names shipped with the Porcupine package */
export function builtinKeywords(): string[] {
  return Object.values(BuiltinKeyword);
}

export class PorcupineBackend implements IWakeWordBackend {
  private readonly engine: Porcupine;

  constructor(accessKey: string, keyword: string, sensitivity: number) {
    this.engine = new Porcupine(accessKey, [keyword], [sensitivity]);
  }

  get frameLength(): number {
    return this.engine.frameLength;
  }

  get sampleRate(): number {
    return this.engine.sampleRate;
  }

  process(frame: Int16Array): number {
    return this.engine.process(frame);
  }

  release(): void {
    this.engine.release();
  }
}

export function porcupineFactory(accessKey: string): WakeWordBackendFactory {
  return (keyword, sensitivity) => new PorcupineBackend(accessKey, keyword, sensitivity);
}
