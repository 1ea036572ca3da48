import { setTimeout as delay } from 'node:timers/promises';
import { LinkButtonNotPressedError, pairWithBridge } from '@lightcue/light-bridge';
import {
  loadBridgeCredentials,
  resolveBridgeCredentials,
  saveBridgeCredentials,
  type BridgeCredentials,
  type Env,
} from './config';
import { ConfigError } from './errors';
import type { IFeedback } from './feedback';
import type { Logger } from './logger';

export interface BridgeSetupOptions {
  env: Env;
  log: Logger;
  feedback: IFeedback;
  pair?: (address: string) => Promise<string>;
  sleep?: (ms: number) => Promise<void>;
  /** Pairing attempts while waiting for the link button */
  attempts?: number;
  retryDelayMs?: number;
}

/**
 * Environment and persisted credentials first; with an address but no token,
 * pairs with the bridge and persists the issued token once.
 */
export async function connectBridge(options: BridgeSetupOptions): Promise<BridgeCredentials> {
  const { env, log, feedback } = options;
  const pair = options.pair ?? ((address: string) => pairWithBridge(address));
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const attempts = options.attempts ?? 6;
  const retryDelayMs = options.retryDelayMs ?? 5_000;

  const persisted = await loadBridgeCredentials(env.BRIDGE_CONFIG_FILE);
  const { bridgeAddress, authToken } = resolveBridgeCredentials(env, persisted);

  if (!bridgeAddress) {
    throw new ConfigError(`No bridge address: set HUE_BRIDGE_IP or add it to ${env.BRIDGE_CONFIG_FILE}`);
  }
  if (authToken) return { bridgeAddress, authToken };

  log.info({ bridgeAddress }, 'no auth token, pairing with bridge');
  feedback.say('Press the link button on your light bridge');

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      const issued = await pair(bridgeAddress);
      const credentials = { bridgeAddress, authToken: issued };
      await saveBridgeCredentials(env.BRIDGE_CONFIG_FILE, credentials);
      log.info({ file: env.BRIDGE_CONFIG_FILE }, 'paired with bridge, credentials saved');
      return credentials;
    } catch (err) {
      if (!(err instanceof LinkButtonNotPressedError) || attempt === attempts) throw err;
      log.info({ attempt, attempts }, 'waiting for the link button');
      await sleep(retryDelayMs);
    }
  }
  throw new ConfigError('Pairing with the bridge did not complete');
}
