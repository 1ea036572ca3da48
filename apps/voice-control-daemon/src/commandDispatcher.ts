import { takeSnapshot, type LightHandle, type LightSnapshot, type LightStatePatch } from '@lightcue/light-bridge';
import type { Command } from '@lightcue/pipeline-events';
import { brightnessHandler, type ActionHandler, type ActionRegistry, type Magnitude } from './actionRegistry';
import { classify, splitChain, type TimeUnit } from './commandParser';
import { faultKindOf, toError } from './errors';
import type { IFeedback } from './feedback';
import type { LightStateCache } from './lightStateCache';
import type { Logger } from './logger';
import type { TimerService } from './timerService';
import type { UndoStack } from './undoStack';

export type SubCommandOutcome =
  | { text: string; result: 'scheduled'; timerId: string }
  | { text: string; result: 'undone'; restored: number }
  | { text: string; result: 'nothing-to-undo' }
  | { text: string; result: 'executed'; action: string; changed: number }
  | { text: string; result: 'no-targets' }
  | { text: string; result: 'not-recognized'; bestScore: number }
  | { text: string; result: 'failed'; error: string };

export interface CommandDispatcherDeps {
  registry: ActionRegistry;
  cache: LightStateCache;
  undo: UndoStack;
  timers: TimerService;
  feedback: IFeedback;
  log: Logger;
  fuzzyThreshold: number;
}

/**
 * Turns a Command into device mutations. SubCommands run strictly in order;
 * a failing SubCommand is logged and the chain continues.
 */
export class CommandDispatcher {
  constructor(private readonly deps: CommandDispatcherDeps) {}

  async execute(command: Command): Promise<SubCommandOutcome[]> {
    const outcomes: SubCommandOutcome[] = [];
    for (const part of splitChain(command.rawText)) {
      outcomes.push(await this.runSubCommand(part));
    }
    this.deps.log.info(
      { command: command.rawText, source: command.source, outcomes: outcomes.map((o) => o.result) },
      'command executed',
    );
    return outcomes;
  }

  private async runSubCommand(text: string): Promise<SubCommandOutcome> {
    const { registry, feedback, log, fuzzyThreshold } = this.deps;
    const classification = classify(text, registry, fuzzyThreshold);

    switch (classification.type) {
      case 'delay':
        return this.scheduleDelayed(text, classification.amount, classification.unit, classification.actionText);

      case 'undo':
        return this.undoLast(text);

      case 'percent':
        log.debug({ text, percent: classification.percent }, 'brightness percentage');
        return this.mutate(
          text,
          `${classification.percent} percent`,
          brightnessHandler(classification.brightness),
          'default',
          `Setting lights to ${Math.min(100, Math.max(0, classification.percent))} percent`,
        );

      case 'action': {
        const { match, how, magnitude } = classification;
        log.debug({ text, action: match.definition.action, phrase: match.phrase, how, score: match.score }, 'action matched');
        return this.mutate(
          text,
          match.definition.action,
          match.definition.handler,
          magnitude,
          match.definition.acknowledgment,
        );
      }

      case 'unknown':
        log.warn({ text, bestScore: classification.bestScore }, 'command not recognized');
        feedback.say(`Sorry, I did not understand: ${text}`);
        feedback.cue('error');
        return { text, result: 'not-recognized', bestScore: classification.bestScore };
    }
  }

  private scheduleDelayed(text: string, amount: number, unit: TimeUnit, actionText: string): SubCommandOutcome {
    const { timers, feedback, log } = this.deps;
    try {
      const timerId = timers.schedule(amount, unit, actionText);
      const units = amount === 1 ? unit : `${unit}s`;
      log.info({ timerId, amount, unit, actionText }, 'timer scheduled');
      feedback.say(`Timer set for ${amount} ${units}`);
      feedback.notify('Timer set', `In ${amount} ${units}: ${actionText}`);
      return { text, result: 'scheduled', timerId };
    } catch (err) {
      return this.fail(text, err);
    }
  }

  private async mutate(
    text: string,
    action: string,
    handler: ActionHandler,
    magnitude: Magnitude,
    acknowledgment: string,
  ): Promise<SubCommandOutcome> {
    const { cache, undo, feedback, log } = this.deps;
    try {
      const targets = await cache.getAll();
      if (targets.length === 0) {
        log.warn({ text }, 'no lights to control');
        feedback.say('No lights found');
        return { text, result: 'no-targets' };
      }

      const entry = new Map<string, LightSnapshot>();
      for (const light of targets) entry.set(light.id, await takeSnapshot(light));
      undo.push(entry);

      let changed = 0;
      for (const light of targets) {
        const before = entry.get(light.id);
        const patch = before ? handler(before, light.capabilities, magnitude) : null;
        if (!patch) continue;
        await light.applyState(patch);
        changed += 1;
      }
      feedback.say(acknowledgment);
      return { text, result: 'executed', action, changed };
    } catch (err) {
      return this.fail(text, err);
    }
  }

  private async undoLast(text: string): Promise<SubCommandOutcome> {
    const { cache, undo, feedback, log } = this.deps;
    const entry = undo.pop();
    if (!entry) {
      log.info('nothing to undo');
      feedback.say('Nothing to undo');
      feedback.cue('error');
      return { text, result: 'nothing-to-undo' };
    }

    feedback.say('Undoing the previous command');
    try {
      let restored = 0;
      for (const [id, snapshot] of entry) {
        const light = await cache.get(id);
        if (!light) {
          log.warn({ lightId: id }, 'light from undo history is gone');
          continue;
        }
        await restoreSnapshot(light, snapshot);
        restored += 1;
      }
      log.info({ restored }, 'undo applied');
      return { text, result: 'undone', restored };
    } catch (err) {
      return this.fail(text, err);
    }
  }

  private fail(text: string, err: unknown): SubCommandOutcome {
    const error = toError(err);
    this.deps.log.error({ err: error, kind: faultKindOf(err), text }, 'sub-command failed');
    this.deps.cache.invalidate();
    this.deps.feedback.say(`Could not complete: ${text}`);
    this.deps.feedback.cue('error');
    return { text, result: 'failed', error: error.message };
  }
}

/**
 * Power first, then levels. A light that is restored to off gets its levels
 * while it is still on, since bridges refuse level changes on an off light.
 */
export async function restoreSnapshot(light: LightHandle, snapshot: LightSnapshot): Promise<void> {
  const levels: LightStatePatch = {};
  if (snapshot.brightness !== undefined) levels.brightness = snapshot.brightness;
  if (snapshot.colorPoint !== undefined) levels.colorPoint = snapshot.colorPoint;
  const hasLevels = levels.brightness !== undefined || levels.colorPoint !== undefined;

  if (snapshot.on) {
    await light.applyState({ on: true, ...levels });
    return;
  }
  if (hasLevels && (await light.readState()).on) {
    await light.applyState(levels);
  }
  await light.applyState({ on: false });
}
