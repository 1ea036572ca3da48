import {
  createCommand,
  type CaptureInboxMessage,
  type Command,
  type DispatchInboxMessage,
  type StatusBus,
} from '@lightcue/pipeline-events';
import type { Channel } from '../channel';
import type { CommandDispatcher, SubCommandOutcome } from '../commandDispatcher';
import type { IFeedback } from '../feedback';
import type { Logger } from '../logger';
import { Stage, type Clock } from '../stage';

export interface DispatcherDeps {
  dispatcher: CommandDispatcher;
  inbox: Channel<DispatchInboxMessage>;
  /** Receives CommandExecuted to start the capture cooldown */
  captureInbox: Channel<CaptureInboxMessage>;
  feedback: IFeedback;
  bus: StatusBus;
  idleBackoffMs: number;
  log: Logger;
  clock?: Clock;
}

export class DispatcherStage extends Stage {
  constructor(private readonly deps: DispatcherDeps) {
    super('dispatcher', deps.log, deps.clock);
  }

  protected async step(): Promise<void> {
    const message = await this.deps.inbox.receive(this.deps.idleBackoffMs);
    if (!message || !this.running) return;

    switch (message.kind) {
      case 'CommandReady':
        await this.run(message.command);
        return;
      case 'TimerFired':
        this.log.info({ timerId: message.timerId, action: message.actionText }, 'timer expired');
        this.deps.feedback.cue('timer');
        this.deps.feedback.say(`Timer expired, ${message.actionText}`);
        this.deps.feedback.notify('Timer expired', message.actionText);
        await this.run(createCommand(message.actionText, 'timer', message.at));
        return;
    }
  }

  protected onStop(): void {
    this.deps.inbox.close();
  }

  private async run(command: Command): Promise<SubCommandOutcome[]> {
    const outcomes = await this.deps.dispatcher.execute(command);
    const at = this.clock();

    this.deps.feedback.cue('executed');
    this.deps.bus.publish({
      type: 'command',
      text: command.rawText,
      outcomes: outcomes.map((o) => o.result),
      timestamp: at,
    });
    if (!this.deps.captureInbox.trySend({ kind: 'CommandExecuted', at })) {
      this.log.warn('capture inbox full, cooldown notice dropped');
    }
    return outcomes;
  }
}
