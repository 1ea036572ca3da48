import { spawn } from 'node:child_process';
import notifier from 'node-notifier';
import type { Logger } from './logger';

// ─── Feedback Interface ───────────────────────────────────────────────────────

export type CueKind = 'wake' | 'recognized' | 'executed' | 'error' | 'timer';

/** Audible and visible responses; every method is fire-and-forget */
export interface IFeedback {
  cue(kind: CueKind): void;
  say(text: string): void;
  notify(title: string, message: string): void;
}

// ─── Mock Feedback ────────────────────────────────────────────────────────────

export class MockFeedback implements IFeedback {
  readonly cues: CueKind[] = [];
  readonly spoken: string[] = [];
  readonly notifications: Array<{ title: string; message: string }> = [];

  cue(kind: CueKind): void {
    this.cues.push(kind);
  }

  say(text: string): void {
    this.spoken.push(text);
  }

  notify(title: string, message: string): void {
    this.notifications.push({ title, message });
  }
}

// ─── System Feedback ──────────────────────────────────────────────────────────

const MAC_SOUNDS: Record<CueKind, string> = {
  wake: '/System/Library/Sounds/Tink.aiff',
  recognized: '/System/Library/Sounds/Pop.aiff',
  executed: '/System/Library/Sounds/Glass.aiff',
  error: '/System/Library/Sounds/Basso.aiff',
  timer: '/System/Library/Sounds/Ping.aiff',
};

const FREEDESKTOP_SOUNDS: Record<CueKind, string> = {
  wake: '/usr/share/sounds/freedesktop/stereo/device-added.oga',
  recognized: '/usr/share/sounds/freedesktop/stereo/message.oga',
  executed: '/usr/share/sounds/freedesktop/stereo/complete.oga',
  error: '/usr/share/sounds/freedesktop/stereo/dialog-error.oga',
  timer: '/usr/share/sounds/freedesktop/stereo/alarm-clock-elapsed.oga',
};

interface PlatformCommands {
  sound(kind: CueKind): [string, string[]] | null;
  speech(text: string): [string, string[]] | null;
}

export function platformCommands(platform: NodeJS.Platform): PlatformCommands {
  switch (platform) {
    case 'darwin':
      return {
        sound: (kind) => ['afplay', [MAC_SOUNDS[kind]]],
        speech: (text) => ['say', [text]],
      };
    case 'linux':
      return {
        sound: (kind) => ['paplay', [FREEDESKTOP_SOUNDS[kind]]],
        speech: (text) => ['espeak', [text]],
      };
    default:
      return { sound: () => null, speech: () => null };
  }
}

/**
 * Plays cues and speech through platform players spawned detached, and posts
 * desktop notifications. After the first failed notification every later one
 * is printed to the console instead.
 */
export class SystemFeedback implements IFeedback {
  private readonly commands: PlatformCommands;
  private notificationsBroken = false;

  constructor(
    private readonly log: Logger,
    platform: NodeJS.Platform = process.platform,
  ) {
    this.commands = platformCommands(platform);
  }

  cue(kind: CueKind): void {
    this.run(this.commands.sound(kind), 'sound');
  }

  say(text: string): void {
    this.log.info({ text }, 'speaking');
    this.run(this.commands.speech(text), 'speech');
  }

  notify(title: string, message: string): void {
    if (this.notificationsBroken) {
      console.log(`[${title}] ${message}`);
      return;
    }
    notifier.notify({ title, message }, (err) => {
      if (!err) return;
      this.notificationsBroken = true;
      this.log.warn({ err }, 'desktop notifications unavailable, using console output');
      console.log(`[${title}] ${message}`);
    });
  }

  private run(command: [string, string[]] | null, purpose: string): void {
    if (!command) return;
    const [bin, args] = command;
    const child = spawn(bin, args, { detached: true, stdio: 'ignore' });
    child.on('error', (err) => {
      this.log.debug({ err, bin }, `${purpose} player failed`);
    });
    child.unref();
  }
}
