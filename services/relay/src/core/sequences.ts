import { randomUUID } from "node:crypto";

export interface CommandStep {
  command: string;
  /** Pause after sending, before the next step. */
  delayAfterMs: number;
}

export interface CommandSink {
  sendCommand(text: string): void;
}

export interface SequenceStats {
  sent: number;
  total: number;
}

export interface SequenceSession {
  id: string;
  name: string;
  startedAt: string;
  stats: SequenceStats;
  done: Promise<void>;
  cancel: () => void;
}

const DEFAULT_SOLENOIDS = 16;

function solenoid(index: number, on: boolean): string {
  return `s${String(index)}${on ? "1" : "0"}`;
}

/**
 * Energise solenoids 1..n one after another, hold them all, then release
 * them in a burst.
 */
export function buildPreciseSequence(
  options: { solenoidCount?: number; staggerMs?: number; holdMs?: number } = {}
): CommandStep[] {
  const { solenoidCount = DEFAULT_SOLENOIDS, staggerMs = 50, holdMs = 4000 } = options;
  const steps: CommandStep[] = [];
  for (let i = 1; i <= solenoidCount; i += 1) {
    steps.push({ command: solenoid(i, true), delayAfterMs: i < solenoidCount ? staggerMs : holdMs });
  }
  for (let i = 1; i <= solenoidCount; i += 1) {
    steps.push({ command: solenoid(i, false), delayAfterMs: 0 });
  }
  return steps;
}

/** Sweep on 1..n, then off n..1, repeated `cycles` times. */
export function buildSweepSequence(
  options: { solenoidCount?: number; cycles?: number; stepMs?: number } = {}
): CommandStep[] {
  const { solenoidCount = DEFAULT_SOLENOIDS, cycles = 5, stepMs = 20 } = options;
  const steps: CommandStep[] = [];
  for (let cycle = 0; cycle < cycles; cycle += 1) {
    for (let i = 1; i <= solenoidCount; i += 1) {
      steps.push({ command: solenoid(i, true), delayAfterMs: stepMs });
    }
    for (let i = solenoidCount; i >= 1; i -= 1) {
      steps.push({ command: solenoid(i, false), delayAfterMs: stepMs });
    }
  }
  return steps;
}

function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const finish = (): void => {
      clearTimeout(timer);
      signal.removeEventListener("abort", finish);
      resolve();
    };
    const timer = setTimeout(finish, ms);
    signal.addEventListener("abort", finish, { once: true });
  });
}

/**
 * Plays timed command sequences in the background. Each sequence only ever
 * calls `sendCommand`, so it cannot hold up the transport.
 */
export class SequenceRunner {
  private readonly sessions = new Map<string, SequenceSession>();

  constructor(private readonly sink: CommandSink) {}

  list(): SequenceSession[] {
    return Array.from(this.sessions.values());
  }

  get(id: string): SequenceSession | undefined {
    return this.sessions.get(id);
  }

  start(name: string, steps: CommandStep[]): SequenceSession {
    const id = randomUUID();
    const controller = new AbortController();
    const stats: SequenceStats = { sent: 0, total: steps.length };
    const done = this.play(steps, stats, controller.signal).finally(() => {
      this.sessions.delete(id);
    });

    const session: SequenceSession = {
      id,
      name,
      startedAt: new Date().toISOString(),
      stats,
      done,
      cancel: () => controller.abort()
    };
    this.sessions.set(id, session);
    return session;
  }

  stop(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    session.cancel();
    return true;
  }

  async stopAll(): Promise<void> {
    const sessions = this.list();
    sessions.forEach((session) => session.cancel());
    await Promise.all(sessions.map((session) => session.done));
  }

  private async play(steps: CommandStep[], stats: SequenceStats, signal: AbortSignal): Promise<void> {
    for (const step of steps) {
      if (signal.aborted) return;
      this.sink.sendCommand(step.command);
      stats.sent += 1;
      if (step.delayAfterMs > 0) {
        await pause(step.delayAfterMs, signal);
      }
    }
  }
}
