import type { BaseLogger } from 'pino';
import type { EventKind } from '../domain/index.js';
import type { DispatchFanout, DispatchReport } from './dispatch-fanout.js';
import type { EventTask } from './event-tasks.js';
import { abortableSleep, type Sleep } from './sleep.js';
import type { SubscriptionRegistry } from './subscription-registry.js';

export type TaskState =
  | { status: 'idle' }
  | { status: 'waiting'; nextFireTime: Date }
  | { status: 'firing'; firedAt: Date };

/** Largest delay `setTimeout` accepts (~24.8 days); longer waits are chunked. */
export const MAX_TIMER_MS = 2_147_483_647;

export interface NotificationSchedulerOptions {
  tasks: readonly EventTask[];
  registry: Pick<SubscriptionRegistry, 'subscribersOf'>;
  fanout: Pick<DispatchFanout, 'dispatch'>;
  log: BaseLogger;
  clock?: () => Date;
  sleep?: Sleep;
}

/**
 * Runs one independent loop per event task:
 * wait for the next occurrence, build the payload, fan it out, repeat.
 *
 * A failure inside one loop is logged and that loop moves on to its next
 * occurrence; the other loops never notice.
 */
export class NotificationScheduler {
  private readonly tasks = new Map<EventKind, EventTask>();
  private readonly states = new Map<EventKind, TaskState>();
  private readonly loops = new Map<EventKind, Promise<void>>();
  private readonly registry: Pick<SubscriptionRegistry, 'subscribersOf'>;
  private readonly fanout: Pick<DispatchFanout, 'dispatch'>;
  private readonly log: BaseLogger;
  private readonly clock: () => Date;
  private readonly sleep: Sleep;
  private controller = new AbortController();

  constructor(options: NotificationSchedulerOptions) {
    for (const task of options.tasks) {
      if (this.tasks.has(task.kind)) {
        throw new Error(`Duplicate event task for ${task.kind}`);
      }
      this.tasks.set(task.kind, task);
      this.states.set(task.kind, { status: 'idle' });
    }
    this.registry = options.registry;
    this.fanout = options.fanout;
    this.log = options.log;
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? abortableSleep;
  }

  get running(): boolean {
    return this.loops.size > 0;
  }

  start(): void {
    if (this.running) {
      throw new Error('Scheduler is already running');
    }
    this.controller = new AbortController();
    const signal = this.controller.signal;

    for (const task of this.tasks.values()) {
      const loop = this.runLoop(task, signal).finally(() => {
        this.states.set(task.kind, { status: 'idle' });
      });
      this.loops.set(task.kind, loop);
    }
    this.log.info({ kinds: [...this.tasks.keys()] }, 'Scheduler started');
  }

  /** Aborts pending waits and resolves once every loop has exited. */
  async stop(): Promise<void> {
    this.controller.abort();
    await Promise.all(this.loops.values());
    this.loops.clear();
    this.log.info('Scheduler stopped');
  }

  state(kind: EventKind): TaskState {
    return this.states.get(kind) ?? { status: 'idle' };
  }

  /** Fires a task once, immediately, without checking whether it is due. */
  async fireNow(kind: EventKind): Promise<DispatchReport | null> {
    const task = this.tasks.get(kind);
    if (!task) {
      throw new Error(`No event task for ${kind}`);
    }
    const previous = this.state(kind);
    try {
      return await this.fire(task, this.controller.signal, true);
    } finally {
      this.states.set(kind, previous);
    }
  }

  private async runLoop(task: EventTask, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const now = this.clock();
      let next: Date;
      try {
        next = task.nextFireTime(now);
      } catch (err: unknown) {
        this.log.error({ err, kind: task.kind }, 'Could not compute next fire time, stopping loop');
        return;
      }
      if (next.getTime() <= now.getTime()) {
        this.log.error({ kind: task.kind, next: next.toISOString() }, 'Next fire time is not in the future, stopping loop');
        return;
      }

      this.states.set(task.kind, { status: 'waiting', nextFireTime: next });
      this.log.debug({ kind: task.kind, next: next.toISOString() }, 'Waiting for next occurrence');

      const reached = await this.waitUntil(next, signal);
      if (!reached) return;

      await this.fire(task, signal, false);
    }
  }

  private async waitUntil(target: Date, signal: AbortSignal): Promise<boolean> {
    for (;;) {
      if (signal.aborted) return false;
      const remaining = target.getTime() - this.clock().getTime();
      if (remaining <= 0) return true;
      await this.sleep(Math.min(remaining, MAX_TIMER_MS), signal);
    }
  }

  private async fire(task: EventTask, signal: AbortSignal, force: boolean): Promise<DispatchReport | null> {
    const firedAt = this.clock();
    if (!force && !task.isDue(firedAt)) {
      this.log.warn({ kind: task.kind, fired_at: firedAt.toISOString() }, 'Woke up outside the firing window, skipping');
      return null;
    }

    this.states.set(task.kind, { status: 'firing', firedAt });
    try {
      const payload = await task.buildPayload(firedAt, signal);
      const subscribers = await this.registry.subscribersOf(task.kind);
      const report = await this.fanout.dispatch(subscribers.map((destination) => ({ destination, payload })));

      this.log.info(
        {
          kind: task.kind,
          subscribers: subscribers.length,
          delivered: report.delivered.length,
          failed: report.failed.length,
          deregistered: report.deregistered.length,
        },
        'Event dispatched',
      );
      return report;
    } catch (err: unknown) {
      this.log.error({ err, kind: task.kind }, 'Event task failed');
      return null;
    }
  }
}
