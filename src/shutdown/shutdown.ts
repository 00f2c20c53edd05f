import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../logging/logger.js";
import type { EventRecorder } from "../recorder/eventRecorder.js";

export type ShutdownPhase = {
  name: string;
  fn: () => Promise<void> | void;
  timeoutMs?: number;
  /** Called when `fn` is still running at the deadline. */
  onTimeout?: () => void;
};

export type PhaseOutcome = {
  name: string;
  ms: number;
  timedOut: boolean;
  error?: string;
};

const TIMED_OUT = Symbol("timed-out");

export class ShutdownManager {
  private phases: ShutdownPhase[] = [];
  constructor(private logger: Logger, private defaultTimeoutMs = 5000) {}

  register(phase: ShutdownPhase) {
    this.phases.push(phase);
    return this;
  }

  /**
   * Waits for the recorder's pending deliveries, then abandons whatever is
   * still queued once the phase's time is up.
   */
  registerRecorder(recorder: EventRecorder, timeoutMs?: number) {
    return this.register({
      name: `audit.flush:${recorder.component}`,
      timeoutMs,
      fn: () => recorder.flush(),
      onTimeout: () => {
        const dropped = recorder.close();
        this.logger.warn("shutdown.audit.abandoned", { component: recorder.component, dropped });
      }
    });
  }

  /** Runs phases in registration order; a failing or slow phase doesn't stop the next. */
  async execute(): Promise<PhaseOutcome[]> {
    const outcomes: PhaseOutcome[] = [];
    for (const p of this.phases) {
      const start = Date.now();
      this.logger.info("shutdown.phase.start", { name: p.name });
      const outcome: PhaseOutcome = { name: p.name, ms: 0, timedOut: false };
      let timer: NodeJS.Timeout | undefined;
      const deadline = new Promise<typeof TIMED_OUT>(resolve => {
        timer = setTimeout(() => resolve(TIMED_OUT), p.timeoutMs ?? this.defaultTimeoutMs);
      });
      try {
        const result = await Promise.race([Promise.resolve().then(p.fn), deadline]);
        outcome.timedOut = result === TIMED_OUT;
        if (outcome.timedOut) p.onTimeout?.();
      } catch (e) {
        outcome.error = errorMessage(e);
        this.logger.error("shutdown.phase.error", { name: p.name, error: outcome.error });
      } finally {
        clearTimeout(timer);
        outcome.ms = Date.now() - start;
        this.logger.info("shutdown.phase.done", { name: p.name, ms: outcome.ms, timedOut: outcome.timedOut });
      }
      outcomes.push(outcome);
    }
    return outcomes;
  }
}
