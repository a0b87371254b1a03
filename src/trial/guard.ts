/**
 * Non-cancellable sections. While a section is held, SIGINT/SIGTERM are recorded instead of
 * terminating the process; the recorded signal surfaces as InterruptedRestoreError once the
 * section has run to completion.
 */

import { setImmediate as nextTurn } from "timers/promises";
import { InterruptedRestoreError } from "../errors.js";
import { logStructured } from "../log.js";

const DEFERRED_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/** Where signals are observed; `process` outside tests. */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export class SignalGuard {
  private received: NodeJS.Signals | null = null;
  private held = false;
  private readonly onSignal = (signal: NodeJS.Signals): void => {
    if (this.received === null) this.received = signal;
    logStructured("signal_deferred", { signal });
  };

  constructor(private readonly source: SignalSource = process) {}

  acquire(): void {
    if (this.held) return;
    this.held = true;
    this.received = null;
    for (const s of DEFERRED_SIGNALS) this.source.on(s, this.onSignal);
  }

  /** Returns the first signal seen while held, if any. */
  release(): NodeJS.Signals | null {
    if (this.held) {
      for (const s of DEFERRED_SIGNALS) this.source.off(s, this.onSignal);
      this.held = false;
    }
    return this.received;
  }
}

/**
 * Runs `fn` with interruption deferred. Signals queued by the OS during the synchronous body
 * are only dispatched on the next event loop turn, so the guard stays held for one turn
 * before it is released.
 */
export async function nonCancellable<T>(
  fn: () => T | Promise<T>,
  source: SignalSource = process,
): Promise<T> {
  const guard = new SignalGuard(source);
  guard.acquire();
  let outcome: { ok: true; value: T } | { ok: false; error: unknown };
  try {
    outcome = { ok: true, value: await fn() };
  } catch (error) {
    outcome = { ok: false, error };
  }
  let signal: NodeJS.Signals | null;
  try {
    await nextTurn();
  } finally {
    signal = guard.release();
  }
  if (!outcome.ok) throw outcome.error;
  if (signal !== null) throw new InterruptedRestoreError(signal);
  return outcome.value;
}
