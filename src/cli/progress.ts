/**
 * Progress rendering utilities for CLI.
 * Kept in CLI layer to avoid layer violations: the pipeline only sees the
 * ProgressReporter port.
 *
 * @module src/cli/progress
 */

import type { ProgressReporter } from '../ingestion/types';
import { type OutputPolicy, shouldShowHints } from './ui';

export type { ProgressReporter } from '../ingestion/types';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type ProgressState = {
  label: string;
  done: number;
  total: number;
};

export type ProgressCallback = (state: ProgressState) => void;

const BAR_WIDTH = 24;

// ─────────────────────────────────────────────────────────────────────────────
// Formatting
// ─────────────────────────────────────────────────────────────────────────────

export function progressPercent(state: ProgressState): number {
  if (state.total <= 0) {
    return 100;
  }
  return Math.min(100, (state.done / state.total) * 100);
}

/**
 * Render "label [#####-------]  42% (21/50)".
 */
export function formatProgressLine(
  state: ProgressState,
  width = BAR_WIDTH
): string {
  const percent = progressPercent(state);
  const filled = Math.round((percent / 100) * width);
  const bar = `${'#'.repeat(filled)}${'-'.repeat(width - filled)}`;
  const pct = percent.toFixed(0).padStart(3, ' ');
  return `${state.label} [${bar}] ${pct}% (${state.done}/${state.total})`;
}

// ─────────────────────────────────────────────────────────────────────────────
// Progress Renderers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a terminal progress renderer.
 * Writes progress to stderr with carriage return for in-place updates.
 */
export function createProgressRenderer(): ProgressCallback {
  return (state) => {
    process.stderr.write(`\r${formatProgressLine(state)}`);
  };
}

/**
 * Create a throttled progress renderer.
 * Emits at most once per interval, plus always on completion.
 *
 * @param renderer - Underlying renderer to throttle
 * @param intervalMs - Minimum interval between emissions (default: 100ms)
 */
export function createThrottledProgressRenderer(
  renderer: ProgressCallback,
  intervalMs = 100
): ProgressCallback {
  let lastEmit = Number.NEGATIVE_INFINITY;

  return (state) => {
    const now = Date.now();
    const isComplete = state.done >= state.total;

    if (isComplete || now - lastEmit >= intervalMs) {
      renderer(state);
      lastEmit = now;
    }
  };
}

/**
 * Create a non-TTY progress renderer (periodic line output).
 * For non-interactive contexts like CI or logs.
 */
export function createNonTtyProgressRenderer(
  intervalMs = 5000
): ProgressCallback {
  return createThrottledProgressRenderer((state) => {
    process.stderr.write(
      `${state.label}: ${state.done}/${state.total} (${progressPercent(state).toFixed(0)}%)\n`
    );
  }, intervalMs);
}

// ─────────────────────────────────────────────────────────────────────────────
// Reporters
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Drive a renderer from advance()/finish() calls.
 * `onFinish` runs once, after the final state is rendered.
 */
export function createProgressReporter(
  total: number,
  label: string,
  render: ProgressCallback,
  onFinish?: () => void
): ProgressReporter {
  let done = 0;
  let finished = false;

  return {
    advance(n = 1) {
      if (finished) {
        return;
      }
      done = Math.min(total, done + n);
      render({ label, done, total });
    },
    finish() {
      if (finished) {
        return;
      }
      finished = true;
      onFinish?.();
    },
  };
}

/** Reporter that renders nothing */
export function createSilentProgressReporter(): ProgressReporter {
  return {
    advance() {
      // Nothing to render
    },
    finish() {
      // Nothing to render
    },
  };
}

/**
 * Pick a reporter for the current output policy.
 * Quiet or JSON runs get none; a TTY gets an in-place bar; anything else
 * gets periodic lines.
 */
export function selectProgressReporter(
  policy: OutputPolicy,
  total: number,
  label: string
): ProgressReporter {
  if (policy.quiet || policy.json) {
    return createSilentProgressReporter();
  }
  if (shouldShowHints(policy)) {
    return createProgressReporter(
      total,
      label,
      createThrottledProgressRenderer(createProgressRenderer()),
      () => {
        process.stderr.write('\n');
      }
    );
  }
  return createProgressReporter(total, label, createNonTtyProgressRenderer());
}
