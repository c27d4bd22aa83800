/**
 * Terminal colors with --no-color support.
 *
 * @module src/cli/colors
 */

import pc from 'picocolors';

// Track whether colors are enabled (global state for CLI lifetime)
let colorsEnabled = true;

/**
 * Set colors enabled/disabled.
 * Called by applyGlobalOptions based on --no-color flag and NO_COLOR env.
 */
export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled;
}

// Wrapper functions that respect --no-color
function wrap(fn: (s: string) => string): (s: string) => string {
  return (s: string) => (colorsEnabled ? fn(s) : s);
}

// Semantic colors
export const success = wrap(pc.green);
export const warning = wrap(pc.yellow);
export const error = wrap(pc.red);
export const muted = wrap(pc.gray);

// Combined styles
export const header = (s: string): string => wrap(pc.bold)(wrap(pc.cyan)(s));
export const path = wrap(pc.underline);
