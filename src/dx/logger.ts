const PREFIX = '[opbuild]';

let enabled = false;

export function isDebugEnabled(): boolean {
  return enabled || process.env.OPBUILD_DEBUG === '1';
}

/**
 * Enable/disable debug logging programmatically.
 *
 * Used by the `--debug` flag, the config file and tests.
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

export function logDebug(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.log(PREFIX, ...args);
}

// Not gated by debug.
export function logInfo(...args: unknown[]) {
  // eslint-disable-next-line no-console
  console.log(PREFIX, ...args);
}

export function logError(...args: unknown[]) {
  // eslint-disable-next-line no-console
  console.error(PREFIX, ...args);
}
