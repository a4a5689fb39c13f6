// ============================================================================
// LOGGER — the minimal console surface components write to
// ============================================================================

/**
 * Components log tagged lines (`[StreamWaiter] ...`) through this surface.
 * The default is `console`; pass your own to route or silence output.
 */
export interface Logger {
  log(message: string): void;
  warn(message: string): void;
}

export const consoleLogger: Logger = {
  log: (message) => console.log(message),
  warn: (message) => console.warn(message),
};

export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
};
