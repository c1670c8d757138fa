// Minimal logging seam: the library writes through this, the CLI swaps in a colored one.
export interface ProvisioningLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export const consoleLogger: ProvisioningLogger = {
  info: message => console.log(message),
  warn: message => console.warn(message),
  error: message => console.error(message),
  debug: message => {
    if (process.env.EHUB_DEBUG) {
      console.debug(message);
    }
  }
};

export const silentLogger: ProvisioningLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined
};
