import { consola, type ConsolaInstance } from "consola";

export interface TermlinkLogger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  success: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  withTag: (tag: string) => TermlinkLogger;
}

export function createDefaultLogger(): TermlinkLogger {
  return wrapConsola(consola);
}

function wrapConsola(instance: ConsolaInstance): TermlinkLogger {
  return {
    debug: instance.debug.bind(instance),
    info: instance.info.bind(instance),
    success: instance.success.bind(instance),
    warn: instance.warn.bind(instance),
    error: instance.error.bind(instance),
    withTag: (tag: string) => wrapConsola(instance.withTag(tag)),
  };
}

const noop = (): void => {};

export function createSilentLogger(): TermlinkLogger {
  const silent: TermlinkLogger = {
    debug: noop,
    info: noop,
    success: noop,
    warn: noop,
    error: noop,
    withTag: () => silent,
  };
  return silent;
}
