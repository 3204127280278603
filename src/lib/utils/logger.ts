import { format } from 'node:util';
import { DEBUG_NAMESPACE } from './debug.js';
import debug from 'debug';

export type WarnSink = (message: string) => void;

let sink: WarnSink | undefined;
const debugWarn = debug(`${DEBUG_NAMESPACE}:warn`);

/** Install (or clear) a sink that receives every warning. */
export function setLogger(fn: WarnSink | undefined): void {
  sink = fn;
}

export function logWarn(message: string, ...args: unknown[]): void {
  const warnMessage = `WARN: ${format(message, ...args)}`;

  if (sink) {
    sink(warnMessage);
  }

  debugWarn(warnMessage);
}
