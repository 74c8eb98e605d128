import type { Action, ThreadMarshaller } from '../types';

/**
 * Runs every action inline. Callers are always considered to be on the
 * main context, which makes notification order fully synchronous.
 */
export class ImmediateThreadMarshaller implements ThreadMarshaller {
  executeOnMainThread(action: Action): void {
    action();
  }

  isMainThread(): boolean {
    return true;
  }

  get [Symbol.toStringTag]() {
    return 'ImmediateThreadMarshaller';
  }
}
