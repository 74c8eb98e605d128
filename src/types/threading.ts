import type { Action } from '.';

export interface ThreadMarshaller {
  /** Runs `action` on the main execution context, now or on a later tick. */
  executeOnMainThread(action: Action): void;

  isMainThread(): boolean;
}
