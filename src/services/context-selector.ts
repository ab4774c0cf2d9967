import type { CloudContext } from '../config/types';
import type { ContextStore } from './context-store';

/**
 * Read and switch operations over the context store.
 *
 * `showCurrent` returns the full record, token included. That matches what
 * `current-context` has always printed; callers that log it should redact.
 */
export class ContextSelector {
  constructor(
    private readonly store: Pick<ContextStore, 'getCurrentContext' | 'listContextNames' | 'setCurrentContext'>
  ) {}

  showCurrent(): CloudContext {
    return this.store.getCurrentContext();
  }

  list(): string[] {
    return this.store.listContextNames();
  }

  switch(name: string): CloudContext {
    return this.store.setCurrentContext(name);
  }
}
