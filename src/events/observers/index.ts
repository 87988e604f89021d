import { loggingObserver } from './logging.js';
import { tracingObserver } from './tracing.js';
import { streamingObserver } from './streaming.js';
import type { LogHub } from './streaming.js';
import type { Initializable } from '../types.js';

export type BuiltInObserver = 'logging' | 'tracing' | 'streaming';

export function builtInObservers(
  names: readonly BuiltInObserver[],
  hub: LogHub | null = null,
): Initializable[] {
  return names.map((name) => {
    switch (name) {
      case 'logging':
        return loggingObserver;
      case 'tracing':
        return tracingObserver;
      case 'streaming':
        return streamingObserver(hub);
    }
  });
}
