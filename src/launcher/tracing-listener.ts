import type { TraceSink } from '../shared/logger.js';
import type { StreamListener } from '../process/types.js';

/**
 * Traces every chunk before handing it on. Built even without a delegate so
 * that debug runs record output nobody listens to.
 */
export function tracingListener(
  sink: TraceSink,
  stream: 'stdout' | 'stderr',
  delegate?: StreamListener
): StreamListener {
  return (text, monitor) => {
    sink.trace(`[${stream}] ${text}`);
    delegate?.(text, monitor);
  };
}
