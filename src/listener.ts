import type { SSEEventListener } from './types.js';

/**
 * Fill in every optional callback, so a listener can be written with only
 * the callbacks it cares about. Callbacks are invoked on the object passed in.
 */
export function createListener(callbacks: SSEEventListener): Required<SSEEventListener> {
  return {
    onEvent: (event) => callbacks.onEvent(event),
    onStateChanged: (state) => callbacks.onStateChanged?.(state),
    onConnected: () => callbacks.onConnected?.(),
    onClosed: () => callbacks.onClosed?.(),
    onFailure: (error) => callbacks.onFailure?.(error),
    onCancelled: () => callbacks.onCancelled?.(),
  };
}
