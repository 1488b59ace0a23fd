/**
 * @module @sqlite-relay/worker-coordinator
 * Dispatches validated bus messages to per-kind handlers.
 */

import { decodeChannelMessage } from './messages.js';
import type { ChannelMessage, ChannelMessageType } from './messages.js';
import type { BroadcastAdapter } from './types.js';

export type MessageHandlers = {
  [K in ChannelMessageType]: (message: Extract<ChannelMessage, { type: K }>) => void;
};

export interface MessageRouter {
  /** Route one raw payload; returns false if it was dropped */
  route(data: unknown): boolean;
  /** Stop listening on the adapter */
  detach(): void;
}

/**
 * Install the single listener for a context on its bus. Payloads that do
 * not decode to a known message are handed to `onDropped` and go no further.
 */
export function createMessageRouter(
  adapter: BroadcastAdapter,
  handlers: MessageHandlers,
  onDropped?: (data: unknown) => void
): MessageRouter {
  function route(data: unknown): boolean {
    const message = decodeChannelMessage(data);
    if (!message) {
      onDropped?.(data);
      return false;
    }

    switch (message.type) {
      case 'query-request':
        handlers['query-request'](message);
        break;
      case 'query-response':
        handlers['query-response'](message);
        break;
      case 'new-leader':
        handlers['new-leader'](message);
        break;
    }
    return true;
  }

  const unsubscribe = adapter.onMessage(route);

  return {
    route,
    detach: unsubscribe,
  };
}
