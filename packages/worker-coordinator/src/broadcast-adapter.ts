/**
 * @module @sqlite-relay/worker-coordinator
 * Broadcast adapters: native BroadcastChannel, plus an in-process bus for
 * environments (and tests) where contexts share one event loop.
 */

import type { BroadcastAdapter } from './types.js';

interface InternalSubscriber {
  dispatch(data: unknown): void;
}

/** Subscribers per channel name */
export type BroadcastRegistry = Map<string, Set<InternalSubscriber>>;

/** Shared registry so multiple adapters on the same channel can communicate. */
const channelRegistryMap: BroadcastRegistry = new Map();

export function createBroadcastRegistry(): BroadcastRegistry {
  return new Map();
}

/**
 * Creates a broadcast adapter that fans out inside the current process.
 *
 * Like the platform bus, delivery is asynchronous and each subscriber gets
 * its own structured clone. Unlike BroadcastChannel, the posting adapter
 * also receives its own messages.
 */
export function createInProcessBroadcastAdapter(
  channelName: string,
  registry: BroadcastRegistry = channelRegistryMap
): BroadcastAdapter {
  const listeners = new Set<(data: unknown) => void>();
  let closed = false;

  let channelAdapters = registry.get(channelName);
  if (!channelAdapters) {
    channelAdapters = new Set();
    registry.set(channelName, channelAdapters);
  }
  const peers = channelAdapters;

  const internal: InternalSubscriber = {
    dispatch(data: unknown): void {
      if (closed) return;
      for (const listener of listeners) {
        listener(data);
      }
    },
  };

  peers.add(internal);

  return {
    postMessage(message: unknown): void {
      if (closed) {
        throw new Error(`Broadcast channel "${channelName}" is closed`);
      }
      for (const entry of peers) {
        const copy = structuredClone(message);
        queueMicrotask(() => entry.dispatch(copy));
      }
    },

    onMessage(handler: (data: unknown) => void): () => void {
      listeners.add(handler);
      return () => {
        listeners.delete(handler);
      };
    },

    close(): void {
      closed = true;
      listeners.clear();
      peers.delete(internal);
      if (peers.size === 0 && registry.get(channelName) === peers) {
        registry.delete(channelName);
      }
    },
  };
}

/**
 * Wraps the platform BroadcastChannel (browsers, workers, Node.js).
 * Messages posted here are not delivered back to this adapter.
 */
export function createBroadcastChannelAdapter(channelName: string): BroadcastAdapter {
  const channel = new BroadcastChannel(channelName);
  const listeners = new Set<(data: unknown) => void>();
  let closed = false;

  channel.onmessage = (event: MessageEvent) => {
    for (const listener of listeners) {
      listener(event.data);
    }
  };

  return {
    postMessage(message: unknown): void {
      channel.postMessage(message);
    },

    onMessage(handler: (data: unknown) => void): () => void {
      listeners.add(handler);
      return () => {
        listeners.delete(handler);
      };
    },

    close(): void {
      if (closed) return;
      closed = true;
      listeners.clear();
      channel.onmessage = null;
      channel.close();
    },
  };
}

/**
 * Creates a broadcast adapter. Uses the native BroadcastChannel where the
 * platform has one, otherwise the in-process bus.
 */
export function createBroadcastAdapter(channelName: string): BroadcastAdapter {
  if (typeof BroadcastChannel !== 'undefined') {
    return createBroadcastChannelAdapter(channelName);
  }
  return createInProcessBroadcastAdapter(channelName);
}
