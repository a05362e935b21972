import { ConnectionFault } from '@transit-pulse/domain';

/** Anything that can take a serialized frame; `send` throws when the peer is gone. */
export interface RealtimeConnection {
  readonly id: string;
  send(frame: string): void;
}

export const GLOBAL_TOPIC = '*';

export interface HubStats {
  topics: number;
  connections: number;
  subscriptions: number;
}

/**
 * Topic-keyed fan-out. Best effort, at most once, nothing buffered:
 * a connection only sees messages published after it subscribed.
 */
export class BroadcastHub {
  private readonly topics = new Map<string, Set<RealtimeConnection>>();
  private readonly memberships = new Map<RealtimeConnection, Set<string>>();

  subscribe(connection: RealtimeConnection, key: string = GLOBAL_TOPIC): void {
    let subscribers = this.topics.get(key);
    if (!subscribers) {
      subscribers = new Set();
      this.topics.set(key, subscribers);
    }
    subscribers.add(connection);

    let keys = this.memberships.get(connection);
    if (!keys) {
      keys = new Set();
      this.memberships.set(connection, keys);
    }
    keys.add(key);
  }

  unsubscribe(connection: RealtimeConnection, key: string = GLOBAL_TOPIC): void {
    const subscribers = this.topics.get(key);
    if (subscribers) {
      subscribers.delete(connection);
      if (subscribers.size === 0) this.topics.delete(key);
    }
    const keys = this.memberships.get(connection);
    if (keys) {
      keys.delete(key);
      if (keys.size === 0) this.memberships.delete(connection);
    }
  }

  /** Drops the connection from every topic it held. */
  removeConnection(connection: RealtimeConnection): void {
    const keys = this.memberships.get(connection);
    if (!keys) return;
    for (const key of [...keys]) {
      this.unsubscribe(connection, key);
    }
  }

  /** Returns how many subscribers the frame reached. */
  publish(message: unknown, key: string = GLOBAL_TOPIC): number {
    const subscribers = this.topics.get(key);
    if (!subscribers || subscribers.size === 0) return 0;

    const frame = typeof message === 'string' ? message : JSON.stringify(message);
    let delivered = 0;
    // Iterate a snapshot: failed sends mutate the live set.
    for (const connection of [...subscribers]) {
      try {
        connection.send(frame);
        delivered += 1;
      } catch (err) {
        const fault =
          err instanceof ConnectionFault
            ? err
            : new ConnectionFault(`send to ${connection.id} failed`, { cause: err });
        console.warn(`[broadcast] dropping ${connection.id} from all topics: ${fault.message}`);
        this.removeConnection(connection);
      }
    }
    return delivered;
  }

  subscriberCount(key: string = GLOBAL_TOPIC): number {
    return this.topics.get(key)?.size ?? 0;
  }

  stats(): HubStats {
    let subscriptions = 0;
    for (const subscribers of this.topics.values()) subscriptions += subscribers.size;
    return { topics: this.topics.size, connections: this.memberships.size, subscriptions };
  }
}
