import { InboundPublish, MqttTransport, SUBACK_FAILURE, TransportFactory, TransportOptions } from '../src/ts/transport/bridge';
import { ConnectAck, QoS } from '../src/ts/api/types';

interface QueuedMessage {
  topic: string;
  payload: Buffer;
  dup: boolean;
}

interface StoredSession {
  clientId: string;
  filters: Set<string>;
  queue: QueuedMessage[];
  transport: FakeTransport | null;
}

interface ShareGroup {
  topicFilter: string;
  members: string[];
  next: number;
}

function topicMatches(filter: string, topic: string): boolean {
  const f = filter.split('/');
  const t = topic.split('/');
  for (let i = 0; i < f.length; i++) {
    if (f[i] === '#') return true;
    if (i >= t.length) return false;
    if (f[i] !== '+' && f[i] !== t[i]) return false;
  }
  return f.length === t.length;
}

/**
 * In-process stand-in for a broker with shared subscriptions and persistent
 * sessions. Messages are assigned round-robin to every member of a share
 * group; a member that is offline gets its share queued until it reconnects
 * with clean: false.
 */
export class FakeBroker {
  readonly sessions = new Map<string, StoredSession>();
  readonly transports: FakeTransport[] = [];
  readonly published: QueuedMessage[] = [];
  /** Client ids whose CONNACK is never sent. */
  readonly heldConnacks = new Set<string>();
  /** Filters answered with SUBACK 0x80. */
  readonly refusedFilters = new Set<string>();
  private readonly groups = new Map<string, ShareGroup>();
  private readonly connectFailures = new Map<string, number>();
  private packetId = 0;

  readonly factory: TransportFactory = (options: TransportOptions) => {
    const transport = new FakeTransport(this, options);
    this.transports.push(transport);
    return transport;
  };

  transportFor(clientId: string): FakeTransport {
    const transport = this.transports.find(t => t.clientId === clientId);
    if (!transport) throw new Error(`No transport for ${clientId}`);
    return transport;
  }

  failNextConnects(clientId: string, times: number): void {
    this.connectFailures.set(clientId, times);
  }

  isOnline(clientId: string): boolean {
    return this.sessions.get(clientId)?.transport?.connected ?? false;
  }

  queuedCount(clientId: string): number {
    return this.sessions.get(clientId)?.queue.length ?? 0;
  }

  /** Closes the client's connection from the broker side. */
  dropConnection(clientId: string): void {
    const session = this.sessions.get(clientId);
    const transport = session?.transport;
    if (!session || !transport) throw new Error(`${clientId} is not online`);
    session.transport = null;
    transport.interrupt(new Error('connection reset by broker'));
  }

  /** Sends a message straight to one client, bypassing routing. */
  deliverTo(clientId: string, topic: string, payload: Buffer, dup: boolean): void {
    this.enqueue(clientId, { topic, payload, dup });
  }

  handleConnect(transport: FakeTransport): Promise<ConnectAck> {
    return new Promise<ConnectAck>((resolve, reject) => {
      transport.pendingConnect = { resolve, reject };
      setImmediate(() => {
        if (transport.pendingConnect?.resolve !== resolve) return;
        const failures = this.connectFailures.get(transport.clientId) ?? 0;
        if (failures > 0) {
          this.connectFailures.set(transport.clientId, failures - 1);
          transport.pendingConnect = null;
          reject(new Error('Connection refused: not authorized'));
          return;
        }
        if (this.heldConnacks.has(transport.clientId)) return;
        transport.pendingConnect = null;
        resolve(this.accept(transport));
      });
    });
  }

  private accept(transport: FakeTransport): ConnectAck {
    const { clientId, clean } = transport;
    let session = this.sessions.get(clientId);

    const previous = session?.transport;
    if (session && previous && previous !== transport) {
      // Same client id from another connection: the older one is evicted.
      session.transport = null;
      previous.interrupt(new Error('client id taken over'));
    }

    const sessionPresent = session !== undefined && !clean;
    if (!session || clean) {
      if (session) this.forget(session);
      session = { clientId, filters: new Set(), queue: [], transport: null };
      this.sessions.set(clientId, session);
    }
    session.transport = transport;
    transport.connected = true;

    const stored = session;
    setImmediate(() => this.flush(stored));
    return { sessionPresent };
  }

  private forget(session: StoredSession): void {
    for (const group of this.groups.values()) {
      group.members = group.members.filter(id => id !== session.clientId);
    }
  }

  subscribe(transport: FakeTransport, filter: string): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      setImmediate(() => {
        const session = this.sessions.get(transport.clientId);
        if (!transport.connected || !session) {
          reject(new Error('not connected'));
          return;
        }
        const match = /^\$share\/([^/]+)\/(.+)$/.exec(filter);
        if (!match || this.refusedFilters.has(filter)) {
          resolve(SUBACK_FAILURE);
          return;
        }
        session.filters.add(filter);
        const group = this.groups.get(filter) ?? { topicFilter: match[2], members: [], next: 0 };
        if (!group.members.includes(transport.clientId)) group.members.push(transport.clientId);
        this.groups.set(filter, group);
        resolve(QoS.AtLeastOnce);
      });
    });
  }

  publish(transport: FakeTransport, topic: string, payload: Buffer): Promise<number> {
    if (!transport.connected) return Promise.reject(new Error('not connected'));
    this.published.push({ topic, payload, dup: false });
    for (const group of this.groups.values()) {
      if (group.members.length === 0 || !topicMatches(group.topicFilter, topic)) continue;
      const member = group.members[group.next % group.members.length];
      group.next++;
      this.enqueue(member, { topic, payload, dup: false });
    }
    return Promise.resolve(++this.packetId);
  }

  private enqueue(clientId: string, message: QueuedMessage): void {
    const session = this.sessions.get(clientId);
    if (!session) return;
    session.queue.push(message);
    if (session.transport) {
      setImmediate(() => this.flush(session));
    }
  }

  private flush(session: StoredSession): void {
    const transport = session.transport;
    if (!transport || !transport.connected) return;
    const pending = session.queue.splice(0);
    for (const message of pending) {
      transport.emitMessage(message);
    }
  }

  handleEnd(transport: FakeTransport): void {
    const session = this.sessions.get(transport.clientId);
    if (session?.transport === transport) {
      session.transport = null;
    }
  }
}

export class FakeTransport implements MqttTransport {
  connected = false;
  endCalls = 0;
  connectCalls = 0;
  pendingConnect: { resolve: (ack: ConnectAck) => void; reject: (err: Error) => void } | null = null;
  private readonly messageListeners: Array<(message: InboundPublish) => void> = [];
  private readonly interruptListeners: Array<(error?: Error) => void> = [];

  constructor(
    private readonly broker: FakeBroker,
    readonly options: TransportOptions,
  ) {}

  get clientId(): string {
    return this.options.clientId;
  }

  get clean(): boolean {
    return this.options.clean;
  }

  connect(): Promise<ConnectAck> {
    this.connectCalls++;
    if (this.connected || this.pendingConnect) {
      return Promise.reject(new Error('already connected'));
    }
    return this.broker.handleConnect(this);
  }

  subscribe(filter: string, _qos: QoS): Promise<number> {
    return this.broker.subscribe(this, filter);
  }

  publish(topic: string, payload: Buffer, _qos: QoS): Promise<number | undefined> {
    return this.broker.publish(this, topic, payload);
  }

  end(_force?: boolean): Promise<void> {
    this.endCalls++;
    const pending = this.pendingConnect;
    this.pendingConnect = null;
    pending?.reject(new Error('Connection closed before CONNACK'));
    if (this.connected) {
      this.connected = false;
      this.broker.handleEnd(this);
    }
    return new Promise<void>(r => setImmediate(r));
  }

  onMessage(listener: (message: InboundPublish) => void): void {
    this.messageListeners.push(listener);
  }

  onInterrupted(listener: (error?: Error) => void): void {
    this.interruptListeners.push(listener);
  }

  emitMessage(message: { topic: string; payload: Buffer; dup: boolean }): void {
    for (const listener of this.messageListeners) {
      listener({ ...message, qos: QoS.AtLeastOnce });
    }
  }

  interrupt(error: Error): void {
    this.connected = false;
    for (const listener of this.interruptListeners) {
      listener(error);
    }
  }
}
