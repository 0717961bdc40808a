/**
 * @mqproxy/proxy - Connection State
 * Base class for components that own one broker channel and follow
 * the connection's connectivity signals.
 */

import type { Logger } from "@mqproxy/core";
import { createLogger, logError } from "@mqproxy/core";
import { NotConnectedError, TransportError } from "./errors.js";
import type { BrokerChannel, BrokerConnection, ConnectionState, Unsubscribe } from "./types.js";

export interface ChannelOwnerOptions {
  /** Name used in logs and errors */
  name?: string;
  /** Logger */
  logger?: Logger;
}

/**
 * Channel owner state machine.
 *
 * `disconnected` is the initial state. A connected signal opens a fresh channel
 * and runs `onChannel`; only once that setup finishes does the owner become
 * `connected`. A disconnected signal drops the channel and calls `onDisconnected`.
 * When the broker closes the channel while the connection stays up, the owner
 * drops to `disconnected` and sets up a fresh channel. It never reconnects the
 * connection itself.
 */
export abstract class ChannelOwner {
  readonly ownerName: string;
  protected readonly logger: Logger;

  private currentState: ConnectionState = "disconnected";
  private currentChannel: BrokerChannel | null = null;
  private connection: BrokerConnection | null = null;
  private generation = 0;
  private stopped = false;
  private readonly subscriptions: Unsubscribe[] = [];
  private readonly stateListeners = new Set<(state: ConnectionState) => void>();
  private connectedWaiters: Array<{ resolve: () => void; reject: (error: Error) => void }> = [];

  constructor(defaultName: string, options: ChannelOwnerOptions = {}) {
    this.ownerName = options.name ?? defaultName;
    this.logger = options.logger ?? createLogger({ name: this.ownerName });
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get isConnected(): boolean {
    return this.currentState === "connected";
  }

  /**
   * The owned channel, only while connected
   */
  protected get activeChannel(): BrokerChannel | null {
    return this.currentState === "connected" ? this.currentChannel : null;
  }

  /**
   * Whether callbacks registered during setup `generation` may still act
   */
  protected isCurrent(generation: number): boolean {
    return !this.stopped && generation === this.generation;
  }

  /**
   * Attach to a connection and follow its signals
   */
  start(connection: BrokerConnection): this {
    if (this.connection) {
      throw new Error(`${this.ownerName} is already started`);
    }
    this.connection = connection;
    this.stopped = false;
    this.subscriptions.push(
      connection.onConnected(() => this.handleConnected()),
      connection.onDisconnected((error) => this.handleDisconnected(error))
    );

    if (connection.isConnected) {
      this.handleConnected();
    }
    return this;
  }

  /**
   * Detach from the connection and close the owned channel
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.generation++;
    for (const unsubscribe of this.subscriptions.splice(0)) {
      unsubscribe();
    }
    this.connection = null;

    const channel = this.currentChannel;
    this.currentChannel = null;
    this.transition("disconnected");
    this.onDisconnected();
    this.rejectWaiters(new NotConnectedError(this.ownerName));

    if (channel) {
      await this.closeQuietly(channel);
    }
  }

  /**
   * Resolve once the owner is connected (immediately if it already is).
   * Rejects with TransportError when channel setup fails, or with
   * NotConnectedError when the owner is stopped first.
   */
  whenConnected(): Promise<void> {
    if (this.isConnected) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.connectedWaiters.push({ resolve, reject });
    });
  }

  /**
   * Listen to state transitions
   */
  onStateChange(listener: (state: ConnectionState) => void): Unsubscribe {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  /**
   * Declare topology and start consuming on a fresh channel
   */
  protected abstract onChannel(channel: BrokerChannel, generation: number): Promise<void>;

  /**
   * Called whenever the owner loses its channel
   */
  protected onDisconnected(): void {}

  private handleConnected(): void {
    const generation = ++this.generation;
    this.setup(generation).catch((error: unknown) => {
      logError(this.logger, error, "channel setup failed");
      if (this.isCurrent(generation)) {
        this.rejectWaiters(new TransportError(`${this.ownerName} channel setup failed`, error));
      }
    });
  }

  private async setup(generation: number): Promise<void> {
    const connection = this.connection;
    if (!connection) return;

    const channel = await connection.createChannel();
    if (!this.isCurrent(generation)) {
      await this.closeQuietly(channel);
      return;
    }
    channel.onClose((error) => this.handleChannelClosed(channel, error));

    try {
      await this.onChannel(channel, generation);
    } catch (error) {
      await this.closeQuietly(channel);
      throw error;
    }
    if (!this.isCurrent(generation)) {
      await this.closeQuietly(channel);
      return;
    }

    this.currentChannel = channel;
    this.transition("connected");
  }

  private async closeQuietly(channel: BrokerChannel): Promise<void> {
    try {
      await channel.close();
    } catch (error) {
      logError(this.logger, error, "failed to close channel");
    }
  }

  /**
   * A channel that closes with its connection is left to the disconnected signal
   */
  private handleChannelClosed(channel: BrokerChannel, error?: Error): void {
    if (channel !== this.currentChannel || !this.connection?.isConnected) return;

    this.generation++;
    this.currentChannel = null;
    this.logger.warn("channel closed by broker", { error: error?.message ?? null });
    this.transition("disconnected");
    this.onDisconnected();
    this.handleConnected();
  }

  private handleDisconnected(error?: Error): void {
    this.generation++;
    this.currentChannel = null;
    if (error) {
      this.logger.warn("connection lost", { error: error.message });
    }
    this.transition("disconnected");
    this.onDisconnected();
  }

  private transition(next: ConnectionState): void {
    if (this.currentState === next) return;
    this.currentState = next;
    this.logger.info(`${this.ownerName} ${next}`);

    for (const listener of this.stateListeners) {
      listener(next);
    }

    if (next === "connected") {
      const waiters = this.connectedWaiters;
      this.connectedWaiters = [];
      for (const waiter of waiters) {
        waiter.resolve();
      }
    }
  }

  private rejectWaiters(error: Error): void {
    const waiters = this.connectedWaiters;
    this.connectedWaiters = [];
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }
}
