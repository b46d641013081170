import { readFile } from "node:fs/promises";
import { lookup } from "node:dns/promises";
import mqtt, { type IClientOptions, type MqttClient as RawMqttClient } from "mqtt";
import { ConnectionError, toConnectionError } from "../core/errors";

export type MessageHandler = (topic: string, payload: Buffer) => void;

/**
 * One open broker session. Implementations never reconnect on their own.
 */
export interface BrokerTransport {
  readonly connected: boolean;
  subscribe(topics: string[]): Promise<void>;
  unsubscribe(topics: string[]): Promise<void>;
  publish(topic: string, payload: string | Buffer): Promise<void>;
  end(): Promise<void>;
  onMessage(handler: MessageHandler): void;
  /** Fires once when the session closes, whoever closed it. */
  onClose(handler: (err?: Error) => void): void;
}

export interface TransportConnectOptions {
  url: string;
  host: string;
  port: number;
  useTls: boolean;
  username: string;
  password: string;
  clientId: string;
  keepaliveSeconds: number;
  caFile?: string;
  connectTimeoutMs: number;
  signal: AbortSignal;
}

export type TransportFactory = (options: TransportConnectOptions) => Promise<BrokerTransport>;

export class MqttBrokerTransport implements BrokerTransport {
  private closed = false;
  private readonly closeHandlers: Array<(err?: Error) => void> = [];
  private lastError: Error | undefined;

  private constructor(private readonly client: RawMqttClient) {
    client.on("error", (err) => {
      this.lastError = err;
    });
    client.on("close", () => this.handleClose());
  }

  /**
   * Resolves the host, then opens the session and waits for CONNACK.
   */
  static async connect(options: TransportConnectOptions): Promise<MqttBrokerTransport> {
    try {
      await lookup(options.host);
    } catch (err) {
      throw toConnectionError(err, `resolve ${options.host}`);
    }

    const clientOptions: IClientOptions = {
      clientId: options.clientId,
      username: options.username || undefined,
      password: options.password || undefined,
      keepalive: options.keepaliveSeconds,
      connectTimeout: options.connectTimeoutMs,
      reconnectPeriod: 0,
      clean: true
    };
    if (options.useTls && options.caFile) {
      clientOptions.ca = await readFile(options.caFile);
    }

    const client = mqtt.connect(options.url, clientOptions);
    try {
      await waitForConnack(client, options.signal);
    } catch (err) {
      client.end(true);
      throw toConnectionError(err, `connect ${options.url}`);
    }
    return new MqttBrokerTransport(client);
  }

  get connected(): boolean {
    return !this.closed && this.client.connected;
  }

  async subscribe(topics: string[]): Promise<void> {
    if (topics.length === 0) return;
    await new Promise<void>((resolve, reject) => {
      this.client.subscribe(topics, { qos: 1 }, (err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  async unsubscribe(topics: string[]): Promise<void> {
    if (topics.length === 0) return;
    await new Promise<void>((resolve, reject) => {
      this.client.unsubscribe(topics, (err?: Error) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  async publish(topic: string, payload: string | Buffer): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.client.publish(topic, payload, { qos: 1 }, (err?: Error) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  async end(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.client.end(false, {}, (err?: Error) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  onMessage(handler: MessageHandler): void {
    this.client.on("message", (topic: string, payload: Buffer) => handler(topic, payload));
  }

  onClose(handler: (err?: Error) => void): void {
    this.closeHandlers.push(handler);
  }

  private handleClose(): void {
    if (this.closed) return;
    this.closed = true;
    for (const handler of this.closeHandlers) {
      handler(this.lastError);
    }
  }
}

function waitForConnack(client: RawMqttClient, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const cleanup = (): void => {
      client.removeListener("connect", onConnect);
      client.removeListener("error", onError);
      client.removeListener("close", onClose);
      signal.removeEventListener("abort", onAbort);
    };
    const onConnect = (): void => {
      cleanup();
      resolve();
    };
    const onError = (err: Error): void => {
      cleanup();
      reject(err);
    };
    const onClose = (): void => {
      cleanup();
      reject(new ConnectionError("NETWORK", "connection closed before CONNACK"));
    };
    const onAbort = (): void => {
      cleanup();
      reject(new ConnectionError("ABORTED", "connect cancelled"));
    };

    if (signal.aborted) {
      onAbort();
      return;
    }
    client.once("connect", onConnect);
    client.once("error", onError);
    client.once("close", onClose);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export const createMqttTransport: TransportFactory = (options) => MqttBrokerTransport.connect(options);
