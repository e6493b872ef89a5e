import xmlrpc from 'xmlrpc';
import type { RpcClient } from './QueryGateway';

/**
 * XML-RPC transport for a Jdbc2Ei bridge.
 *
 * The bridge takes a user and password as the first two arguments of every
 * call; FEWS deployments leave both empty.
 */
type ClientOptions = Exclude<Parameters<typeof xmlrpc.createClient>[0], string>;

// Handed through to http.request, which aborts the request and its socket
type AbortableClientOptions = ClientOptions & { signal: AbortSignal };

export interface XmlRpcClientOptions {
  timeoutMs?: number;
}

export class XmlRpcClient implements RpcClient {
  private static readonly DEFAULT_TIMEOUT_MS = 10000;
  private readonly secure: boolean;
  private readonly timeoutMs: number;

  constructor(readonly endpoint: string, options: XmlRpcClientOptions = {}) {
    this.secure = new URL(endpoint).protocol === 'https:';
    this.timeoutMs = options.timeoutMs ?? XmlRpcClient.DEFAULT_TIMEOUT_MS;
  }

  async ping(): Promise<void> {
    await this.call('Ping.isAlive', ['', '']);
  }

  configGet(tag: string): Promise<unknown> {
    return this.call('Config.get', ['', '', tag]);
  }

  async configPut(tag: string, value: string): Promise<void> {
    await this.call('Config.put', ['', '', tag, value]);
  }

  execute(statement: string, tags: string[]): Promise<unknown> {
    return this.call('Query.execute', ['', '', statement, tags]);
  }

  private call(method: string, params: unknown[]): Promise<unknown> {
    // xmlrpc keeps one options object per client, so each call gets its own
    // client and deadline
    const options: AbortableClientOptions = {
      url: this.endpoint,
      signal: AbortSignal.timeout(this.timeoutMs),
    };
    const client = this.secure ? xmlrpc.createSecureClient(options) : xmlrpc.createClient(options);

    return new Promise((resolve, reject) => {
      client.methodCall(method, params, (error: unknown, value: unknown) => {
        if (error) {
          reject(error);
        } else {
          resolve(value);
        }
      });
    });
  }
}
