import axios, { type AxiosInstance } from 'axios';

export interface BitcoinRpcConfig {
  readonly url: string;
  readonly user: string;
  readonly pass: string;
}

interface RpcResponse<T> {
  result: T | null;
  error: { code: number; message: string } | null;
  id: string;
}

export class BitcoinRpcError extends Error {
  constructor(
    public readonly method: string,
    message: string,
    public readonly rpcCode?: number
  ) {
    super(`Bitcoin RPC Error [${method}]: ${message}`);
    this.name = 'BitcoinRpcError';
  }
}

export class BitcoinRpc {
  private readonly client: AxiosInstance;

  constructor(config: BitcoinRpcConfig) {
    // Disable axios errors on 400/500 so the RPC error body can be read
    this.client = axios.create({
      baseURL: config.url,
      auth: { username: config.user, password: config.pass },
      headers: { 'Content-Type': 'application/json' },
      validateStatus: () => true
    });
  }

  async call<T>(method: string, params: unknown[] = []): Promise<T> {
    const { data } = await this.client.post<RpcResponse<T>>('/', {
      jsonrpc: '1.0',
      id: 'escrow',
      method,
      params
    });
    if (data.error) {
      throw new BitcoinRpcError(method, data.error.message, data.error.code);
    }
    if (data.result === null) {
      throw new BitcoinRpcError(method, 'empty result');
    }
    return data.result;
  }

  getBlockCount(): Promise<number> {
    return this.call<number>('getblockcount');
  }
}
