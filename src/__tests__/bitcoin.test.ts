// src/__tests__/bitcoin.test.ts

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { post, create } = vi.hoisted(() => {
  const post = vi.fn();
  return { post, create: vi.fn(() => ({ post })) };
});

vi.mock('axios', () => ({ default: { create } }));

import { BitcoinRpc, BitcoinRpcError } from '../lib/bitcoin';

describe('BitcoinRpc', () => {
  beforeEach(() => {
    post.mockReset();
  });

  it('should configure basic auth against the node url', () => {
    new BitcoinRpc({ url: 'http://127.0.0.1:18443', user: 'rpcuser', pass: 'test-secret' });

    expect(create).toHaveBeenCalledWith(expect.objectContaining({
      baseURL: 'http://127.0.0.1:18443',
      auth: { username: 'rpcuser', password: 'test-secret' }
    }));
  });

  it('should return the block count', async () => {
    post.mockResolvedValueOnce({ data: { result: 812, error: null, id: 'escrow' } });
    const rpc = new BitcoinRpc({ url: 'http://node', user: 'u', pass: 'p' });

    await expect(rpc.getBlockCount()).resolves.toBe(812);
    expect(post).toHaveBeenCalledWith('/', {
      jsonrpc: '1.0',
      id: 'escrow',
      method: 'getblockcount',
      params: []
    });
  });

  it('should surface RPC errors', async () => {
    post.mockResolvedValueOnce({
      data: { result: null, error: { code: -28, message: 'Loading block index' }, id: 'escrow' }
    });
    const rpc = new BitcoinRpc({ url: 'http://node', user: 'u', pass: 'p' });

    const err = await rpc.getBlockCount().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BitcoinRpcError);
    expect(err).toMatchObject({
      message: 'Bitcoin RPC Error [getblockcount]: Loading block index',
      rpcCode: -28
    });
  });
});
