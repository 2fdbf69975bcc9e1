import { INestApplication } from '@nestjs/common';
import { NodeRpcService } from '../src/modules/rpc/node-rpc.service';
import { NodeNotConnectedError, RemoteRpcError } from '../src/modules/rpc/rpc-errors';
import { TestNodeClient, closeApp, createTestApp, waitFor } from './e2e-helpers';

describe('Node RPC over WebSocket (e2e)', () => {
  let app: INestApplication;
  let port: number;
  let nodeRpc: NodeRpcService;
  const clients: TestNodeClient[] = [];

  function connect(): TestNodeClient {
    const client = new TestNodeClient(port);
    clients.push(client);
    return client;
  }

  beforeEach(async () => {
    ({ app, port } = await createTestApp());
    nodeRpc = app.get(NodeRpcService);
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) client.close();
    await closeApp(app);
  });

  it('registers a node and answers its calls', async () => {
    const node = connect();
    const key = await node.register('uuid-a');
    expect(key).toBe(1);
    expect(nodeRpc.isConnected(1)).toBe(true);

    const reply = nodeRpc.call(1, 'node.get_device_types');
    const request = await node.next();
    expect(request).toEqual({ jsonrpc: '2.0', method: 'node.get_device_types', params: {}, id: 1 });
    node.send({ jsonrpc: '2.0', id: request.id, result: { robot: {} } });

    await expect(reply).resolves.toEqual({ robot: {} });
    expect(nodeRpc.pendingCalls(1)).toBe(0);
  });

  it('surfaces a remote error', async () => {
    const node = connect();
    await node.register('uuid-a');

    const reply = nodeRpc.call(1, 'node.test_device', { category: 'robot' });
    const request = await node.next();
    node.send({ jsonrpc: '2.0', id: request.id, error: { code: -32000, message: 'device busy' } });

    const err = await reply.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RemoteRpcError);
    expect(err).toMatchObject({ code: -32000, remoteMessage: 'device busy' });
  });

  it('answers unknown node-initiated methods with METHOD_NOT_FOUND', async () => {
    const node = connect();
    await node.opened();
    node.send({ jsonrpc: '2.0', method: 'backend.reboot', params: {}, id: 'r1' });
    await expect(node.next()).resolves.toEqual({
      jsonrpc: '2.0',
      id: 'r1',
      error: { code: -32601, message: 'Method not found' },
    });
  });

  it('keeps the connection open after a malformed frame', async () => {
    const node = connect();
    await node.opened();
    node.send('{not json');
    node.send({ jsonrpc: '2.0', method: 'backend.register', params: {}, id: 2 });
    await expect(node.next()).resolves.toEqual({
      jsonrpc: '2.0',
      id: 2,
      error: { code: -32603, message: 'Missing uuid parameter' },
    });
    await expect(node.register('uuid-a', 3)).resolves.toBe(1);
  });

  it('answers a request with an unusable id with INVALID_REQUEST', async () => {
    const node = connect();
    await node.opened();
    node.send({ jsonrpc: '2.0', method: 'backend.nope', id: { a: 1 } });
    await expect(node.next()).resolves.toEqual({
      jsonrpc: '2.0',
      id: { a: 1 },
      error: { code: -32600, message: 'id must be a number or string' },
    });
    await expect(node.register('uuid-a', 2)).resolves.toBe(1);
  });

  it('closes the older connection when a node reconnects', async () => {
    const first = connect();
    await first.register('uuid-a');
    const second = connect();
    await second.register('uuid-a');

    await expect(first.closed()).resolves.toBe(4000);
    expect(nodeRpc.isConnected(1)).toBe(true);

    const reply = nodeRpc.call(1, 'node.get_rpc_methods');
    const request = await second.next();
    second.send({ jsonrpc: '2.0', id: request.id, result: { methods: {} } });
    await expect(reply).resolves.toEqual({ methods: {} });
  });

  it('fails pending calls and unregisters when the node disconnects', async () => {
    const node = connect();
    await node.register('uuid-a');
    const reply = nodeRpc.call(1, 'node.get_rpc_methods');
    await node.next();

    node.close();

    await expect(reply).rejects.toThrow('Node 1 disconnected: connection closed');
    await waitFor(() => !nodeRpc.isConnected(1));
    await expect(nodeRpc.call(1, 'node.get_rpc_methods')).rejects.toBeInstanceOf(NodeNotConnectedError);
  });

  it('delivers notifications without an id', async () => {
    const node = connect();
    await node.register('uuid-a');

    await nodeRpc.notify(1, 'node.update_config', { reload: true });

    await expect(node.next()).resolves.toEqual({
      jsonrpc: '2.0',
      method: 'node.update_config',
      params: { reload: true },
    });
  });
});
