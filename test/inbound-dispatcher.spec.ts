import { Test } from '@nestjs/testing';
import { InMemoryNodeStore } from '../src/infra/storage/inmemory-node-store.service';
import { NODE_STORE } from '../src/infra/storage/node-store.interface';
import { InboundRequestDispatcher, REGISTER_METHOD } from '../src/modules/rpc/inbound-dispatcher.service';
import type { RegistrationContext } from '../src/modules/rpc/node-session';

function fakeContext(): RegistrationContext & { bind: jest.Mock } {
  return { nodeKey: null, bind: jest.fn() };
}

describe('InboundRequestDispatcher', () => {
  let dispatcher: InboundRequestDispatcher;
  let store: InMemoryNodeStore;

  beforeEach(async () => {
    const module = await Test.createTestingModule({
      providers: [InboundRequestDispatcher, { provide: NODE_STORE, useClass: InMemoryNodeStore }],
    }).compile();
    dispatcher = module.get(InboundRequestDispatcher);
    store = module.get(NODE_STORE);
  });

  it('registers a new uuid, binds the context and returns the key', async () => {
    const context = fakeContext();
    const reply = await dispatcher.dispatch({ method: REGISTER_METHOD, params: { uuid: 'abc' }, id: 1 }, context);

    expect(reply).toEqual({ jsonrpc: '2.0', id: 1, result: { id: 1 } });
    expect(context.bind).toHaveBeenCalledWith(1);
    await expect(store.list()).resolves.toHaveLength(1);
  });

  it('returns the same key for a uuid registered before', async () => {
    await dispatcher.dispatch({ method: REGISTER_METHOD, params: { uuid: 'abc' }, id: 1 }, fakeContext());
    await dispatcher.dispatch({ method: REGISTER_METHOD, params: { uuid: 'def' }, id: 1 }, fakeContext());
    const context = fakeContext();

    const reply = await dispatcher.dispatch({ method: REGISTER_METHOD, params: { uuid: 'abc' }, id: 'r2' }, context);

    expect(reply).toEqual({ jsonrpc: '2.0', id: 'r2', result: { id: 1 } });
    expect(context.bind).toHaveBeenCalledWith(1);
  });

  it.each([[{}], [{ uuid: '' }], [{ uuid: 42 }], [[]]])(
    'fails registration with INTERNAL_ERROR for params %j',
    async (params) => {
      const context = fakeContext();
      const reply = await dispatcher.dispatch({ method: REGISTER_METHOD, params, id: 5 }, context);

      expect(reply).toEqual({ jsonrpc: '2.0', id: 5, error: { code: -32603, message: 'Missing uuid parameter' } });
      expect(context.bind).not.toHaveBeenCalled();
    },
  );

  it('answers unknown methods with METHOD_NOT_FOUND', async () => {
    const reply = await dispatcher.dispatch({ method: 'backend.reboot', params: {}, id: 3 }, fakeContext());
    expect(reply).toEqual({ jsonrpc: '2.0', id: 3, error: { code: -32601, message: 'Method not found' } });
  });

  it('reports a bind failure as INTERNAL_ERROR with its message', async () => {
    const context = fakeContext();
    context.bind.mockImplementation(() => {
      throw new Error('Connection closed before registration completed');
    });

    const reply = await dispatcher.dispatch({ method: REGISTER_METHOD, params: { uuid: 'abc' }, id: 2 }, context);

    expect(reply).toEqual({
      jsonrpc: '2.0',
      id: 2,
      error: { code: -32603, message: 'Connection closed before registration completed' },
    });
  });

  it('sends no reply to notifications', async () => {
    const context = fakeContext();
    await expect(
      dispatcher.dispatch({ method: REGISTER_METHOD, params: { uuid: 'abc' } }, context),
    ).resolves.toBeNull();
    expect(context.bind).toHaveBeenCalledWith(1);
    await expect(dispatcher.dispatch({ method: 'backend.unknown', params: {} }, context)).resolves.toBeNull();
  });
});
