import { INestApplication, ValidationPipe } from '@nestjs/common';
import { WsAdapter } from '@nestjs/platform-ws';
import { Test } from '@nestjs/testing';
import { WebSocket, type RawData } from 'ws';
import { AppModule } from '../src/app.module';
import { NODE_RPC_CONFIG, type NodeRpcConfig } from '../src/infra/config/env.config';
import { InMemoryNodeStore } from '../src/infra/storage/inmemory-node-store.service';
import { NODE_STORE } from '../src/infra/storage/node-store.interface';

const CLOSE_TIMEOUT_MS = 5000;

/**
 * Boots AppModule on an ephemeral port with the in-memory node store.
 * Mirrors main.ts: ws adapter and the global ValidationPipe.
 */
export async function createTestApp(
  rpcConfig: NodeRpcConfig = { callTimeoutMs: 2000, failPendingOnDisconnect: true },
): Promise<{ app: INestApplication; port: number }> {
  const moduleFixture = await Test.createTestingModule({
    imports: [AppModule],
  })
    .overrideProvider(NODE_STORE)
    .useClass(InMemoryNodeStore)
    .overrideProvider(NODE_RPC_CONFIG)
    .useValue(rpcConfig)
    .compile();

  const app = moduleFixture.createNestApplication();
  app.useWebSocketAdapter(new WsAdapter(app));
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.enableShutdownHooks();
  await app.listen(0);
  const port = (app.getHttpServer().address() as { port: number }).port;
  return { app, port };
}

/**
 * Closes the NestJS app, with a timeout so Jest never hangs on a stuck socket.
 */
export async function closeApp(app: INestApplication): Promise<void> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new Error('App close timeout')), CLOSE_TIMEOUT_MS);
  });
  try {
    await Promise.race([app.close(), timeoutPromise]);
  } catch (err) {
    if (err instanceof Error && err.message === 'App close timeout') {
      console.warn('[e2e] app.close() timed out - node sockets may still be open');
    } else {
      throw err;
    }
  } finally {
    clearTimeout(timeoutId);
  }
}

type Envelope = Record<string, unknown>;

/**
 * Scripted node for e2e tests: a `ws` client on /ws/rpc that queues every envelope
 * it receives and can wait for the next one.
 */
export class TestNodeClient {
  readonly ws: WebSocket;
  private readonly inbox: Envelope[] = [];
  private waiters: Array<(envelope: Envelope) => void> = [];
  closeCode: number | null = null;

  constructor(port: number) {
    this.ws = new WebSocket(`ws://127.0.0.1:${port}/ws/rpc`);
    this.ws.on('message', (data: RawData) => {
      const envelope = JSON.parse(data.toString()) as Envelope;
      const waiter = this.waiters.shift();
      if (waiter) waiter(envelope);
      else this.inbox.push(envelope);
    });
    this.ws.on('close', (code) => {
      this.closeCode = code;
    });
  }

  opened(): Promise<void> {
    if (this.ws.readyState === WebSocket.OPEN) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.ws.once('open', () => resolve());
      this.ws.once('error', reject);
    });
  }

  closed(): Promise<number> {
    if (this.closeCode !== null) return Promise.resolve(this.closeCode);
    return new Promise((resolve) => {
      this.ws.once('close', (code) => resolve(code));
    });
  }

  send(envelope: Envelope | string): void {
    this.ws.send(typeof envelope === 'string' ? envelope : JSON.stringify(envelope));
  }

  /** Next envelope from the control plane, in arrival order. */
  next(timeoutMs = 2000): Promise<Envelope> {
    const queued = this.inbox.shift();
    if (queued) return Promise.resolve(queued);
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(new Error('No envelope received'));
      }, timeoutMs);
      const waiter = (envelope: Envelope) => {
        clearTimeout(timer);
        resolve(envelope);
      };
      this.waiters.push(waiter);
    });
  }

  /** Register under uuid and return the assigned node key. */
  async register(uuid: string, id: number | string = 1): Promise<number> {
    await this.opened();
    this.send({ jsonrpc: '2.0', method: 'backend.register', params: { uuid }, id });
    const reply = await this.next();
    const result = reply.result as { id: number } | undefined;
    if (!result) throw new Error(`Registration failed: ${JSON.stringify(reply)}`);
    return result.id;
  }

  close(): void {
    this.ws.close();
  }
}

/** Resolves once predicate holds, polling every 10ms. */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error('Condition not met in time');
    await new Promise((r) => setTimeout(r, 10));
  }
}
