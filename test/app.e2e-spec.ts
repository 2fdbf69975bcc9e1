import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { TestNodeClient, closeApp, createTestApp } from './e2e-helpers';

describe('AppController (e2e)', () => {
  let app: INestApplication;
  let port: number;

  beforeEach(async () => {
    ({ app, port } = await createTestApp());
  });

  afterEach(async () => {
    await closeApp(app);
  });

  it('/health (GET)', () => {
    return request(app.getHttpServer())
      .get('/health')
      .expect(200)
      .expect({ ok: true, connectedNodes: 0 });
  });

  it('/health counts connected nodes', async () => {
    const node = new TestNodeClient(port);
    await node.register('uuid-a');
    await request(app.getHttpServer())
      .get('/health')
      .expect(200)
      .expect({ ok: true, connectedNodes: 1 });
    node.close();
  });
});
