import { Module } from '@nestjs/common';
import { getNodeStoreDriver } from '../config/env.config';
import { NODE_STORE, type NodeStore } from './node-store.interface';
import { InMemoryNodeStore } from './inmemory-node-store.service';
import { RedisNodeStore } from './redis-node-store.service';

/**
 * Storage module: NodeStore backed by Redis, or in-memory when NODE_STORE_DRIVER=memory.
 * The driver is read when the provider is built, after .env has been loaded.
 */
@Module({
  providers: [
    {
      provide: NODE_STORE,
      useFactory: (): NodeStore =>
        getNodeStoreDriver() === 'memory' ? new InMemoryNodeStore() : new RedisNodeStore(),
    },
  ],
  exports: [NODE_STORE],
})
export class StorageModule {}
