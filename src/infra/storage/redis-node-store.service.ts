import { Injectable, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { getRedisConfig } from '../config/env.config';
import type { NodeKey, NodeRecord } from '../contracts/node-record.dto';
import { isRecord } from '../contracts/json';
import type { NodeListFilter, NodeStore } from './node-store.interface';

const KEY_SEQ = 'nodes:seq';
const KEY_UUID = 'nodes:uuid';
const KEY_BYID = 'nodes:byid:';
const KEY_IDS = 'nodes:ids';

/**
 * Redis-backed NodeStore.
 * Keys come from INCR on nodes:seq; the uuid index is claimed with HSETNX so that two
 * connections registering the same uuid at once converge on a single key.
 */
@Injectable()
export class RedisNodeStore implements NodeStore, OnModuleDestroy {
  private client: Redis | null = null;

  protected createClient(): Redis {
    return new Redis(getRedisConfig());
  }

  private ensureClient(): Redis {
    if (!this.client) {
      this.client = this.createClient();
    }
    return this.client;
  }

  async findOrCreate(uuid: string): Promise<NodeRecord> {
    const client = this.ensureClient();
    const known = await this.findByUuid(client, uuid);
    if (known) return known;

    const id = await client.incr(KEY_SEQ);
    const now = new Date();
    const record: NodeRecord = { id, uuid, createdAt: now, updatedAt: now };
    // Record first, then claim: whoever wins the claim has its record readable already.
    await client.set(KEY_BYID + id, serializeRecord(record));
    const claimed = await client.hsetnx(KEY_UUID, uuid, String(id));
    if (claimed === 1) {
      await client.sadd(KEY_IDS, String(id));
      return record;
    }

    await client.del(KEY_BYID + id);
    const winner = await this.findByUuid(client, uuid);
    if (!winner) {
      throw new Error(`Node record for uuid ${uuid} is missing`);
    }
    return winner;
  }

  async findById(id: NodeKey): Promise<NodeRecord | null> {
    const json = await this.ensureClient().get(KEY_BYID + id);
    return json ? parseRecord(json) : null;
  }

  async list(filter?: NodeListFilter): Promise<NodeRecord[]> {
    const client = this.ensureClient();
    if (filter?.uuid !== undefined) {
      const record = await this.findByUuid(client, filter.uuid);
      return record ? [record] : [];
    }
    const ids = (await client.smembers(KEY_IDS))
      .map((raw) => parseInt(raw, 10))
      .filter((id) => !Number.isNaN(id))
      .sort((a, b) => a - b);
    const result: NodeRecord[] = [];
    for (const id of ids) {
      const record = await this.findById(id);
      if (record) result.push(record);
    }
    return result;
  }

  private async findByUuid(client: Redis, uuid: string): Promise<NodeRecord | null> {
    const raw = await client.hget(KEY_UUID, uuid);
    if (raw == null) return null;
    const id = parseInt(raw, 10);
    return Number.isNaN(id) ? null : this.findById(id);
  }

  async onModuleDestroy(): Promise<void> {
    await this.client?.quit();
    this.client = null;
  }
}

function serializeRecord(record: NodeRecord): string {
  return JSON.stringify({
    ...record,
    createdAt: record.createdAt.toISOString(),
    updatedAt: record.updatedAt.toISOString(),
  });
}

function parseRecord(json: string): NodeRecord | null {
  let o: unknown;
  try {
    o = JSON.parse(json);
  } catch {
    return null;
  }
  if (!isRecord(o)) return null;
  const { id, uuid, createdAt, updatedAt } = o;
  if (typeof id !== 'number' || typeof uuid !== 'string') return null;
  if (typeof createdAt !== 'string' || typeof updatedAt !== 'string') return null;
  return { id, uuid, createdAt: new Date(createdAt), updatedAt: new Date(updatedAt) };
}
