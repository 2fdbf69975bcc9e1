import { Injectable } from '@nestjs/common';
import type { NodeKey, NodeRecord } from '../contracts/node-record.dto';
import type { NodeListFilter, NodeStore } from './node-store.interface';

/**
 * In-memory NodeStore implementation for tests and single-process runs.
 * Keys start at 1; identities are lost on restart.
 */
@Injectable()
export class InMemoryNodeStore implements NodeStore {
  private readonly byId = new Map<NodeKey, NodeRecord>();
  private readonly idByUuid = new Map<string, NodeKey>();
  private lastId = 0;

  async findOrCreate(uuid: string): Promise<NodeRecord> {
    const existingId = this.idByUuid.get(uuid);
    const existing = existingId === undefined ? undefined : this.byId.get(existingId);
    if (existing) return { ...existing };

    const now = new Date();
    const record: NodeRecord = { id: ++this.lastId, uuid, createdAt: now, updatedAt: now };
    this.byId.set(record.id, record);
    this.idByUuid.set(uuid, record.id);
    return { ...record };
  }

  async findById(id: NodeKey): Promise<NodeRecord | null> {
    const record = this.byId.get(id);
    return record ? { ...record } : null;
  }

  async list(filter?: NodeListFilter): Promise<NodeRecord[]> {
    const result: NodeRecord[] = [];
    for (const record of this.byId.values()) {
      if (filter?.uuid !== undefined && record.uuid !== filter.uuid) continue;
      result.push({ ...record });
    }
    return result.sort((a, b) => a.id - b.id);
  }
}
