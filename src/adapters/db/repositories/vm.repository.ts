import type Database from 'better-sqlite3';
import { getDb } from '../sqlite.adapter.js';
import { NotFoundError } from '../../../lib/errors.js';
import { cloudProviderSchema, vmStatusSchema } from '../../../schemas/vm.schema.js';
import type { CreateVmRecordInput, UpdateVmRecordInput, Vm, VmStatus } from '../../../domain/entities/vm.entity.js';

interface VmRow {
  id: number;
  name: string;
  provider: string;
  status: string;
  instance_id: string | null;
  instance_type: string;
  region: string;
  zone: string | null;
  public_ip: string | null;
  private_ip: string | null;
  credential_id: number;
  user_id: string;
  created_at: string;
  updated_at: string;
}

export class VmRepository {
  constructor(private readonly db: Database.Database = getDb()) {}

  create(input: CreateVmRecordInput): Vm {
    const now = new Date().toISOString();
    const result = this.db.prepare(`
      INSERT INTO vms (name, provider, status, instance_type, region, zone, credential_id, user_id, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      input.name,
      input.provider,
      input.status ?? 'creating',
      input.instanceType,
      input.region,
      input.zone ?? null,
      input.credentialId,
      input.userId,
      now,
      now
    );

    return this.require(Number(result.lastInsertRowid));
  }

  findById(id: number): Vm | null {
    const row = this.db.prepare<[number], VmRow>('SELECT * FROM vms WHERE id = ?').get(id);
    return row ? this.mapRow(row) : null;
  }

  findAll(userId?: string, limit = 100, offset = 0): Vm[] {
    const rows = userId
      ? this.db
          .prepare<[string, number, number], VmRow>('SELECT * FROM vms WHERE user_id = ? ORDER BY id DESC LIMIT ? OFFSET ?')
          .all(userId, limit, offset)
      : this.db.prepare<[number, number], VmRow>('SELECT * FROM vms ORDER BY id DESC LIMIT ? OFFSET ?').all(limit, offset);
    return rows.map((row) => this.mapRow(row));
  }

  count(userId?: string): number {
    const row = userId
      ? this.db.prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM vms WHERE user_id = ?').get(userId)
      : this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM vms').get();
    return row?.count ?? 0;
  }

  countByStatus(userId?: string): Partial<Record<VmStatus, number>> {
    const rows = userId
      ? this.db
          .prepare<[string], { status: string; count: number }>(
            'SELECT status, COUNT(*) AS count FROM vms WHERE user_id = ? GROUP BY status'
          )
          .all(userId)
      : this.db
          .prepare<[], { status: string; count: number }>('SELECT status, COUNT(*) AS count FROM vms GROUP BY status')
          .all();

    const counts: Partial<Record<VmStatus, number>> = {};
    for (const row of rows) {
      counts[vmStatusSchema.parse(row.status)] = row.count;
    }
    return counts;
  }

  countByCredential(credentialId: number): number {
    const row = this.db
      .prepare<[number], { count: number }>('SELECT COUNT(*) AS count FROM vms WHERE credential_id = ?')
      .get(credentialId);
    return row?.count ?? 0;
  }

  update(id: number, input: UpdateVmRecordInput): Vm {
    const sets: string[] = [];
    const values: Array<string | null> = [];

    if (input.status !== undefined) {
      sets.push('status = ?');
      values.push(input.status);
    }
    if (input.instanceId !== undefined) {
      sets.push('instance_id = ?');
      values.push(input.instanceId);
    }
    if (input.publicIp !== undefined) {
      sets.push('public_ip = ?');
      values.push(input.publicIp);
    }
    if (input.privateIp !== undefined) {
      sets.push('private_ip = ?');
      values.push(input.privateIp);
    }

    if (sets.length > 0) {
      sets.push('updated_at = ?');
      values.push(new Date().toISOString());
      const result = this.db.prepare(`UPDATE vms SET ${sets.join(', ')} WHERE id = ?`).run(...values, id);
      if (result.changes === 0) {
        throw new NotFoundError('VM', id);
      }
    }

    return this.require(id);
  }

  delete(id: number): boolean {
    const result = this.db.prepare('DELETE FROM vms WHERE id = ?').run(id);
    return result.changes > 0;
  }

  private require(id: number): Vm {
    const vm = this.findById(id);
    if (!vm) {
      throw new NotFoundError('VM', id);
    }
    return vm;
  }

  private mapRow(row: VmRow): Vm {
    return {
      id: row.id,
      name: row.name,
      provider: cloudProviderSchema.parse(row.provider),
      status: vmStatusSchema.parse(row.status),
      instanceId: row.instance_id,
      instanceType: row.instance_type,
      region: row.region,
      zone: row.zone,
      publicIp: row.public_ip,
      privateIp: row.private_ip,
      credentialId: row.credential_id,
      userId: row.user_id,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
