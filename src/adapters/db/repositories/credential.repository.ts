import type Database from 'better-sqlite3';
import { getDb } from '../sqlite.adapter.js';
import { NotFoundError } from '../../../lib/errors.js';
import { cloudProviderSchema } from '../../../schemas/vm.schema.js';
import type {
  CreateCredentialRecordInput,
  Credential,
  UpdateCredentialRecordInput,
} from '../../../domain/entities/credential.entity.js';

interface CredentialRow {
  id: number;
  name: string;
  provider: string;
  encrypted_data: string;
  user_id: string;
  created_at: string;
  updated_at: string;
}

export class CredentialRepository {
  constructor(private readonly db: Database.Database = getDb()) {}

  create(input: CreateCredentialRecordInput): Credential {
    const now = new Date().toISOString();
    const result = this.db.prepare(`
      INSERT INTO credentials (name, provider, encrypted_data, user_id, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(input.name, input.provider, input.encryptedData, input.userId, now, now);

    return this.require(Number(result.lastInsertRowid));
  }

  findById(id: number): Credential | null {
    const row = this.db.prepare<[number], CredentialRow>('SELECT * FROM credentials WHERE id = ?').get(id);
    return row ? this.mapRow(row) : null;
  }

  findAll(userId?: string): Credential[] {
    const rows = userId
      ? this.db.prepare<[string], CredentialRow>('SELECT * FROM credentials WHERE user_id = ? ORDER BY id').all(userId)
      : this.db.prepare<[], CredentialRow>('SELECT * FROM credentials ORDER BY id').all();
    return rows.map((row) => this.mapRow(row));
  }

  update(id: number, input: UpdateCredentialRecordInput): Credential {
    const existing = this.require(id);
    this.db.prepare(`
      UPDATE credentials SET name = ?, encrypted_data = ?, updated_at = ? WHERE id = ?
    `).run(
      input.name ?? existing.name,
      input.encryptedData ?? existing.encryptedData,
      new Date().toISOString(),
      id
    );
    return this.require(id);
  }

  delete(id: number): boolean {
    const result = this.db.prepare('DELETE FROM credentials WHERE id = ?').run(id);
    return result.changes > 0;
  }

  private require(id: number): Credential {
    const credential = this.findById(id);
    if (!credential) {
      throw new NotFoundError('Credential', id);
    }
    return credential;
  }

  private mapRow(row: CredentialRow): Credential {
    return {
      id: row.id,
      name: row.name,
      provider: cloudProviderSchema.parse(row.provider),
      encryptedData: row.encrypted_data,
      userId: row.user_id,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
