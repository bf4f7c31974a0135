import type { Tenant, CreateTenantInput } from '../../../types/tenant.js';
import type { ITenantStorage } from '../../interfaces/tenant-storage.js';
import { generateId } from '../../../crypto/index.js';
import type { Queryable } from '../client.js';
import { type TenantRow, toTenant } from './rows.js';

/**
 * PostgreSQL tenant storage implementation
 */
export class PostgresTenantStorage implements ITenantStorage {
  constructor(private readonly db: Queryable) {}

  async create(input: CreateTenantInput): Promise<Tenant> {
    const { rows } = await this.db.query<TenantRow>(
      `INSERT INTO tenants (id, name, is_active, created_at)
       VALUES ($1, $2, $3, now())
       RETURNING *`,
      [input.id ?? generateId(), input.name, input.isActive ?? true]
    );

    const [row] = rows;
    if (!row) {
      throw new Error('INSERT INTO tenants returned no row');
    }
    return toTenant(row);
  }

  async findById(id: string): Promise<Tenant | null> {
    const { rows } = await this.db.query<TenantRow>('SELECT * FROM tenants WHERE id = $1', [id]);
    const [row] = rows;
    return row ? toTenant(row) : null;
  }
}
