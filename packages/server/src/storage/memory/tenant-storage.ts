import type { Tenant, CreateTenantInput } from '../../types/tenant.js';
import type { ITenantStorage } from '../interfaces/tenant-storage.js';
import { generateId } from '../../crypto/index.js';
import { LockedRepository } from './snapshot.js';

/**
 * In-memory tenant storage implementation
 */
export class MemoryTenantStorage extends LockedRepository implements ITenantStorage {
  private tenants = new Map<string, Tenant>();

  async create(input: CreateTenantInput): Promise<Tenant> {
    return this.lock.run(async () => {
      const tenant: Tenant = {
        id: input.id ?? generateId(),
        name: input.name,
        isActive: input.isActive ?? true,
        createdAt: new Date(),
      };

      this.tenants.set(tenant.id, tenant);
      return tenant;
    });
  }

  async findById(id: string): Promise<Tenant | null> {
    return this.lock.run(async () => this.tenants.get(id) ?? null);
  }

  snapshot(): () => void {
    const saved = new Map(this.tenants);
    return () => {
      this.tenants = saved;
    };
  }
}
