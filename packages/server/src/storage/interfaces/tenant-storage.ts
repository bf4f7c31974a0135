import type { Tenant, CreateTenantInput } from '../../types/tenant.js';

/**
 * Storage interface for tenant lookup
 */
export interface ITenantStorage {
  /**
   * Create a new tenant
   */
  create(input: CreateTenantInput): Promise<Tenant>;

  /**
   * Find a tenant by ID
   */
  findById(id: string): Promise<Tenant | null>;
}
