/**
 * Tenant (pharmacy or clinic organisation)
 */
export interface Tenant {
  id: string;
  name: string;
  isActive: boolean;
  createdAt: Date;
}

export interface CreateTenantInput {
  id?: string;
  name: string;
  isActive?: boolean;
}
