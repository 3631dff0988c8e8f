/**
 * Target shape of the tenant-scoped note tables.
 *
 * Local ids stay as they were in the single-tenant schema; every key gains
 * `tenant_id` as its leading column.
 */

export const LEGACY_TABLES = ['notes', 'links', 'tags'] as const;
export type LegacyTable = (typeof LEGACY_TABLES)[number];

export const TENANTS_TABLE = 'tenants';

export const COMPOSITE_PRIMARY_KEYS: Record<LegacyTable, readonly string[]> = {
  notes: ['tenant_id', 'note_id'],
  links: ['tenant_id', 'id'],
  tags: ['tenant_id', 'id'],
};

export interface CompositeReference {
  table: LegacyTable;
  name: string;
  columns: readonly string[];
  referencedTable: LegacyTable;
  referencedColumns: readonly string[];
}

export const COMPOSITE_REFERENCES: readonly CompositeReference[] = [
  {
    table: 'links',
    name: 'links_source_fkey',
    columns: ['tenant_id', 'source_id'],
    referencedTable: 'notes',
    referencedColumns: ['tenant_id', 'note_id'],
  },
  {
    table: 'links',
    name: 'links_target_fkey',
    columns: ['tenant_id', 'target_id'],
    referencedTable: 'notes',
    referencedColumns: ['tenant_id', 'note_id'],
  },
  {
    table: 'tags',
    name: 'tags_note_fkey',
    columns: ['tenant_id', 'note_id'],
    referencedTable: 'notes',
    referencedColumns: ['tenant_id', 'note_id'],
  },
];

export interface TenantUniqueConstraint {
  table: LegacyTable;
  name: string;
  columns: readonly string[];
}

export const TENANT_UNIQUE_CONSTRAINTS: readonly TenantUniqueConstraint[] = [
  { table: 'links', name: 'unique_link_per_tenant', columns: ['tenant_id', 'source_id', 'target_id'] },
  { table: 'tags', name: 'unique_tag_per_tenant', columns: ['tenant_id', 'note_id', 'tag'] },
];

/** Indexes keyed on local ids only */
export const LEGACY_INDEXES = [
  'idx_notes_created_at',
  'idx_links_source',
  'idx_links_target',
  'idx_tags_note_id',
  'idx_tags_tag',
] as const;

export interface TenantIndex {
  name: string;
  table: LegacyTable;
  columns: readonly string[];
}

export const TENANT_INDEXES: readonly TenantIndex[] = [
  { name: 'idx_notes_tenant_created', table: 'notes', columns: ['tenant_id', 'created_at desc'] },
  { name: 'idx_links_tenant_source', table: 'links', columns: ['tenant_id', 'source_id'] },
  { name: 'idx_links_tenant_target', table: 'links', columns: ['tenant_id', 'target_id'] },
  { name: 'idx_tags_tenant_note', table: 'tags', columns: ['tenant_id', 'note_id'] },
  { name: 'idx_tags_tenant_tag', table: 'tags', columns: ['tenant_id', 'tag'] },
];
