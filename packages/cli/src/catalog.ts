/**
 * Optional services that can be installed alongside n8n
 */

import { ConfigurationError } from './errors';

export interface ServiceDescriptor {
  readonly id: string;
  readonly description: string;
}

export interface ServiceCatalog {
  readonly services: readonly ServiceDescriptor[];
}

export type SelectionSet = ReadonlySet<string>;

export const DEFAULT_SERVICES: readonly ServiceDescriptor[] = [
  { id: 'traefik', description: 'Reverse proxy with automatic SSL certificates' },
  { id: 'qdrant', description: 'Vector database for AI/ML workflows' },
  { id: 'nginx', description: 'Web server for static files and additional routing' },
  { id: 'postgres', description: 'PostgreSQL database for n8n data persistence' },
  { id: 'monitoring', description: 'Portainer for container management' },
];

export function createCatalog(entries: readonly ServiceDescriptor[] = DEFAULT_SERVICES): ServiceCatalog {
  const seen = new Set<string>();
  for (const entry of entries) {
    if (seen.has(entry.id)) {
      throw new ConfigurationError(`Duplicate service id in catalog: ${entry.id}`);
    }
    seen.add(entry.id);
  }

  return Object.freeze({
    services: Object.freeze(entries.map((entry) => Object.freeze({ ...entry }))),
  });
}

export function listServices(catalog: ServiceCatalog): readonly ServiceDescriptor[] {
  return catalog.services;
}

export function hasService(catalog: ServiceCatalog, id: string): boolean {
  return catalog.services.some((service) => service.id === id);
}

export function serviceIds(catalog: ServiceCatalog): string[] {
  return catalog.services.map((service) => service.id);
}

/**
 * Check every id against the catalog. Unknown ids are reported together.
 */
export function validateSelection(catalog: ServiceCatalog, ids: Iterable<string>): SelectionSet {
  const selection = new Set(ids);
  const unknown = [...selection].filter((id) => !hasService(catalog, id));

  if (unknown.length > 0) {
    throw new ConfigurationError(
      `Unknown service${unknown.length > 1 ? 's' : ''}: ${unknown.join(', ')}. ` +
        `Available services: ${serviceIds(catalog).join(', ')}`
    );
  }

  return selection;
}

/**
 * Selection ids in catalog order
 */
export function orderSelection(catalog: ServiceCatalog, selection: SelectionSet): string[] {
  return serviceIds(catalog).filter((id) => selection.has(id));
}

// =============================================================================
// Presets
// =============================================================================

export interface Preset {
  id: string;
  label: string;
  description: string;
  /** null selects every service in the catalog */
  services: readonly string[] | null;
}

export const PRESETS: readonly Preset[] = [
  {
    id: 'quick-start',
    label: 'Quick Start',
    description: 'n8n + Traefik (SSL enabled, production ready)',
    services: ['traefik'],
  },
  {
    id: 'ai-ml',
    label: 'AI/ML Stack',
    description: 'n8n + Traefik + Qdrant (vector database for AI workflows)',
    services: ['traefik', 'qdrant'],
  },
  {
    id: 'full',
    label: 'Full Stack',
    description: 'All services (complete setup with monitoring)',
    services: null,
  },
  {
    id: 'database',
    label: 'Database Enhanced',
    description: 'n8n + Traefik + PostgreSQL (persistent data storage)',
    services: ['traefik', 'postgres'],
  },
];

export function resolvePreset(catalog: ServiceCatalog, presetId: string): SelectionSet {
  const preset = PRESETS.find((p) => p.id === presetId);
  if (!preset) {
    throw new ConfigurationError(
      `Unknown preset: ${presetId}. Available presets: ${PRESETS.map((p) => p.id).join(', ')}`
    );
  }

  return validateSelection(catalog, preset.services ?? serviceIds(catalog));
}
