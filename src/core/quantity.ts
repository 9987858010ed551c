/**
 * Kubernetes resource quantities and container image references.
 */

import type { ImageReference } from '../types/deployment.js';
import type { Quantity } from '../types/deployment-schema.js';

// ---------------------------------------------------------------------------
// Quantities
// ---------------------------------------------------------------------------

const CPU_PATTERN = /^(\d+(?:\.\d+)?)(m)?$/;

/** `"500m"` → 0.5, `"2"` → 2. Returns null for anything unparseable. */
export function parseCpu(quantity: Quantity): number | null {
  if (typeof quantity === 'number') {
    return Number.isFinite(quantity) && quantity >= 0 ? quantity : null;
  }
  const match = CPU_PATTERN.exec(quantity.trim());
  if (!match) return null;
  const value = Number(match[1]);
  return match[2] === 'm' ? value / 1000 : value;
}

const MEMORY_MULTIPLIERS: Record<string, number> = {
  '': 1,
  k: 1e3,
  K: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  P: 1e15,
  Ki: 2 ** 10,
  Mi: 2 ** 20,
  Gi: 2 ** 30,
  Ti: 2 ** 40,
  Pi: 2 ** 50,
};

const MEMORY_PATTERN = /^(\d+(?:\.\d+)?)([kKMGTP]i?)?$/;

/** `"512Mi"` → 536870912, `"1G"` → 1e9. Returns null for anything unparseable. */
export function parseMemory(quantity: Quantity): number | null {
  if (typeof quantity === 'number') {
    return Number.isFinite(quantity) && quantity >= 0 ? quantity : null;
  }
  const match = MEMORY_PATTERN.exec(quantity.trim());
  if (!match) return null;
  const multiplier = MEMORY_MULTIPLIERS[match[2] ?? ''];
  // "ki" is not a unit; only "Ki" is.
  if (multiplier === undefined) return null;
  return Math.round(Number(match[1]) * multiplier);
}

// ---------------------------------------------------------------------------
// Image references
// ---------------------------------------------------------------------------

function looksLikeRegistry(component: string): boolean {
  return component.includes('.') || component.includes(':') || component === 'localhost';
}

/**
 * Split `[registry/]repository[:tag][@digest]`.
 *
 * The first path component is a registry only when it looks like a host
 * (contains a dot or a port, or is `localhost`), matching how engines
 * resolve short names.
 */
export function parseImageReference(raw: string): ImageReference {
  let rest = raw.trim();
  const ref: ImageReference = { raw, repository: '' };

  const at = rest.indexOf('@');
  if (at !== -1) {
    ref.digest = rest.slice(at + 1);
    rest = rest.slice(0, at);
  }

  const slash = rest.lastIndexOf('/');
  const colon = rest.lastIndexOf(':');
  if (colon > slash) {
    ref.tag = rest.slice(colon + 1);
    rest = rest.slice(0, colon);
  }

  const components = rest.split('/');
  if (components.length > 1 && looksLikeRegistry(components[0])) {
    ref.registry = components[0];
    rest = components.slice(1).join('/');
  }

  ref.repository = rest;
  return ref;
}
