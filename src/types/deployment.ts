/**
 * Deployment descriptor types.
 *
 * A {@link DeploymentDescriptor} is the normalized view of one deployable
 * unit, extracted from a Kubernetes Deployment (and optional Service)
 * manifest after validation.
 */

// ---------------------------------------------------------------------------
// Image reference
// ---------------------------------------------------------------------------

export interface ImageReference {
  /** Full reference as written in the manifest. */
  raw: string;
  /** Registry host, if the reference names one (e.g. `ghcr.io`). */
  registry?: string;
  /** Repository path without registry, tag or digest. */
  repository: string;
  tag?: string;
  /** `sha256:...` digest when pinned. */
  digest?: string;
}

// ---------------------------------------------------------------------------
// Resources
// ---------------------------------------------------------------------------

/** Resource quantities normalized to cores and bytes. */
export interface ResourceQuantities {
  cpuCores?: number;
  memoryBytes?: number;
}

export interface ResourceRequirements {
  limits: ResourceQuantities;
  requests: ResourceQuantities;
}

// ---------------------------------------------------------------------------
// Environment bindings
// ---------------------------------------------------------------------------

/** A reference to a key inside a cluster secret. Never the value itself. */
export interface SecretReference {
  secretName: string;
  key: string;
}

export type EnvBinding =
  | { name: string; kind: 'literal'; value: string }
  | { name: string; kind: 'secret'; ref: SecretReference };

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export interface ServiceDescriptor {
  name: string;
  type: string;
  port: number;
  targetPort: number;
}

// ---------------------------------------------------------------------------
// Descriptor
// ---------------------------------------------------------------------------

export interface DeploymentDescriptor {
  name: string;
  namespace: string;
  replicas: number;
  image: ImageReference;
  containerPort?: number;
  resources: ResourceRequirements;
  env: EnvBinding[];
  service?: ServiceDescriptor;
}
