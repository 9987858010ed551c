/**
 * Deployment manifest validation.
 *
 * Standalone validator for `pipewright check-deployment <manifest>`. Performs:
 *   1. YAML syntax check (multi-document)
 *   2. Schema validation (ajv + DEPLOYMENT_JSON_SCHEMA / SERVICE_JSON_SCHEMA)
 *   3. Single-container, replica and selector checks
 *   4. Resource requests against limits
 *   5. Secret-looking env vars must come from a secretKeyRef
 *   6. Service selector and target port against the container
 *   7. Image tag warnings
 *
 * Works entirely offline: nothing is sent to a cluster.
 */

import { Ajv } from 'ajv';
import { parseAllDocuments } from 'yaml';
import type {
  DeploymentDescriptor,
  EnvBinding,
  ImageReference,
  ResourceQuantities,
  ServiceDescriptor,
} from './types/deployment.js';
import { DEPLOYMENT_JSON_SCHEMA, SERVICE_JSON_SCHEMA } from './types/deployment-schema.js';
import type {
  ContainerDocument,
  DeploymentDocument,
  Quantity,
  ResourceListDocument,
  ServiceDocument,
} from './types/deployment-schema.js';
import { ConfigError } from './types/errors.js';
import { parseCpu, parseImageReference, parseMemory } from './core/quantity.js';
import { describeSchemaErrors } from './core/schema-errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A single validation message (error or warning). */
export interface ValidationMessage {
  /** Dotted path of the field that triggered the message. */
  field: string;
  message: string;
}

export interface DeploymentValidationResult {
  /** True if the manifest passes all checks (warnings are allowed). */
  valid: boolean;
  errors: ValidationMessage[];
  warnings: ValidationMessage[];
  /** Present only when `valid`. */
  descriptor?: DeploymentDescriptor;
}

/** Injectable dependencies for {@link checkDeployment}. */
export interface CheckDeploymentDeps {
  /** Read a file's contents as a string. Throws on missing file. */
  readFile: (path: string) => string;
  stdout: (msg: string) => void;
  stderr: (msg: string) => void;
}

/** Env var names that must never carry a literal value. */
export const SECRET_NAME_PATTERN = /PASSWORD|SECRET|TOKEN|KEY|CREDENTIAL/i;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateDeploymentDoc = ajv.compile<DeploymentDocument>(DEPLOYMENT_JSON_SCHEMA);
const validateServiceDoc = ajv.compile<ServiceDocument>(SERVICE_JSON_SCHEMA);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** `/spec/replicas` → `deployment.spec.replicas`. */
function fieldFor(prefix: string, pointer: string): string {
  const path = pointer.split('/').filter((part) => part.length > 0);
  return [prefix, ...path].join('.');
}

function labelsMatch(
  wanted: Record<string, string>,
  actual: Record<string, string> | undefined,
): string[] {
  const mismatched: string[] = [];
  for (const [key, value] of Object.entries(wanted)) {
    if (actual?.[key] !== value) mismatched.push(`${key}=${value}`);
  }
  return mismatched;
}

function quantityText(quantity: Quantity): string {
  return typeof quantity === 'number' ? String(quantity) : `"${quantity}"`;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

interface ManifestDocuments {
  deployments: unknown[];
  services: unknown[];
  ignored: string[];
}

function splitDocuments(text: string, source: string): ManifestDocuments {
  const docs = parseAllDocuments(text);
  const found: ManifestDocuments = { deployments: [], services: [], ignored: [] };

  for (const doc of docs) {
    if (doc.errors.length > 0) {
      const problems = doc.errors.map((e) => e.message);
      throw new ConfigError(`Invalid YAML in ${source}: ${problems[0]}`, problems);
    }
    const value: unknown = doc.toJS();
    if (value === null || value === undefined) continue;
    if (!isRecord(value)) {
      throw new ConfigError(`Invalid manifest ${source}: every document must be a mapping`, [
        'every document must be a mapping',
      ]);
    }
    const kind = value['kind'];
    if (kind === 'Deployment') found.deployments.push(value);
    else if (kind === 'Service') found.services.push(value);
    else found.ignored.push(typeof kind === 'string' ? kind : '(no kind)');
  }

  if (found.deployments.length + found.services.length + found.ignored.length === 0) {
    throw new ConfigError(`Invalid manifest ${source}: no documents`, ['no documents']);
  }
  return found;
}

// ---------------------------------------------------------------------------
// Semantic checks
// ---------------------------------------------------------------------------

function checkResources(
  resources: ContainerDocument['resources'],
  errors: ValidationMessage[],
): { limits: ResourceQuantities; requests: ResourceQuantities } {
  const field = 'deployment.spec.template.spec.containers.0.resources';
  const parsers = { cpu: parseCpu, memory: parseMemory } as const;
  const result: { limits: ResourceQuantities; requests: ResourceQuantities } = {
    limits: {},
    requests: {},
  };

  const read = (
    list: ResourceListDocument | undefined,
    bucket: 'limits' | 'requests',
    resource: 'cpu' | 'memory',
  ): number | undefined => {
    const raw = list?.[resource];
    if (raw === undefined) return undefined;
    const value = parsers[resource](raw);
    if (value === null) {
      errors.push({
        field: `${field}.${bucket}.${resource}`,
        message: `Invalid ${resource} quantity ${quantityText(raw)}`,
      });
      return undefined;
    }
    return value;
  };

  for (const resource of ['cpu', 'memory'] as const) {
    const limit = read(resources?.limits, 'limits', resource);
    const request = read(resources?.requests, 'requests', resource);
    const key = resource === 'cpu' ? 'cpuCores' : 'memoryBytes';
    if (limit !== undefined) result.limits[key] = limit;
    if (request !== undefined) result.requests[key] = request;

    const rawLimit = resources?.limits?.[resource];
    const rawRequest = resources?.requests?.[resource];
    if (
      limit !== undefined &&
      request !== undefined &&
      rawLimit !== undefined &&
      rawRequest !== undefined &&
      request > limit
    ) {
      errors.push({
        field: `${field}.requests.${resource}`,
        message: `${resource} request ${quantityText(rawRequest)} exceeds limit ${quantityText(rawLimit)}`,
      });
    }
  }
  return result;
}

function checkEnv(
  container: ContainerDocument,
  errors: ValidationMessage[],
  warnings: ValidationMessage[],
): EnvBinding[] {
  const bindings: EnvBinding[] = [];
  (container.env ?? []).forEach((env, i) => {
    const field = `deployment.spec.template.spec.containers.0.env.${i}`;
    const ref = env.valueFrom?.secretKeyRef;
    if (ref !== undefined) {
      bindings.push({ name: env.name, kind: 'secret', ref: { secretName: ref.name, key: ref.key } });
      return;
    }
    if (env.valueFrom !== undefined) {
      warnings.push({
        field,
        message: `Env var "${env.name}" uses a valueFrom source other than secretKeyRef and is not checked`,
      });
      return;
    }
    if (SECRET_NAME_PATTERN.test(env.name)) {
      errors.push({
        field,
        message: `Env var "${env.name}" looks like a secret and must use valueFrom.secretKeyRef`,
      });
      return;
    }
    bindings.push({ name: env.name, kind: 'literal', value: env.value ?? '' });
  });
  return bindings;
}

function imageWarning(image: ImageReference): string | null {
  if (image.digest !== undefined) return null;
  if (image.tag === undefined) return `Image "${image.raw}" has no tag and resolves to ":latest"`;
  if (image.tag === 'latest') return `Image "${image.raw}" uses the mutable tag ":latest"`;
  return `Image "${image.raw}" is not pinned by digest`;
}

function checkService(
  service: ServiceDocument,
  templateLabels: Record<string, string> | undefined,
  containerPort: number | undefined,
  errors: ValidationMessage[],
  warnings: ValidationMessage[],
): ServiceDescriptor {
  const mismatched = labelsMatch(service.spec.selector ?? {}, templateLabels);
  for (const label of mismatched) {
    errors.push({
      field: 'service.spec.selector',
      message: `Service selector "${label}" does not match the pod template labels`,
    });
  }

  const port = service.spec.ports[0];
  const target = port.targetPort ?? port.port;
  let targetPort = port.port;
  if (typeof target === 'string') {
    warnings.push({
      field: 'service.spec.ports.0.targetPort',
      message: `Named target port "${target}" cannot be checked against the container`,
    });
  } else {
    targetPort = target;
    if (containerPort === undefined) {
      errors.push({
        field: 'service.spec.ports.0.targetPort',
        message: `Service targets port ${target} but the container declares no ports`,
      });
    } else if (target !== containerPort) {
      errors.push({
        field: 'service.spec.ports.0.targetPort',
        message: `Service targetPort ${target} does not match containerPort ${containerPort}`,
      });
    }
  }

  return {
    name: service.metadata.name,
    type: service.spec.type ?? 'ClusterIP',
    port: port.port,
    targetPort,
  };
}

// ---------------------------------------------------------------------------
// validateDeploymentManifest
// ---------------------------------------------------------------------------

/**
 * Validate a Deployment (plus optional Service) manifest.
 *
 * @param source - Label used in error messages, usually the file path.
 * @throws ConfigError when the text is not YAML or holds no documents.
 */
export function validateDeploymentManifest(
  text: string,
  source = 'manifest',
): DeploymentValidationResult {
  const errors: ValidationMessage[] = [];
  const warnings: ValidationMessage[] = [];
  const docs = splitDocuments(text, source);

  for (const kind of docs.ignored) {
    warnings.push({ field: kind, message: `Ignoring document of kind "${kind}"` });
  }
  if (docs.deployments.length !== 1) {
    errors.push({
      field: 'deployment',
      message: `Expected exactly one Deployment document, found ${docs.deployments.length}`,
    });
  }
  if (docs.services.length > 1) {
    errors.push({
      field: 'service',
      message: `Expected at most one Service document, found ${docs.services.length}`,
    });
  }

  const deployment = docs.deployments[0];
  if (deployment !== undefined && !validateDeploymentDoc(deployment)) {
    for (const problem of describeSchemaErrors(validateDeploymentDoc.errors)) {
      errors.push({ field: fieldFor('deployment', problem.field), message: problem.message });
    }
  }
  const service = docs.services[0];
  if (service !== undefined && !validateServiceDoc(service)) {
    for (const problem of describeSchemaErrors(validateServiceDoc.errors)) {
      errors.push({ field: fieldFor('service', problem.field), message: problem.message });
    }
  }

  // Structure isn't reliable past a schema failure.
  if (errors.length > 0 || !validateDeploymentDoc(deployment)) {
    return { valid: false, errors, warnings };
  }

  const spec = deployment.spec;
  const containers = spec.template.spec.containers;
  if (containers.length !== 1) {
    errors.push({
      field: 'deployment.spec.template.spec.containers',
      message: `Expected exactly one container, found ${containers.length}`,
    });
  }

  const replicas = spec.replicas ?? 1;
  if (replicas < 1) {
    errors.push({ field: 'deployment.spec.replicas', message: 'replicas must be at least 1' });
  }

  const templateLabels = spec.template.metadata?.labels;
  for (const label of labelsMatch(spec.selector.matchLabels, templateLabels)) {
    errors.push({
      field: 'deployment.spec.selector.matchLabels',
      message: `Selector label "${label}" does not match the pod template labels`,
    });
  }

  const container = containers[0];
  const resources = checkResources(container.resources, errors);
  const env = checkEnv(container, errors, warnings);
  const containerPort = container.ports?.[0]?.containerPort;

  const image = parseImageReference(container.image);
  const warning = imageWarning(image);
  if (warning !== null) {
    warnings.push({ field: 'deployment.spec.template.spec.containers.0.image', message: warning });
  }

  let serviceDescriptor: ServiceDescriptor | undefined;
  if (service !== undefined && validateServiceDoc(service)) {
    serviceDescriptor = checkService(service, templateLabels, containerPort, errors, warnings);
  }

  if (errors.length > 0) {
    return { valid: false, errors, warnings };
  }

  const descriptor: DeploymentDescriptor = {
    name: deployment.metadata.name,
    namespace: deployment.metadata.namespace ?? 'default',
    replicas,
    image,
    resources,
    env,
  };
  if (containerPort !== undefined) descriptor.containerPort = containerPort;
  if (serviceDescriptor !== undefined) descriptor.service = serviceDescriptor;

  return { valid: true, errors, warnings, descriptor };
}

// ---------------------------------------------------------------------------
// checkDeployment (CLI entry)
// ---------------------------------------------------------------------------

/**
 * Read, validate and report on a manifest file.
 *
 * @returns exit code: 0 valid, 1 invalid, 2 unreadable or not YAML.
 */
export function checkDeployment(path: string, deps: CheckDeploymentDeps): number {
  let text: string;
  try {
    text = deps.readFile(path);
  } catch {
    deps.stderr(`  FAIL  Cannot read manifest: file not found at ${path}`);
    return 2;
  }

  let result: DeploymentValidationResult;
  try {
    result = validateDeploymentManifest(text, path);
  } catch (err) {
    if (err instanceof ConfigError) {
      deps.stderr(`  FAIL  ${err.message}`);
      return 2;
    }
    throw err;
  }

  reportResult(result, deps);
  return result.valid ? 0 : 1;
}

// ---------------------------------------------------------------------------
// Output formatting
// ---------------------------------------------------------------------------

function reportResult(result: DeploymentValidationResult, deps: CheckDeploymentDeps): void {
  if (result.valid) {
    deps.stdout('  PASS  Deployment validation passed');
  } else {
    deps.stderr('  FAIL  Deployment validation failed');
  }

  for (const error of result.errors) {
    deps.stderr(`  ERROR [${error.field}] ${error.message}`);
  }

  for (const warning of result.warnings) {
    deps.stdout(`  WARN  [${warning.field}] ${warning.message}`);
  }

  const d = result.descriptor;
  if (d !== undefined) {
    deps.stdout(
      `  INFO  ${d.namespace}/${d.name}: ${d.replicas} replica(s) of ${d.image.raw}` +
        (d.service ? `, service ${d.service.name}:${d.service.port}` : ''),
    );
  }
}
