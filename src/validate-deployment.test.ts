import { describe, it, expect, vi } from 'vitest';
import { stringify } from 'yaml';
import {
  checkDeployment,
  validateDeploymentManifest,
  type CheckDeploymentDeps,
} from './validate-deployment.js';
import type { DeploymentDocument, ServiceDocument } from './types/deployment-schema.js';
import { ConfigError } from './types/errors.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const CONTAINER = 'deployment.spec.template.spec.containers.0';

function validDeployment(): DeploymentDocument {
  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name: 'orders', namespace: 'shop' },
    spec: {
      replicas: 3,
      selector: { matchLabels: { app: 'orders' } },
      template: {
        metadata: { labels: { app: 'orders' } },
        spec: {
          containers: [
            {
              name: 'orders',
              image: 'registry.local/orders:1.4.2',
              ports: [{ containerPort: 8080 }],
              env: [
                { name: 'LOG_LEVEL', value: 'info' },
                {
                  name: 'DB_PASSWORD',
                  valueFrom: { secretKeyRef: { name: 'db', key: 'password' } },
                },
              ],
              resources: {
                limits: { cpu: '500m', memory: '1Gi' },
                requests: { cpu: '200m', memory: '512Mi' },
              },
            },
          ],
        },
      },
    },
  };
}

function validService(): ServiceDocument {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: { name: 'orders', namespace: 'shop' },
    spec: {
      selector: { app: 'orders' },
      ports: [{ port: 80, targetPort: 8080 }],
    },
  };
}

function manifest(...docs: object[]): string {
  return docs.map((doc) => stringify(doc)).join('---\n');
}

function firstContainer(doc: DeploymentDocument) {
  return doc.spec.template.spec.containers[0];
}

function createDeps(overrides?: Partial<CheckDeploymentDeps>): CheckDeploymentDeps {
  return {
    readFile: vi.fn().mockReturnValue(manifest(validDeployment(), validService())),
    stdout: vi.fn(),
    stderr: vi.fn(),
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Valid manifests
// ---------------------------------------------------------------------------

describe('validateDeploymentManifest — valid', () => {
  it('builds the descriptor', () => {
    const result = validateDeploymentManifest(manifest(validDeployment(), validService()));

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.descriptor).toEqual({
      name: 'orders',
      namespace: 'shop',
      replicas: 3,
      image: {
        raw: 'registry.local/orders:1.4.2',
        registry: 'registry.local',
        repository: 'orders',
        tag: '1.4.2',
      },
      containerPort: 8080,
      resources: {
        limits: { cpuCores: 0.5, memoryBytes: 1073741824 },
        requests: { cpuCores: 0.2, memoryBytes: 536870912 },
      },
      env: [
        { name: 'LOG_LEVEL', kind: 'literal', value: 'info' },
        { name: 'DB_PASSWORD', kind: 'secret', ref: { secretName: 'db', key: 'password' } },
      ],
      service: { name: 'orders', type: 'ClusterIP', port: 80, targetPort: 8080 },
    });
  });

  it('defaults namespace and replicas', () => {
    const deployment = validDeployment();
    delete deployment.metadata.namespace;
    delete deployment.spec.replicas;

    const result = validateDeploymentManifest(manifest(deployment));

    expect(result.descriptor?.namespace).toBe('default');
    expect(result.descriptor?.replicas).toBe(1);
    expect(result.descriptor?.service).toBeUndefined();
  });

  it('warns about documents of other kinds', () => {
    const result = validateDeploymentManifest(
      manifest(validDeployment(), { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'c' } }),
    );
    expect(result.valid).toBe(true);
    expect(result.warnings).toContainEqual({
      field: 'ConfigMap',
      message: 'Ignoring document of kind "ConfigMap"',
    });
  });
});

// ---------------------------------------------------------------------------
// Images
// ---------------------------------------------------------------------------

describe('validateDeploymentManifest — images', () => {
  it.each([
    ['registry.local/orders:1.4.2', 'Image "registry.local/orders:1.4.2" is not pinned by digest'],
    ['registry.local/orders:latest', 'Image "registry.local/orders:latest" uses the mutable tag ":latest"'],
    ['orders', 'Image "orders" has no tag and resolves to ":latest"'],
  ])('warns for %s', (image, message) => {
    const deployment = validDeployment();
    firstContainer(deployment).image = image;

    const result = validateDeploymentManifest(manifest(deployment));

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([{ field: `${CONTAINER}.image`, message }]);
  });

  it('accepts a digest-pinned image silently', () => {
    const deployment = validDeployment();
    firstContainer(deployment).image = 'registry.local/orders@sha256:0123abcd';

    const result = validateDeploymentManifest(manifest(deployment));

    expect(result.warnings).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

describe('validateDeploymentManifest — errors', () => {
  it('rejects a secret-looking literal env var', () => {
    const deployment = validDeployment();
    firstContainer(deployment).env = [
      { name: 'LOG_LEVEL', value: 'info' },
      { name: 'API_TOKEN', value: 'test-secret' },
    ];

    const result = validateDeploymentManifest(manifest(deployment));

    expect(result.valid).toBe(false);
    expect(result.descriptor).toBeUndefined();
    expect(result.errors).toEqual([
      {
        field: `${CONTAINER}.env.1`,
        message: 'Env var "API_TOKEN" looks like a secret and must use valueFrom.secretKeyRef',
      },
    ]);
  });

  it('rejects a request above its limit', () => {
    const deployment = validDeployment();
    firstContainer(deployment).resources = {
      limits: { cpu: '500m', memory: '1Gi' },
      requests: { cpu: '600m', memory: '512Mi' },
    };

    const result = validateDeploymentManifest(manifest(deployment));

    expect(result.errors).toEqual([
      {
        field: `${CONTAINER}.resources.requests.cpu`,
        message: 'cpu request "600m" exceeds limit "500m"',
      },
    ]);
  });

  it('rejects an unparseable quantity', () => {
    const deployment = validDeployment();
    firstContainer(deployment).resources = { limits: { cpu: 'lots' }, requests: { cpu: '1' } };

    const result = validateDeploymentManifest(manifest(deployment));

    expect(result.errors).toEqual([
      { field: `${CONTAINER}.resources.limits.cpu`, message: 'Invalid cpu quantity "lots"' },
    ]);
  });

  it('rejects a selector the template labels do not satisfy', () => {
    const deployment = validDeployment();
    deployment.spec.selector.matchLabels = { app: 'orders', tier: 'api' };

    const result = validateDeploymentManifest(manifest(deployment));

    expect(result.errors).toEqual([
      {
        field: 'deployment.spec.selector.matchLabels',
        message: 'Selector label "tier=api" does not match the pod template labels',
      },
    ]);
  });

  it('rejects zero replicas', () => {
    const deployment = validDeployment();
    deployment.spec.replicas = 0;

    const result = validateDeploymentManifest(manifest(deployment));

    expect(result.errors).toEqual([
      { field: 'deployment.spec.replicas', message: 'replicas must be at least 1' },
    ]);
  });

  it('rejects more than one container', () => {
    const deployment = validDeployment();
    deployment.spec.template.spec.containers.push({ name: 'sidecar', image: 'envoy@sha256:ff' });

    const result = validateDeploymentManifest(manifest(deployment));

    expect(result.errors).toEqual([
      {
        field: 'deployment.spec.template.spec.containers',
        message: 'Expected exactly one container, found 2',
      },
    ]);
  });

  it('reports schema violations by dotted field', () => {
    const text = manifest({
      apiVersion: 'apps/v1',
      kind: 'Deployment',
      metadata: { name: 'orders' },
      spec: { template: { spec: { containers: [{ name: 'orders', image: 'orders:1' }] } } },
    });

    const result = validateDeploymentManifest(text);

    expect(result.errors).toEqual([
      { field: 'deployment.spec', message: 'Missing required property "selector"' },
    ]);
  });

  it('requires exactly one Deployment', () => {
    const result = validateDeploymentManifest(manifest(validService()));
    expect(result.errors).toEqual([
      { field: 'deployment', message: 'Expected exactly one Deployment document, found 0' },
    ]);
  });

  it('rejects more than one Service', () => {
    const result = validateDeploymentManifest(
      manifest(validDeployment(), validService(), validService()),
    );
    expect(result.errors).toEqual([
      { field: 'service', message: 'Expected at most one Service document, found 2' },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Env sources
// ---------------------------------------------------------------------------

describe('validateDeploymentManifest — env sources', () => {
  it('warns about a valueFrom it cannot check', () => {
    const text = `apiVersion: apps/v1
kind: Deployment
metadata:
  name: orders
spec:
  selector:
    matchLabels: { app: orders }
  template:
    metadata:
      labels: { app: orders }
    spec:
      containers:
        - name: orders
          image: orders@sha256:aa
          env:
            - name: FEATURE_FLAGS
              valueFrom:
                configMapKeyRef: { name: flags, key: all }
`;
    const result = validateDeploymentManifest(text);

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      {
        field: `${CONTAINER}.env.0`,
        message:
          'Env var "FEATURE_FLAGS" uses a valueFrom source other than secretKeyRef and is not checked',
      },
    ]);
    expect(result.descriptor?.env).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

describe('validateDeploymentManifest — service', () => {
  it('rejects a target port the container does not expose', () => {
    const service = validService();
    service.spec.ports = [{ port: 80, targetPort: 9090 }];

    const result = validateDeploymentManifest(manifest(validDeployment(), service));

    expect(result.errors).toEqual([
      {
        field: 'service.spec.ports.0.targetPort',
        message: 'Service targetPort 9090 does not match containerPort 8080',
      },
    ]);
  });

  it('rejects a service when the container declares no ports', () => {
    const deployment = validDeployment();
    delete firstContainer(deployment).ports;

    const result = validateDeploymentManifest(manifest(deployment, validService()));

    expect(result.errors).toEqual([
      {
        field: 'service.spec.ports.0.targetPort',
        message: 'Service targets port 8080 but the container declares no ports',
      },
    ]);
  });

  it('falls back to the service port when targetPort is omitted', () => {
    const deployment = validDeployment();
    firstContainer(deployment).ports = [{ containerPort: 80 }];
    const service = validService();
    service.spec.ports = [{ port: 80 }];

    const result = validateDeploymentManifest(manifest(deployment, service));

    expect(result.descriptor?.service).toEqual({
      name: 'orders',
      type: 'ClusterIP',
      port: 80,
      targetPort: 80,
    });
  });

  it('warns about a named target port', () => {
    const service = validService();
    service.spec.type = 'NodePort';
    service.spec.ports = [{ port: 80, targetPort: 'http' }];

    const result = validateDeploymentManifest(manifest(validDeployment(), service));

    expect(result.valid).toBe(true);
    expect(result.warnings).toContainEqual({
      field: 'service.spec.ports.0.targetPort',
      message: 'Named target port "http" cannot be checked against the container',
    });
    expect(result.descriptor?.service).toEqual({
      name: 'orders',
      type: 'NodePort',
      port: 80,
      targetPort: 80,
    });
  });

  it('rejects a service selector that misses the pods', () => {
    const service = validService();
    service.spec.selector = { app: 'payments' };

    const result = validateDeploymentManifest(manifest(validDeployment(), service));

    expect(result.errors).toEqual([
      {
        field: 'service.spec.selector',
        message: 'Service selector "app=payments" does not match the pod template labels',
      },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Malformed input
// ---------------------------------------------------------------------------

describe('validateDeploymentManifest — malformed input', () => {
  it('throws ConfigError for YAML syntax errors', () => {
    expect(() => validateDeploymentManifest('kind: "Deployment', 'deploy.yaml')).toThrow(
      /^Invalid YAML in deploy\.yaml: /,
    );
  });

  it('throws ConfigError for a document that is not a mapping', () => {
    expect(() => validateDeploymentManifest('- a\n- b\n')).toThrow(
      'Invalid manifest manifest: every document must be a mapping',
    );
  });

  it('throws ConfigError for an empty file', () => {
    expect(() => validateDeploymentManifest('')).toThrow(ConfigError);
  });
});

// ---------------------------------------------------------------------------
// checkDeployment
// ---------------------------------------------------------------------------

describe('checkDeployment', () => {
  it('prints PASS, warnings and a summary and returns 0', () => {
    const deps = createDeps();

    const code = checkDeployment('k8s/orders.yaml', deps);

    expect(code).toBe(0);
    expect(deps.stderr).not.toHaveBeenCalled();
    expect(vi.mocked(deps.stdout).mock.calls.map((c) => c[0])).toEqual([
      '  PASS  Deployment validation passed',
      `  WARN  [${CONTAINER}.image] Image "registry.local/orders:1.4.2" is not pinned by digest`,
      '  INFO  shop/orders: 3 replica(s) of registry.local/orders:1.4.2, service orders:80',
    ]);
  });

  it('prints FAIL and each error and returns 1', () => {
    const deployment = validDeployment();
    deployment.spec.replicas = 0;
    const deps = createDeps({ readFile: vi.fn().mockReturnValue(manifest(deployment)) });

    const code = checkDeployment('k8s/orders.yaml', deps);

    expect(code).toBe(1);
    expect(vi.mocked(deps.stderr).mock.calls.map((c) => c[0])).toEqual([
      '  FAIL  Deployment validation failed',
      '  ERROR [deployment.spec.replicas] replicas must be at least 1',
    ]);
  });

  it('returns 2 for a missing file', () => {
    const deps = createDeps({
      readFile: vi.fn().mockImplementation(() => {
        throw new Error('ENOENT: no such file');
      }),
    });

    expect(checkDeployment('k8s/missing.yaml', deps)).toBe(2);
    expect(deps.stderr).toHaveBeenCalledWith(
      '  FAIL  Cannot read manifest: file not found at k8s/missing.yaml',
    );
  });

  it('returns 2 for a file that is not YAML', () => {
    const deps = createDeps({ readFile: vi.fn().mockReturnValue('- a\n- b\n') });

    expect(checkDeployment('k8s/list.yaml', deps)).toBe(2);
    expect(deps.stderr).toHaveBeenCalledWith(
      '  FAIL  Invalid manifest k8s/list.yaml: every document must be a mapping',
    );
  });
});
