/**
 * Runtime JSON Schemas for the Kubernetes documents a deployment
 * descriptor is read from.
 *
 * Only the fields pipewright inspects are constrained. Everything else a
 * real manifest carries (health checks, affinity, annotations) passes through.
 */

const quantitySchema = {
  type: ['string', 'number'],
};

const resourceListSchema = {
  type: 'object',
  properties: {
    cpu: quantitySchema,
    memory: quantitySchema,
  },
};

const labelsSchema = {
  type: 'object',
  additionalProperties: { type: 'string' },
};

const envVarSchema = {
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string', minLength: 1 },
    value: { type: 'string' },
    valueFrom: {
      type: 'object',
      properties: {
        secretKeyRef: {
          type: 'object',
          required: ['name', 'key'],
          properties: {
            name: { type: 'string', minLength: 1 },
            key: { type: 'string', minLength: 1 },
          },
        },
      },
    },
  },
};

const containerSchema = {
  type: 'object',
  required: ['name', 'image'],
  properties: {
    name: { type: 'string', minLength: 1 },
    image: { type: 'string', minLength: 1 },
    ports: {
      type: 'array',
      items: {
        type: 'object',
        required: ['containerPort'],
        properties: {
          containerPort: { type: 'integer', minimum: 1, maximum: 65535 },
        },
      },
    },
    env: { type: 'array', items: envVarSchema },
    resources: {
      type: 'object',
      properties: {
        limits: resourceListSchema,
        requests: resourceListSchema,
      },
    },
  },
};

const metadataSchema = {
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string', minLength: 1 },
    namespace: { type: 'string', minLength: 1 },
    labels: labelsSchema,
  },
};

export const DEPLOYMENT_JSON_SCHEMA = {
  $id: 'https://pipewright.dev/schemas/k8s-deployment.json',
  type: 'object' as const,
  required: ['apiVersion', 'kind', 'metadata', 'spec'],
  properties: {
    apiVersion: { type: 'string', const: 'apps/v1' },
    kind: { type: 'string', const: 'Deployment' },
    metadata: metadataSchema,
    spec: {
      type: 'object',
      required: ['selector', 'template'],
      properties: {
        replicas: { type: 'integer' },
        selector: {
          type: 'object',
          required: ['matchLabels'],
          properties: { matchLabels: labelsSchema },
        },
        template: {
          type: 'object',
          required: ['spec'],
          properties: {
            metadata: {
              type: 'object',
              properties: { labels: labelsSchema },
            },
            spec: {
              type: 'object',
              required: ['containers'],
              properties: {
                containers: { type: 'array', minItems: 1, items: containerSchema },
              },
            },
          },
        },
      },
    },
  },
} as const;

export const SERVICE_JSON_SCHEMA = {
  $id: 'https://pipewright.dev/schemas/k8s-service.json',
  type: 'object' as const,
  required: ['apiVersion', 'kind', 'metadata', 'spec'],
  properties: {
    apiVersion: { type: 'string', const: 'v1' },
    kind: { type: 'string', const: 'Service' },
    metadata: metadataSchema,
    spec: {
      type: 'object',
      required: ['ports'],
      properties: {
        type: { type: 'string', enum: ['ClusterIP', 'NodePort', 'LoadBalancer', 'ExternalName'] },
        selector: labelsSchema,
        ports: {
          type: 'array',
          minItems: 1,
          items: {
            type: 'object',
            required: ['port'],
            properties: {
              port: { type: 'integer', minimum: 1, maximum: 65535 },
              targetPort: { type: ['integer', 'string'] },
            },
          },
        },
      },
    },
  },
} as const;

// ---------------------------------------------------------------------------
// Document shapes (what passes the schemas)
// ---------------------------------------------------------------------------

export type Quantity = string | number;

export interface ResourceListDocument {
  cpu?: Quantity;
  memory?: Quantity;
}

export interface EnvVarDocument {
  name: string;
  value?: string;
  valueFrom?: {
    secretKeyRef?: { name: string; key: string };
  };
}

export interface ContainerDocument {
  name: string;
  image: string;
  ports?: Array<{ containerPort: number }>;
  env?: EnvVarDocument[];
  resources?: {
    limits?: ResourceListDocument;
    requests?: ResourceListDocument;
  };
}

export interface MetadataDocument {
  name: string;
  namespace?: string;
  labels?: Record<string, string>;
}

export interface DeploymentDocument {
  apiVersion: 'apps/v1';
  kind: 'Deployment';
  metadata: MetadataDocument;
  spec: {
    replicas?: number;
    selector: { matchLabels: Record<string, string> };
    template: {
      metadata?: { labels?: Record<string, string> };
      spec: { containers: ContainerDocument[] };
    };
  };
}

export interface ServiceDocument {
  apiVersion: 'v1';
  kind: 'Service';
  metadata: MetadataDocument;
  spec: {
    type?: 'ClusterIP' | 'NodePort' | 'LoadBalancer' | 'ExternalName';
    selector?: Record<string, string>;
    ports: Array<{ port: number; targetPort?: number | string }>;
  };
}
