/**
 * Runtime JSON Schema for pipeline documents, validated with ajv.
 *
 * Describes the on-disk (snake_case, YAML) shape. The loader maps a
 * document that passes this schema onto {@link PipelineSpec}.
 */

const agentSchema = {
  oneOf: [
    { type: 'string', const: 'host' },
    {
      type: 'object',
      required: ['image'],
      additionalProperties: false,
      properties: {
        image: { type: 'string', minLength: 1 },
        args: { type: 'array', items: { type: 'string' } },
        mounts: {
          type: 'array',
          items: {
            type: 'object',
            required: ['source', 'target'],
            additionalProperties: false,
            properties: {
              source: { type: 'string', minLength: 1 },
              target: { type: 'string', pattern: '^/' },
              readonly: { type: 'boolean' },
            },
          },
        },
      },
    },
  ],
};

const artifactKeySchema = { type: 'string', pattern: '^[A-Za-z0-9][A-Za-z0-9._-]*$' };

const envMapSchema = {
  type: 'object',
  additionalProperties: { type: ['string', 'number', 'boolean'] },
};

const stepsSchema = {
  type: 'array',
  items: { type: 'string' },
};

export const PIPELINE_JSON_SCHEMA = {
  $id: 'https://pipewright.dev/schemas/pipeline.json',
  type: 'object' as const,
  required: ['name', 'stages'],
  additionalProperties: false,

  $defs: {
    agent: agentSchema,
    envMap: envMapSchema,
    steps: stepsSchema,

    stage: {
      type: 'object' as const,
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' },
        agent: { $ref: '#/$defs/agent' },
        steps: { $ref: '#/$defs/steps' },
        when: { type: 'string' },
        on_error: { type: 'string', enum: ['fail', 'continue'] },
        affects_outcome: { type: 'boolean' },
        env: { $ref: '#/$defs/envMap' },
        timeout_seconds: { type: 'number', exclusiveMinimum: 0, maximum: 2_147_483 },
        stash: {
          type: 'array',
          items: {
            type: 'object',
            required: ['key', 'paths'],
            additionalProperties: false,
            properties: {
              key: artifactKeySchema,
              paths: { type: 'array', minItems: 1, items: { type: 'string', minLength: 1 } },
            },
          },
        },
        unstash: { type: 'array', items: artifactKeySchema },
      },
    },

    postAction: {
      type: 'object' as const,
      required: ['steps'],
      additionalProperties: false,
      properties: {
        name: { type: 'string', minLength: 1 },
        agent: { $ref: '#/$defs/agent' },
        steps: { $ref: '#/$defs/steps' },
      },
    },
  },

  properties: {
    name: { type: 'string', minLength: 1 },
    agent: { $ref: '#/$defs/agent' },
    environment: { $ref: '#/$defs/envMap' },
    stages: {
      type: 'array',
      minItems: 1,
      items: { $ref: '#/$defs/stage' },
    },
    post: {
      type: 'object',
      additionalProperties: false,
      properties: {
        always: { type: 'array', items: { $ref: '#/$defs/postAction' } },
        success: { type: 'array', items: { $ref: '#/$defs/postAction' } },
        failure: { type: 'array', items: { $ref: '#/$defs/postAction' } },
      },
    },
  },
} as const;

// ---------------------------------------------------------------------------
// Document shape (what passes the schema)
// ---------------------------------------------------------------------------

export type AgentDocument =
  | 'host'
  | {
      image: string;
      args?: string[];
      mounts?: Array<{ source: string; target: string; readonly?: boolean }>;
    };

export type EnvMapDocument = Record<string, string | number | boolean>;

export interface StageDocument {
  name: string;
  agent?: AgentDocument;
  steps?: string[];
  when?: string;
  on_error?: 'fail' | 'continue';
  affects_outcome?: boolean;
  env?: EnvMapDocument;
  timeout_seconds?: number;
  stash?: Array<{ key: string; paths: string[] }>;
  unstash?: string[];
}

export interface PostActionDocument {
  name?: string;
  agent?: AgentDocument;
  steps: string[];
}

export interface PipelineDocument {
  name: string;
  agent?: AgentDocument;
  environment?: EnvMapDocument;
  stages: StageDocument[];
  post?: {
    always?: PostActionDocument[];
    success?: PostActionDocument[];
    failure?: PostActionDocument[];
  };
}
