/**
 * Pipeline document loader.
 *
 * Reads a YAML pipeline file, validates it against
 * {@link PIPELINE_JSON_SCHEMA}, maps the snake_case document onto the
 * descriptor inputs and hands them to {@link definePipeline}. Every failure
 * along the way is a {@link ConfigError}; a run is never attempted on a
 * document that does not load.
 *
 * @example
 * ```yaml
 * name: order-service
 * agent:
 *   image: maven:3.9-eclipse-temurin-17
 * stages:
 *   - name: build
 *     steps: [mvn -B package]
 *     stash: [{ key: jar, paths: [target/app.jar] }]
 *   - name: publish
 *     when: branch == "main"
 *     unstash: [jar]
 *     steps: [./publish.sh]
 * ```
 */

import { readFileSync } from 'node:fs';
import { Ajv } from 'ajv';
import { parse as parseYaml } from 'yaml';
import type { ExecutionEnvironment, PostCondition } from '../types/pipeline.js';
import { POST_CONDITIONS } from '../types/pipeline.js';
import type { PipelineSpec } from '../types/pipeline.js';
import { PIPELINE_JSON_SCHEMA } from '../types/pipeline-schema.js';
import type {
  AgentDocument,
  EnvMapDocument,
  PipelineDocument,
  StageDocument,
} from '../types/pipeline-schema.js';
import { ConfigError } from '../types/errors.js';
import { definePipeline } from './stage-descriptor.js';
import type { PipelineInit, PostActionInit, StageInit } from './stage-descriptor.js';
import { describeSchemaErrors, formatProblem } from './schema-errors.js';

const ajv = new Ajv({ allErrors: true, strict: false });
const validateDocument = ajv.compile<PipelineDocument>(PIPELINE_JSON_SCHEMA);

// ---------------------------------------------------------------------------
// Mapping
// ---------------------------------------------------------------------------

function toEnvironment(agent: AgentDocument | undefined): ExecutionEnvironment {
  if (agent === undefined || agent === 'host') return { kind: 'host' };
  return {
    kind: 'container',
    image: agent.image,
    args: [...(agent.args ?? [])],
    mounts: (agent.mounts ?? []).map((m) => ({
      source: m.source,
      target: m.target,
      readonly: m.readonly ?? false,
    })),
  };
}

function toEnvMap(doc: EnvMapDocument | undefined): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(doc ?? {})) {
    env[key] = String(value);
  }
  return env;
}

function toStageInit(stage: StageDocument, defaultAgent: AgentDocument | undefined): StageInit {
  const init: StageInit = {
    name: stage.name,
    commands: [...(stage.steps ?? [])],
    environment: toEnvironment(stage.agent ?? defaultAgent),
    errorPolicy: stage.on_error === 'continue' ? 'continue-on-error' : 'fail-fast',
    affectsOutcome: stage.affects_outcome ?? true,
    env: toEnvMap(stage.env),
    stash: (stage.stash ?? []).map((s) => ({ key: s.key, paths: [...s.paths] })),
    unstash: [...(stage.unstash ?? [])],
  };
  if (stage.when !== undefined) init.guard = stage.when;
  if (stage.timeout_seconds !== undefined) {
    init.timeoutMs = Math.round(stage.timeout_seconds * 1000);
  }
  return init;
}

/** Map a schema-valid document onto descriptor inputs. */
export function toPipelineInit(doc: PipelineDocument): PipelineInit {
  const post: Partial<Record<PostCondition, PostActionInit[]>> = {};
  for (const condition of POST_CONDITIONS) {
    const actions = doc.post?.[condition];
    if (actions === undefined) continue;
    post[condition] = actions.map((action, i) => ({
      name: action.name ?? `post-${condition}-${i + 1}`,
      commands: [...action.steps],
      environment: toEnvironment(action.agent ?? doc.agent),
    }));
  }

  return {
    name: doc.name,
    environment: toEnvMap(doc.environment),
    stages: doc.stages.map((stage) => toStageInit(stage, doc.agent)),
    post,
  };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse and validate pipeline YAML.
 *
 * @param source - Label used in error messages, usually the file path.
 * @throws ConfigError for YAML syntax errors, schema violations and
 *   descriptor rule violations.
 */
export function parsePipelineDocument(text: string, source = 'pipeline'): PipelineSpec {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid YAML in ${source}: ${detail}`, [detail]);
  }

  if (!validateDocument(raw)) {
    const problems = describeSchemaErrors(validateDocument.errors).map(formatProblem);
    throw new ConfigError(`Invalid pipeline document ${source}: ${problems[0]}`, problems);
  }

  return definePipeline(toPipelineInit(raw));
}

/** Read and parse a pipeline file from disk. */
export function loadPipeline(
  path: string,
  readFile: (path: string) => string = (p) => readFileSync(p, 'utf-8'),
): PipelineSpec {
  let text: string;
  try {
    text = readFile(path);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read pipeline file ${path}: ${detail}`, [detail]);
  }
  return parsePipelineDocument(text, path);
}
