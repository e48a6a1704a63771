/**
 * Hosting descriptor (smithery.yaml): the operator-facing configuration
 * schema and its projection onto the environment the server reads.
 *
 *   const descriptor = loadHostingDescriptor('smithery.yaml');
 *   const config = resolveHostingConfig(descriptor.startCommand.configSchema, raw);
 *   buildStartCommand(config);
 *   // → { command: 'mcp-server-mas-sequential-thinking', args: [], env: { LLM_PROVIDER: ..., ... } }
 */

import * as fs from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  PROVIDERS,
  isProviderId,
  type HostingConfig,
  type ProjectedEnvironment,
  type ProviderId,
  type StartCommand,
} from '@seqthink/shared';
import { HostingConfigError } from '../errors.js';

export const START_COMMAND = 'mcp-server-mas-sequential-thinking';

/** Fields every descriptor's config schema must describe. */
export const HOSTING_FIELDS = [
  'llmProvider',
  'deepseekApiKey',
  'groqApiKey',
  'openrouterApiKey',
  'exaApiKey',
] as const satisfies readonly (keyof HostingConfig)[];

type HostingField = (typeof HOSTING_FIELDS)[number];

// ---------------------------------------------------------------------------
// Descriptor shape
// ---------------------------------------------------------------------------

const propertySchema = z.object({
  type: z.literal('string'),
  default: z.string().optional(),
  description: z.string().optional(),
  enum: z.array(z.string()).nonempty().optional(),
});

const configSchemaSchema = z
  .object({
    type: z.literal('object'),
    required: z.array(z.string()).default([]),
    properties: z.record(propertySchema),
  })
  .superRefine((schema, ctx) => {
    for (const field of HOSTING_FIELDS) {
      if (!Object.hasOwn(schema.properties, field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['properties', field],
          message: `property "${field}" is not described`,
        });
      }
    }
    for (const field of schema.required) {
      if (!Object.hasOwn(schema.properties, field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['required'],
          message: `required field "${field}" has no property`,
        });
      }
    }
  });

const descriptorSchema = z.object({
  startCommand: z.object({
    type: z.literal('stdio'),
    configSchema: configSchemaSchema,
    commandFunction: z.string().optional(),
    exampleConfig: z.record(z.unknown()).optional(),
  }),
});

export type HostingConfigSchema = z.infer<typeof configSchemaSchema>;
export type HostingDescriptor = z.infer<typeof descriptorSchema>;

/** Providers a hosted deployment may select (ollama needs a local daemon). */
const HOSTED_PROVIDERS: readonly ProviderId[] = ['deepseek', 'groq', 'openrouter'];

// ---------------------------------------------------------------------------
// Loading and validation
// ---------------------------------------------------------------------------

export function parseHostingDescriptor(source: string): HostingDescriptor {
  let document: unknown;
  try {
    document = parseYaml(source);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new HostingConfigError(`Hosting descriptor is not valid YAML: ${message}`);
  }

  const parsed = descriptorSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'descriptor'}: ${issue.message}`);
    throw new HostingConfigError(`Invalid hosting descriptor: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export function loadHostingDescriptor(filePath: string): HostingDescriptor {
  return parseHostingDescriptor(fs.readFileSync(filePath, 'utf-8'));
}

/**
 * Check operator-supplied values against the descriptor's config schema and
 * fill in defaults. Unknown fields, missing required fields, non-string
 * values and unsupported providers are rejected.
 */
export function resolveHostingConfig(schema: HostingConfigSchema, raw: unknown): HostingConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new HostingConfigError('Hosting configuration must be an object');
  }
  const values = new Map<string, unknown>(Object.entries(raw));

  for (const key of values.keys()) {
    if (!Object.hasOwn(schema.properties, key)) {
      throw new HostingConfigError(`Unknown configuration field: ${key}`);
    }
  }

  for (const field of schema.required) {
    if (!values.has(field) || values.get(field) === undefined) {
      throw new HostingConfigError(`Missing required configuration field: ${field}`);
    }
  }

  const pick = (field: HostingField): string => {
    const value = values.get(field);
    if (value === undefined) {
      return schema.properties[field]?.default ?? '';
    }
    if (typeof value !== 'string') {
      throw new HostingConfigError(`Configuration field ${field} must be a string`);
    }
    return value;
  };

  const options: readonly string[] = schema.properties['llmProvider']?.enum ?? HOSTED_PROVIDERS;
  const provider = pick('llmProvider');
  if (!options.includes(provider) || !isProviderId(provider)) {
    throw new HostingConfigError(
      `Unsupported llmProvider "${provider}". Options: ${options.join(', ')}`,
    );
  }

  return {
    llmProvider: provider,
    deepseekApiKey: pick('deepseekApiKey'),
    groqApiKey: pick('groqApiKey'),
    openrouterApiKey: pick('openrouterApiKey'),
    exaApiKey: pick('exaApiKey'),
  };
}

// ---------------------------------------------------------------------------
// Projection
// ---------------------------------------------------------------------------

export function projectEnvironment(config: HostingConfig): ProjectedEnvironment {
  return {
    LLM_PROVIDER: config.llmProvider,
    DEEPSEEK_API_KEY: config.deepseekApiKey,
    GROQ_API_KEY: config.groqApiKey,
    OPENROUTER_API_KEY: config.openrouterApiKey,
    EXA_API_KEY: config.exaApiKey,
  };
}

export function buildStartCommand(config: HostingConfig): StartCommand {
  return {
    command: START_COMMAND,
    args: [],
    env: projectEnvironment(config),
  };
}

/** Config field holding the credential `provider` needs, or null when it needs none. */
export function requiredCredentialFor(provider: ProviderId): keyof HostingConfig | null {
  return PROVIDERS[provider].hostingKeyField;
}

/** `KEY=value` lines, in projection order. */
export function formatEnvironment(env: ProjectedEnvironment): string {
  return Object.entries(env)
    .map(([key, value]) => `${key}=${value}`)
    .join('\n');
}
