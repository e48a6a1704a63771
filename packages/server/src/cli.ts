/**
 * Command-line parsing for the `mcp-server-mas-sequential-thinking` script.
 *
 *   mcp-server-mas-sequential-thinking                       # MCP over stdio
 *   mcp-server-mas-sequential-thinking --transport http      # HTTP on HOST:PORT
 *   mcp-server-mas-sequential-thinking hosting-env '<json>'  # print projected env
 */

import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import type { TransportMode } from './config.js';
import { HostingConfigError } from './errors.js';
import {
  formatEnvironment,
  loadHostingDescriptor,
  projectEnvironment,
  resolveHostingConfig,
} from './hosting/descriptor.js';

export const DEFAULT_DESCRIPTOR_PATH = fileURLToPath(new URL('../../../smithery.yaml', import.meta.url));

export type CliCommand =
  | { kind: 'serve'; transport?: TransportMode }
  | { kind: 'hosting-env'; config: string; descriptorPath: string };

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      transport: { type: 'string' },
      descriptor: { type: 'string' },
    },
  });

  if (positionals[0] === 'hosting-env') {
    const config = positionals[1];
    if (config === undefined) {
      throw new HostingConfigError('hosting-env needs the hosting configuration as a JSON argument');
    }
    return { kind: 'hosting-env', config, descriptorPath: values.descriptor ?? DEFAULT_DESCRIPTOR_PATH };
  }
  if (positionals.length > 0) {
    throw new Error(`Unknown command: ${positionals.join(' ')}`);
  }

  const transport = values.transport;
  if (transport === undefined) {
    return { kind: 'serve' };
  }
  if (transport !== 'stdio' && transport !== 'http') {
    throw new Error(`Unsupported --transport "${transport}". Supported: stdio, http`);
  }
  return { kind: 'serve', transport };
}

/** Projected environment for a hosting configuration, as `KEY=value` lines. */
export function runHostingEnv(configJson: string, descriptorPath: string): string {
  let raw: unknown;
  try {
    raw = JSON.parse(configJson);
  } catch {
    throw new HostingConfigError('Hosting configuration is not valid JSON');
  }
  const descriptor = loadHostingDescriptor(descriptorPath);
  const config = resolveHostingConfig(descriptor.startCommand.configSchema, raw);
  return formatEnvironment(projectEnvironment(config));
}
