export type {
  ProviderId,
  HostingConfig,
  ProjectedEnvVar,
  ProjectedEnvironment,
  StartCommand,
  ThoughtData,
  ThoughtResult,
  ActivityEntry,
} from './types.js';

export type { ProviderInfo } from './providers.js';

export {
  PROVIDER_IDS,
  DEFAULT_PROVIDER,
  PROVIDERS,
  isProviderId,
} from './providers.js';

export {
  MASK,
  isSensitiveKey,
  redactText,
  redactSensitive,
} from './redact.js';
