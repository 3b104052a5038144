import Conf from 'conf';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

export const DEFAULT_ENDPOINT = 'https://api.deepseek.com/beta/chat/completions';
export const DEFAULT_MODEL = 'deepseek-reasoner';

// Zod schemas for validation
const UpstreamConfigSchema = z.object({
  endpoint: z.string().url().default(DEFAULT_ENDPOINT),
  apiKey: z.string().default(''),
  model: z.string().min(1).default(DEFAULT_MODEL),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
});

const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8000),
  host: z.string().default('0.0.0.0'),
  allowedOrigins: z.array(z.string()).default(['*']),
});

const ToolLoopConfigSchema = z.object({
  enabled: z.boolean().default(true),
  maxExecutions: z.number().int().min(0).default(8),
  executionTimeoutMs: z.number().int().positive().default(5000),
});

const ClientConfigSchema = z.object({
  apiUrl: z.string().url().default('http://localhost:8000/v1/chat/completions'),
});

export const RuminateConfigSchema = z.object({
  upstream: UpstreamConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  toolLoop: ToolLoopConfigSchema.default({}),
  client: ClientConfigSchema.default({}),
  debug: z.boolean().default(false),
});

export type UpstreamConfig = z.infer<typeof UpstreamConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type ToolLoopConfig = z.infer<typeof ToolLoopConfigSchema>;
export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type RuminateConfig = z.infer<typeof RuminateConfigSchema>;

/** What the conf store holds: any subset of the full config. */
export type StoredConfig = {
  upstream?: Partial<UpstreamConfig>;
  server?: Partial<ServerConfig>;
  toolLoop?: Partial<ToolLoopConfig>;
  client?: Partial<ClientConfig>;
  debug?: boolean;
};

export type Environment = Record<string, string | undefined>;

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
}

function parseInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Merge defaults, the persisted store and the environment (highest wins).
 */
export function resolveConfig(stored: StoredConfig, env: Environment): RuminateConfig {
  const upstream: Partial<UpstreamConfig> = { ...stored.upstream };
  const baseUrl = env.DEEPSEEK_BASE_URL?.replace(/\/+$/, '');
  if (env.DEEPSEEK_API_KEY) upstream.apiKey = env.DEEPSEEK_API_KEY;
  if (baseUrl) upstream.endpoint = `${baseUrl}/chat/completions`;
  if (env.DEEPSEEK_MODEL) upstream.model = env.DEEPSEEK_MODEL;

  const server: Partial<ServerConfig> = { ...stored.server };
  const port = parseInteger('PORT', env.PORT);
  if (port !== undefined) server.port = port;
  if (env.HOST) server.host = env.HOST;
  if (env.ALLOWED_ORIGINS) {
    server.allowedOrigins = env.ALLOWED_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean);
  }

  const toolLoop: Partial<ToolLoopConfig> = { ...stored.toolLoop };
  const toolsEnabled = parseBoolean(env.RUMINATE_TOOLS);
  if (toolsEnabled !== undefined) toolLoop.enabled = toolsEnabled;

  const client: Partial<ClientConfig> = { ...stored.client };
  if (env.LLM_API_URL) client.apiUrl = env.LLM_API_URL;

  const result = RuminateConfigSchema.safeParse({
    upstream,
    server,
    toolLoop,
    client,
    debug: parseBoolean(env.RUMINATE_DEBUG) ?? stored.debug,
  });
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Raise unless the relay has what it needs to reach the upstream.
 */
export function validateForServing(config: RuminateConfig): void {
  if (!config.upstream.apiKey) {
    throw new ConfigurationError(
      'DeepSeek API key not configured. Set DEEPSEEK_API_KEY or run `ruminate config`.'
    );
  }
}

export function maskSecret(secret: string): string {
  if (!secret) return '(not set)';
  if (secret.length <= 8) return '****';
  return `${secret.slice(0, 3)}…${secret.slice(-4)}`;
}

export class ConfigManager {
  private store: Conf<StoredConfig>;
  private static instance: ConfigManager;

  private constructor() {
    this.store = new Conf<StoredConfig>({
      projectName: 'ruminate',
    });
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  getStored(): StoredConfig {
    return this.store.store;
  }

  /** Effective configuration for this process. */
  load(env: Environment = process.env): RuminateConfig {
    return resolveConfig(this.getStored(), env);
  }

  setUpstream(config: Partial<UpstreamConfig>) {
    const validated = UpstreamConfigSchema.partial().parse(config);
    this.store.set('upstream', { ...this.store.get('upstream'), ...validated });
  }

  setToolLoop(config: Partial<ToolLoopConfig>) {
    const validated = ToolLoopConfigSchema.partial().parse(config);
    this.store.set('toolLoop', { ...this.store.get('toolLoop'), ...validated });
  }

  setClient(config: Partial<ClientConfig>) {
    const validated = ClientConfigSchema.partial().parse(config);
    this.store.set('client', { ...this.store.get('client'), ...validated });
  }

  setDebug(enabled: boolean) {
    this.store.set('debug', enabled);
  }

  reset() {
    this.store.clear();
  }

  getConfigPath(): string {
    return this.store.path;
  }
}
