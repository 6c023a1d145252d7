import { readFile, writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { DEFAULT_EXTENSIONLESS_FILES } from './artifacts/path-safety.js';
import { PipelineError, errorMessage, hasErrorCode } from './errors.js';

export const ConfigSchema = z
  .object({
    provider: z.enum(['anthropic', 'ollama']).default('anthropic'),
    model: z.string().min(1).optional(),
    ollamaHost: z.string().url().optional(),
    apiKey: z.string().min(1).optional(),
    projectsDir: z.string().min(1).optional(),
    extensionlessFiles: z.array(z.string().min(1)).default([...DEFAULT_EXTENSIONLESS_FILES]),
    maxAttempts: z.number().int().min(1).max(5).default(2),
    maxTokens: z.number().int().positive().default(8192),
    temperature: z.number().min(0).max(1).optional(),
    requestTimeoutMs: z.number().int().positive().optional(),
    verbose: z.boolean().default(false),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

/** Shape accepted by `save()`: any subset of the file's keys */
export type ConfigInput = z.input<typeof ConfigSchema>;

export interface ConfigManagerOptions {
  /** Directory holding config.json (default: ~/.ideasmith) */
  configDir?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export const DEFAULT_CONFIG_DIR = join(homedir(), '.ideasmith');
export const DEFAULT_PROJECTS_DIR = join(homedir(), 'ideasmith-projects');

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export class ConfigManager {
  private config: Config = ConfigSchema.parse({});
  private fileConfig: ConfigInput = {};
  private readonly configFile: string;
  private readonly configDir: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.configDir = options.configDir ?? DEFAULT_CONFIG_DIR;
    this.configFile = join(this.configDir, 'config.json');
    this.env = options.env ?? process.env;
  }

  /**
   * Read config.json (a missing file means defaults), validate it and apply
   * environment overrides.
   */
  async load(): Promise<Config> {
    let raw: unknown = {};

    try {
      const configData = await readFile(this.configFile, 'utf-8');
      raw = JSON.parse(configData);
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        throw new PipelineError(`Failed to read configuration ${this.configFile}: ${errorMessage(error)}`, 'CONFIG_INVALID', {
          cause: error,
        });
      }
    }

    const parsed = ConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PipelineError(`Invalid configuration in ${this.configFile}: ${formatIssues(parsed.error)}`, 'CONFIG_INVALID');
    }
    this.fileConfig = parsed.data;

    const overridden = ConfigSchema.safeParse({ ...parsed.data, ...this.environmentOverrides() });
    if (!overridden.success) {
      throw new PipelineError(`Invalid configuration from environment: ${formatIssues(overridden.error)}`, 'CONFIG_INVALID');
    }
    this.config = overridden.data;

    return this.get();
  }

  async save(config: ConfigInput): Promise<void> {
    const merged = ConfigSchema.safeParse({ ...this.fileConfig, ...config });
    if (!merged.success) {
      throw new PipelineError(`Invalid configuration: ${formatIssues(merged.error)}`, 'CONFIG_INVALID');
    }

    try {
      await mkdir(this.configDir, { recursive: true });
      await writeFile(this.configFile, JSON.stringify(merged.data, null, 2));
    } catch (error) {
      throw new Error(`Failed to save configuration: ${errorMessage(error)}`, { cause: error });
    }

    this.fileConfig = merged.data;
    this.config = { ...merged.data, ...this.environmentOverrides() };
  }

  get(): Config {
    return { ...this.config, extensionlessFiles: [...this.config.extensionlessFiles] };
  }

  getConfigFile(): string {
    return this.configFile;
  }

  getApiKey(): string | undefined {
    return this.config.apiKey;
  }

  hasApiKey(): boolean {
    return !!this.config.apiKey;
  }

  getProjectsDir(): string {
    return this.config.projectsDir ?? DEFAULT_PROJECTS_DIR;
  }

  private environmentOverrides(): Partial<Config> {
    const overrides: Partial<Config> = {};

    // ANTHROPIC_API_KEY is standard, CLAUDE_API_KEY for backward compat
    const apiKey = this.env.ANTHROPIC_API_KEY || this.env.CLAUDE_API_KEY;
    if (apiKey) {
      overrides.apiKey = apiKey;
    }

    const provider = this.env.IDEASMITH_PROVIDER;
    if (provider === 'anthropic' || provider === 'ollama') {
      overrides.provider = provider;
    } else if (provider) {
      throw new PipelineError(`IDEASMITH_PROVIDER must be 'anthropic' or 'ollama', got '${provider}'`, 'CONFIG_INVALID');
    }
    if (this.env.IDEASMITH_MODEL) {
      overrides.model = this.env.IDEASMITH_MODEL;
    }
    if (this.env.OLLAMA_HOST) {
      overrides.ollamaHost = this.env.OLLAMA_HOST;
    }
    if (this.env.IDEASMITH_PROJECTS_DIR) {
      overrides.projectsDir = this.env.IDEASMITH_PROJECTS_DIR;
    }

    return overrides;
  }
}
