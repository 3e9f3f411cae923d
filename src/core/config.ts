import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { VitalsenseConfigSchema, type VitalsenseConfig } from './types.js';
import { ConfigurationError, toError } from './errors.js';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private config: VitalsenseConfig | null = null;
  private globalDir: string;
  private projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir ?? join(homedir(), '.vitalsense');
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: RawConfig, env: NodeJS.ProcessEnv = process.env): VitalsenseConfig {
    let raw: RawConfig = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.vitalsense.yaml'), 'project'));
    raw = this.applyEnvVars(raw, env);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const parsed = VitalsenseConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid configuration: ${issues}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  get(): VitalsenseConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  /**
   * Default location of the SQLite database when `storage.path` is unset
   */
  getDefaultDatabasePath(): string {
    return join(this.globalDir, 'vitalsense.db');
  }

  ensureDirectories(): void {
    for (const dir of [this.globalDir, join(this.globalDir, 'logs')]) {
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  /**
   * Create default global config if it doesn't exist
   */
  createDefaultConfig(): void {
    this.ensureDirectories();
    const configPath = join(this.globalDir, 'config.yaml');
    if (!existsSync(configPath)) {
      const defaultConfig = `# Vitalsense Global Configuration
# API keys (or set via environment variables)
providers:
  default: openai
  # model: gpt-4o-mini
  # openaiApiKey: ...

analysis:
  lookbackDays: 30
  minSamples: 5

personalization:
  halfLifeDays: 14

energy:
  minTrainingSamples: 14
`;
      writeFileSync(configPath, defaultConfig, 'utf-8');
    }
  }

  private readYaml(path: string, label: string): RawConfig {
    if (!existsSync(path)) return {};
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isRecord(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigurationError(`Failed to parse ${label} config at ${path}`, toError(err));
    }
  }

  private applyEnvVars(raw: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
    const providers: RawConfig = isRecord(raw.providers) ? { ...raw.providers } : {};
    const storage: RawConfig = isRecord(raw.storage) ? { ...raw.storage } : {};
    const logging: RawConfig = isRecord(raw.logging) ? { ...raw.logging } : {};

    if (env.ANTHROPIC_API_KEY) {
      providers.anthropicApiKey = env.ANTHROPIC_API_KEY;
    }
    if (env.OPENAI_API_KEY) {
      providers.openaiApiKey = env.OPENAI_API_KEY;
    }
    if (env.VITALSENSE_PROVIDER) {
      providers.default = env.VITALSENSE_PROVIDER;
    }
    if (env.VITALSENSE_MODEL) {
      providers.model = env.VITALSENSE_MODEL;
    }
    if (env.VITALSENSE_DB_PATH) {
      storage.path = env.VITALSENSE_DB_PATH;
    }
    if (env.VITALSENSE_LOG_LEVEL) {
      logging.level = env.VITALSENSE_LOG_LEVEL;
    }

    return { ...raw, providers, storage, logging };
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const next = source[key];
      const current = target[key];
      if (isRecord(next) && isRecord(current)) {
        result[key] = this.deepMerge(current, next);
      } else {
        result[key] = next;
      }
    }
    return result;
  }
}
